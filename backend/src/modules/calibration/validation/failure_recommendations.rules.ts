/**
 * FAILURE TAXONOMY + RECOMMENDATIONS
 */

import { layerSymbol, fmt, CanonicalLayer } from '../contracts/calibration.contract.js';
import type { FailureReason } from '../contracts/decision.contract.js';

export const LAYER_FAILURE_REASONS: Record<CanonicalLayer, FailureReason> = {
  BASE: 'BASE_LAYER_LOW',
  CHAIN: 'CHAIN_LAYER_FAIL',
  UNIT: 'UNIT_LAYER_FAIL',
  QUESTION: 'CONTEXTUAL_FAIL',
  DIMENSION: 'CONTEXTUAL_FAIL',
  POLICY: 'CONTEXTUAL_FAIL',
  CONGRUENCE: 'CONGRUENCE_FAIL',
  META: 'META_LAYER_FAIL',
};

export const RECOMMENDATIONS: Record<FailureReason, readonly string[]> = {
  BASE_LAYER_LOW: [
    'Improve code quality: add tests, documentation, type hints',
    'Review theoretical foundation of the method',
    'Consider refactoring for better maintainability',
  ],
  CHAIN_LAYER_FAIL: [
    'Verify all required inputs are available',
    'Check method signature matches the declared contract',
    'Ensure upstream methods execute successfully',
  ],
  UNIT_LAYER_FAIL: [
    'Improve document structure quality',
    'Ensure mandatory sections are present',
    'Validate indicator quality in the document',
  ],
  CONTEXTUAL_FAIL: [
    'Verify the method is appropriate for this question, dimension and policy area',
    'Check compatibility mappings in the method registry',
    'Consider using a different method for this context',
  ],
  CONGRUENCE_FAIL: [
    'Review semantic compatibility of the ensemble',
    'Check semantic tags of the participating methods',
    'Consider a different fusion rule',
  ],
  META_LAYER_FAIL: [
    'Improve traceability: export formulas and add logging',
    'Validate governance: version tags, config hash, signatures',
    'Optimize execution time and memory',
  ],
  SCORE_BELOW_THRESHOLD: [
    'Review all layer scores to identify specific improvement areas',
  ],
  CALIBRATION_ERROR: [
    'Check the intrinsic registry and storage connections',
    'Re-run the calibration once the underlying error is resolved',
  ],
};

export function failureReasonFor(layer: CanonicalLayer): FailureReason {
  return LAYER_FAILURE_REASONS[layer];
}

export function layerFailureDetails(layer: CanonicalLayer, value: number, floor: number): string {
  return `Layer ${layerSymbol(layer)} scored ${fmt(value)}, below the floor of ${fmt(floor)}`;
}

export function thresholdFailureDetails(score: number, threshold: number): string {
  return `Score ${fmt(score)} is below the threshold of ${fmt(threshold)}; no layer fell below the floor`;
}

/**
 * Recommendations for the given reasons in order, without repeats.
 */
export function rankedRecommendations(reasons: readonly FailureReason[]): string[] {
  const out: string[] = [];
  for (const reason of reasons) {
    for (const text of RECOMMENDATIONS[reason]) {
      if (!out.includes(text)) out.push(text);
    }
  }
  return out;
}
