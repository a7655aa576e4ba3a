/**
 * LAYER SCORE CATALOG
 *
 * One evaluator per canonical layer. Dispatch is exhaustive over
 * CanonicalLayer; adding a layer without an evaluator fails to compile.
 */

import { assertNever, CanonicalLayer, LayerScore } from '../contracts/calibration.contract.js';
import type { LayerEvaluationInput } from './layer_input.js';
import { evaluateBaseLayer } from './base.layer.js';
import { evaluateChainLayer } from './chain.layer.js';
import { evaluateUnitLayer } from './unit.layer.js';
import { evaluateContextualLayer } from './contextual.layer.js';
import { evaluateCongruenceLayer } from './congruence.layer.js';
import { evaluateMetaLayer } from './meta.layer.js';

export function evaluateLayer(layer: CanonicalLayer, input: LayerEvaluationInput): LayerScore {
  switch (layer) {
    case 'BASE':
      return evaluateBaseLayer(input);
    case 'CHAIN':
      return evaluateChainLayer(input);
    case 'UNIT':
      return evaluateUnitLayer(input);
    case 'QUESTION':
    case 'DIMENSION':
    case 'POLICY':
      return evaluateContextualLayer(input, layer);
    case 'CONGRUENCE':
      return evaluateCongruenceLayer(input);
    case 'META':
      return evaluateMetaLayer(input);
    default:
      return assertNever(layer);
  }
}

/**
 * Evaluate every active layer in the given (canonical) order.
 * The first EvidenceError propagates.
 */
export function evaluateLayers(layers: readonly CanonicalLayer[], input: LayerEvaluationInput): LayerScore[] {
  return layers.map(layer => evaluateLayer(layer, input));
}
