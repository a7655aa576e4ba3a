/**
 * BASE LAYER (@b): intrinsic quality
 *
 * @b = w_th·b_theory + w_imp·b_impl + w_dep·b_deploy
 *
 * Registry status:
 * - computed → registry values
 * - pending  → fallback value for every component
 * - none     → lower fallback, warning logged
 * - excluded → never scored (subject skipped upstream)
 */

import { createLayerScore, fmt, LayerScore } from '../contracts/calibration.contract.js';
import type { IntrinsicRecord } from '../contracts/registry.contract.js';
import { LayerEvaluationInput, clamp01 } from './layer_input.js';

interface ResolvedIntrinsic {
  bTheory: number;
  bImpl: number;
  bDeploy: number;
  rationale: string;
}

function resolveIntrinsic(
  intrinsic: IntrinsicRecord,
  fallbacks: { pending: number; none: number }
): ResolvedIntrinsic {
  switch (intrinsic.status) {
    case 'computed':
      return {
        bTheory: intrinsic.bTheory ?? fallbacks.none,
        bImpl: intrinsic.bImpl ?? fallbacks.none,
        bDeploy: intrinsic.bDeploy ?? fallbacks.none,
        rationale: `Intrinsic scores from registry (${intrinsic.source} ${intrinsic.version})`,
      };
    case 'pending':
      return {
        bTheory: fallbacks.pending,
        bImpl: fallbacks.pending,
        bDeploy: fallbacks.pending,
        rationale: `Intrinsic calibration pending for ${intrinsic.methodId}; using ${fmt(fallbacks.pending)} per component`,
      };
    case 'none':
      console.warn(`[Calibration] No intrinsic calibration for ${intrinsic.methodId}; using ${fallbacks.none}`);
      return {
        bTheory: fallbacks.none,
        bImpl: fallbacks.none,
        bDeploy: fallbacks.none,
        rationale: `No intrinsic calibration for ${intrinsic.methodId}; using ${fmt(fallbacks.none)} per component`,
      };
    case 'excluded':
      throw new Error(`Method ${intrinsic.methodId} is excluded from calibration and cannot be scored`);
  }
}

export function evaluateBaseLayer(input: LayerEvaluationInput): LayerScore {
  const { intrinsic, config } = input;
  const { weights, fallbacks } = config.rubric.base;
  const { bTheory, bImpl, bDeploy, rationale } = resolveIntrinsic(intrinsic, fallbacks);

  const value = clamp01(weights.w_th * bTheory + weights.w_imp * bImpl + weights.w_dep * bDeploy);

  return createLayerScore({
    layer: 'BASE',
    value,
    components: {
      b_theory: bTheory,
      b_impl: bImpl,
      b_deploy: bDeploy,
      w_th: weights.w_th,
      w_imp: weights.w_imp,
      w_dep: weights.w_dep,
    },
    rationale,
    formula: `@b = ${weights.w_th}·${fmt(bTheory)} + ${weights.w_imp}·${fmt(bImpl)} + ${weights.w_dep}·${fmt(bDeploy)} = ${fmt(value)}`,
    evidence: { status: intrinsic.status, registry: intrinsic.source, version: intrinsic.version },
  });
}
