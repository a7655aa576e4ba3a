/**
 * META LAYER (@m): governance and observability
 *
 * @m = w_t·m_transp + w_g·m_gov + w_c·m_cost
 */

import { createLayerScore, fmt, LayerScore } from '../contracts/calibration.contract.js';
import type { LayerRubric } from '../contracts/config.contract.js';
import { MetaEvidenceSchema, parseEvidenceSection } from '../contracts/evidence.contract.js';
import { LayerEvaluationInput, clamp01 } from './layer_input.js';

type CostTier = 'fast' | 'acceptable' | 'slow';

export function conditionTier(rubric: LayerRubric, conditions: readonly boolean[]): number {
  const met = conditions.filter(Boolean).length;
  const tiers = rubric.meta.condition_tiers;
  if (met >= 3) return tiers.all;
  if (met === 2) return tiers.two;
  if (met === 1) return tiers.one;
  return tiers.none;
}

function costTierOf(measure: number, limits: { fast: number; acceptable: number }): CostTier {
  if (measure <= limits.fast) return 'fast';
  if (measure <= limits.acceptable) return 'acceptable';
  return 'slow';
}

export function costScore(rubric: LayerRubric, runtimeMs: number, memoryMb: number): { value: number; runtime: CostTier; memory: CostTier } {
  const cost = rubric.meta.cost;
  const runtime = costTierOf(runtimeMs, cost.runtime_ms);
  const memory = costTierOf(memoryMb, cost.memory_mb);
  return { value: Math.min(cost.tiers[runtime], cost.tiers[memory]), runtime, memory };
}

export function evaluateMetaLayer(input: LayerEvaluationInput): LayerScore {
  const rubric = input.config.rubric;
  const evidence = parseEvidenceSection('META', 'meta', MetaEvidenceSchema, input.evidence.meta);
  const weights = rubric.meta.weights;

  const transp = conditionTier(rubric, [evidence.formulaExported, evidence.traceComplete, evidence.logsConformSchema]);
  const gov = conditionTier(rubric, [evidence.versionTagged, evidence.configHashMatches, evidence.signatureValid]);
  const cost = costScore(rubric, evidence.runtimeMs, evidence.memoryMb);

  const value = clamp01(weights.transparency * transp + weights.governance * gov + weights.cost * cost.value);

  return createLayerScore({
    layer: 'META',
    value,
    components: { m_transp: transp, m_gov: gov, m_cost: cost.value },
    rationale: `transparency ${fmt(transp)}, governance ${fmt(gov)}, cost ${cost.runtime}/${cost.memory}`,
    formula: `@m = ${weights.transparency}·${fmt(transp)} + ${weights.governance}·${fmt(gov)} + ${weights.cost}·${fmt(cost.value)} = ${fmt(value)}`,
    evidence: { ...evidence, runtimeTier: cost.runtime, memoryTier: cost.memory },
  });
}
