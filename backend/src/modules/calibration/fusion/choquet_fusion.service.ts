/**
 * CHOQUET FUSION: 2-additive aggregation
 *
 * Cal(I) = Σ a_ℓ·x_ℓ + Σ a_ℓk·min(x_ℓ, x_k)
 *
 * Linear terms over active layers, interaction terms only when both
 * layers are active. Weights are validated at load; an out-of-bounds
 * result is a configuration error, never clamped.
 */

import {
  layerOrder,
  layerSymbol,
  sortLayers,
  fmt,
  CanonicalLayer,
  LayerScore,
} from '../contracts/calibration.contract.js';
import type { RoleFusionConfig, InteractionTerm } from '../contracts/config.contract.js';
import type { FusionResult, FusionTraceTerm, InteractionContribution } from '../contracts/certificate.contract.js';
import { CalibrationConfigError } from '../contracts/calibration.errors.js';

export const BOUNDS_EPSILON = 1e-9;

/**
 * Interaction terms in canonical order of their declared pair.
 */
export function orderedInteractions(config: RoleFusionConfig): InteractionTerm[] {
  return [...config.interactions].sort((x, y) =>
    layerOrder(x.layerA) - layerOrder(y.layerA) || layerOrder(x.layerB) - layerOrder(y.layerB)
  );
}

function interactionTermName(term: { layerA: CanonicalLayer; layerB: CanonicalLayer }): string {
  return `min(${layerSymbol(term.layerA)},${layerSymbol(term.layerB)})`;
}

/**
 * Sum trace contributions in trace order.
 * Shared with certificate verification so both produce identical bits.
 */
export function sumContributions(
  trace: ReadonlyArray<Pick<FusionTraceTerm, 'kind' | 'contribution'>>,
  kind: FusionTraceTerm['kind']
): number {
  let total = 0;
  for (const term of trace) {
    if (term.kind === kind) total += term.contribution;
  }
  return total;
}

export function buildFusionTrace(
  config: RoleFusionConfig,
  values: ReadonlyMap<CanonicalLayer, number>
): FusionTraceTerm[] {
  const trace: FusionTraceTerm[] = [];

  for (const layer of sortLayers(values.keys())) {
    const value = values.get(layer) ?? 0;
    const weight = config.linearWeights[layer] ?? 0;
    trace.push({
      kind: 'linear',
      term: layerSymbol(layer),
      layers: [layer],
      weight,
      value,
      contribution: weight * value,
    });
  }

  for (const term of orderedInteractions(config)) {
    const a = values.get(term.layerA);
    const b = values.get(term.layerB);
    if (a === undefined || b === undefined) continue;
    const min = Math.min(a, b);
    trace.push({
      kind: 'interaction',
      term: interactionTermName(term),
      layers: [term.layerA, term.layerB],
      weight: term.weight,
      value: min,
      contribution: term.weight * min,
    });
  }

  return trace;
}

export function fuse(config: RoleFusionConfig, scores: readonly LayerScore[]): FusionResult {
  const values = new Map<CanonicalLayer, number>();
  for (const score of scores) values.set(score.layer, score.value);

  const trace = buildFusionTrace(config, values);
  const linearSum = sumContributions(trace, 'linear');
  const interactionSum = sumContributions(trace, 'interaction');
  const finalScore = linearSum + interactionSum;

  if (finalScore < -BOUNDS_EPSILON || finalScore > 1 + BOUNDS_EPSILON) {
    const weights = trace.map(t => `${t.term}=${t.weight}`).join(', ');
    throw new CalibrationConfigError(
      `Fusion for role '${config.role}' produced ${finalScore} outside [0,1]; weights: ${weights}`
    );
  }

  const symbolic = trace
    .map(t => t.kind === 'linear'
      ? `a${t.term}·x${t.term}`
      : `a(${t.layers.map(layerSymbol).join(',')})·${t.term.replace(/@/g, 'x@')}`)
    .join(' + ');
  const expanded = trace.map(t => `${t.weight}·${fmt(t.value)}`).join(' + ') + ` = ${fmt(finalScore)}`;

  return {
    linearSum,
    interactionSum,
    finalScore,
    activeLayers: sortLayers(values.keys()),
    trace,
    symbolic: `Cal(I) = ${symbolic}`,
    expanded: `Cal(I) = ${expanded}`,
  };
}

export function interactionContributions(
  config: RoleFusionConfig,
  trace: readonly FusionTraceTerm[]
): InteractionContribution[] {
  const out: InteractionContribution[] = [];
  for (const term of orderedInteractions(config)) {
    const traced = trace.find(t =>
      t.kind === 'interaction' && t.layers[0] === term.layerA && t.layers[1] === term.layerB
    );
    const linearA = trace.find(t => t.kind === 'linear' && t.layers[0] === term.layerA);
    const linearB = trace.find(t => t.kind === 'linear' && t.layers[0] === term.layerB);
    if (!traced || !linearA || !linearB) continue;

    const symA = layerSymbol(term.layerA);
    const symB = layerSymbol(term.layerB);
    const weakest = linearA.value <= linearB.value ? symA : symB;
    out.push({
      layerA: term.layerA,
      layerB: term.layerB,
      weight: term.weight,
      valueA: linearA.value,
      valueB: linearB.value,
      minValue: traced.value,
      contribution: traced.contribution,
      formula: `${term.weight}·min(${fmt(linearA.value)}, ${fmt(linearB.value)}) = ${fmt(traced.contribution)}`,
      interpretation: `${symA}×${symB} bounded by the weaker layer ${weakest} (${fmt(traced.value)})`,
      rationale: term.rationale,
    });
  }
  return out;
}
