/**
 * CONTEXTUAL LAYERS (@q, @d, @p): compatibility lookups
 */

import {
  createLayerScore,
  assertNever,
  layerSymbol,
  ownEntry,
  CanonicalLayer,
  LayerScore,
} from '../contracts/calibration.contract.js';
import type {
  CompatibilityDeclaration,
  CompatibilityTier,
  LayerRubric,
} from '../contracts/config.contract.js';
import type { LayerEvaluationInput } from './layer_input.js';

export type ContextualLayer = Extract<CanonicalLayer, 'QUESTION' | 'DIMENSION' | 'POLICY'>;

type TierName = CompatibilityTier | 'undeclared';

export function compatibilityScore(rubric: LayerRubric, tier: CompatibilityTier | undefined): { tier: TierName; value: number } {
  const name: TierName = tier ?? 'undeclared';
  return { tier: name, value: rubric.contextual.tiers[name] };
}

export function compatibilityTable(
  compatibility: CompatibilityDeclaration,
  layer: ContextualLayer
): Readonly<Record<string, CompatibilityTier>> {
  switch (layer) {
    case 'QUESTION': return compatibility.questions;
    case 'DIMENSION': return compatibility.dimensions;
    case 'POLICY': return compatibility.policies;
    default: return assertNever(layer);
  }
}

export function evaluateContextualLayer(input: LayerEvaluationInput, layer: ContextualLayer): LayerScore {
  const { context } = input.subject;
  const key = layer === 'QUESTION' ? context.questionId
    : layer === 'DIMENSION' ? context.dimension
    : context.policyArea;

  const declared = input.declaration
    ? ownEntry(compatibilityTable(input.declaration.compatibility, layer), key)
    : undefined;
  const { tier, value } = compatibilityScore(input.config.rubric, declared);

  return createLayerScore({
    layer,
    value,
    components: { tier: value },
    rationale: input.declaration
      ? `${key} is ${tier} for ${input.subject.methodId}`
      : `${input.subject.methodId} is not registered; ${key} treated as undeclared`,
    formula: `${layerSymbol(layer)} = ${tier}(${key}) = ${value}`,
    evidence: { key, tier },
  });
}
