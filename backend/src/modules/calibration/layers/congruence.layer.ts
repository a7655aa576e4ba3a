/**
 * CONGRUENCE LAYER (@C): ensemble consistency
 *
 * Alone:            registered → 1, else 0
 * Interplay group:  C = c_scale · c_sem · c_fusion
 *   c_scale   same range as the target / every difference has a declared transform / else 0
 *   c_sem     Jaccard overlap of participants' concept tags
 *   c_fusion  declared rule + all requirements / some missing / no or unknown rule
 *
 * Groups are declared in method_registry.json, never inferred.
 */

import { createLayerScore, fmt, ownEntry, LayerScore } from '../contracts/calibration.contract.js';
import type {
  InterplayGroup,
  LayerRubric,
  MethodDeclaration,
  MethodRegistry,
} from '../contracts/config.contract.js';
import { EvidenceError } from '../contracts/calibration.errors.js';
import { CongruenceEvidenceSchema, parseEvidenceSection } from '../contracts/evidence.contract.js';
import type { LayerEvaluationInput } from './layer_input.js';

type Range = readonly [number, number];

function sameRange(a: Range, b: Range): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

function participantDeclarations(registry: MethodRegistry, group: InterplayGroup): Array<MethodDeclaration | null> {
  return group.participants.map(id => ownEntry(registry.methods, id) ?? null);
}

export function scaleCongruence(rubric: LayerRubric, group: InterplayGroup, declarations: Array<MethodDeclaration | null>): number {
  const tiers = rubric.congruence.scale;
  const ranges: Range[] = [];
  for (const declaration of declarations) {
    if (!declaration || !declaration.outputRange) return tiers.incompatible;
    ranges.push(declaration.outputRange);
  }

  if (ranges.every(r => sameRange(r, group.targetRange))) return tiers.same_range;

  const convertible = ranges.every(r =>
    sameRange(r, group.targetRange) ||
    group.transforms.some(t => sameRange(t.from, r) && sameRange(t.to, group.targetRange))
  );
  return convertible ? tiers.convertible : tiers.incompatible;
}

export function semanticCongruence(declarations: Array<MethodDeclaration | null>): number {
  const tagSets: Array<Set<string>> = [];
  for (const declaration of declarations) {
    if (!declaration) return 0;
    tagSets.push(new Set(declaration.semanticTags));
  }

  const union = new Set<string>();
  for (const tags of tagSets) tags.forEach(t => union.add(t));
  if (union.size === 0) return 0;

  const intersection = Array.from(union).filter(t => tagSets.every(tags => tags.has(t)));
  return intersection.length / union.size;
}

export function fusionValidity(
  rubric: LayerRubric,
  group: InterplayGroup,
  declarations: Array<MethodDeclaration | null>,
  providedInputs: readonly string[]
): { value: number; missing: string[] } {
  const tiers = rubric.congruence.fusion;
  if (!group.fusionRule || !rubric.congruence.fusion_rules.includes(group.fusionRule)) {
    return { value: tiers.undeclared, missing: [] };
  }

  const required = new Set<string>();
  for (const declaration of declarations) {
    declaration?.fusionRequirements.forEach(r => required.add(r));
  }
  const provided = new Set(providedInputs);
  const missing = Array.from(required).filter(r => !provided.has(r)).sort();

  return { value: missing.length === 0 ? tiers.complete : tiers.partial, missing };
}

export function evaluateCongruenceLayer(input: LayerEvaluationInput): LayerScore {
  const rubric = input.config.rubric;
  const registry = input.config.registry;
  const methodId = input.subject.methodId;

  if (input.evidence.congruence === undefined || input.evidence.congruence === null) {
    const registered = input.declaration !== null;
    const value = registered ? rubric.congruence.alone.registered : rubric.congruence.alone.unregistered;
    return createLayerScore({
      layer: 'CONGRUENCE',
      value,
      components: { alone: value },
      rationale: registered
        ? `${methodId} acts alone and is registered`
        : `${methodId} acts alone and is not registered`,
      formula: `@C = alone(${registered ? 'registered' : 'unregistered'}) = ${value}`,
      evidence: { mode: 'alone' },
    });
  }

  const evidence = parseEvidenceSection('CONGRUENCE', 'congruence', CongruenceEvidenceSchema, input.evidence.congruence);
  const group = ownEntry(registry.interplays, evidence.interplayId);
  if (!group) {
    throw new EvidenceError('CONGRUENCE', 'congruence.interplayId', `unknown interplay '${evidence.interplayId}'`);
  }
  if (!group.participants.includes(methodId)) {
    throw new EvidenceError('CONGRUENCE', 'congruence.interplayId', `${methodId} is not a participant of '${group.interplayId}'`);
  }

  const declarations = participantDeclarations(registry, group);
  const cScale = scaleCongruence(rubric, group, declarations);
  const cSem = semanticCongruence(declarations);
  const fusion = fusionValidity(rubric, group, declarations, evidence.providedInputs);
  const value = cScale * cSem * fusion.value;

  const unregistered = group.participants.filter((_, i) => declarations[i] === null);

  return createLayerScore({
    layer: 'CONGRUENCE',
    value,
    components: { c_scale: cScale, c_sem: cSem, c_fusion: fusion.value },
    rationale: unregistered.length > 0
      ? `Interplay ${group.interplayId} has unregistered participants: ${unregistered.join(', ')}`
      : fusion.missing.length > 0
        ? `Interplay ${group.interplayId}: fusion requirements missing: ${fusion.missing.join(', ')}`
        : `Interplay ${group.interplayId} with ${group.participants.length} participants`,
    formula: `@C = c_scale·c_sem·c_fusion = ${fmt(cScale)}·${fmt(cSem)}·${fmt(fusion.value)} = ${fmt(value)}`,
    evidence: {
      mode: 'interplay',
      interplayId: group.interplayId,
      participants: [...group.participants],
      fusionRule: group.fusionRule,
      missingRequirements: fusion.missing,
    },
  });
}
