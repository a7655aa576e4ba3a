/**
 * ANTI-UNIVERSALITY RULE
 *
 * No method may be maximally compatible everywhere. A method is rejected
 * when it would score ≥ threshold on @q, @d and @p for every
 * question × dimension × policy of the configured domain.
 *
 * Contextual scores are independent per axis, so "every combination"
 * reduces to the minimum of each axis clearing the threshold.
 */

import { ownEntry } from '../contracts/calibration.contract.js';
import type {
  CompatibilityTier,
  LayerRubric,
  MethodDeclaration,
  MethodRegistry,
} from '../contracts/config.contract.js';
import { compatibilityScore } from '../layers/contextual.layer.js';

export interface UniversalityFinding {
  readonly methodId: string;
  readonly combinationsScanned: number;
  readonly minQuestion: number;
  readonly minDimension: number;
  readonly minPolicy: number;
  readonly universal: boolean;
}

function axisMinimum(
  rubric: LayerRubric,
  values: readonly string[],
  table: Readonly<Record<string, CompatibilityTier>>
): number {
  let min = Infinity;
  for (const key of values) {
    min = Math.min(min, compatibilityScore(rubric, ownEntry(table, key)).value);
  }
  return min;
}

export function scanUniversality(
  rubric: LayerRubric,
  registry: Pick<MethodRegistry, 'domain'>,
  declaration: MethodDeclaration,
  threshold: number
): UniversalityFinding {
  const { questions, dimensions, policies } = registry.domain;
  const minQuestion = axisMinimum(rubric, questions, declaration.compatibility.questions);
  const minDimension = axisMinimum(rubric, dimensions, declaration.compatibility.dimensions);
  const minPolicy = axisMinimum(rubric, policies, declaration.compatibility.policies);

  return {
    methodId: declaration.methodId,
    combinationsScanned: questions.length * dimensions.length * policies.length,
    minQuestion,
    minDimension,
    minPolicy,
    universal: minQuestion >= threshold && minDimension >= threshold && minPolicy >= threshold,
  };
}

export function checkAntiUniversality(
  rubric: LayerRubric,
  registry: Pick<MethodRegistry, 'domain' | 'methods'>,
  threshold: number
): string[] {
  const violations: string[] = [];
  for (const methodId of Object.keys(registry.methods).sort()) {
    const finding = scanUniversality(rubric, registry, registry.methods[methodId], threshold);
    if (finding.universal) {
      violations.push(
        `Anti-universality violated by ${methodId}: scores ≥ ${threshold} on @q, @d and @p ` +
        `for all ${finding.combinationsScanned} combinations scanned`
      );
    }
  }
  return violations;
}
