/**
 * CHAIN LAYER (@chain): input/output contract compliance
 *
 * Priority tiers (first match wins):
 *   hard mismatch       → required input absent, type mismatch, or no signature
 *   missing beneficial  → an optional input the method benefits from is absent
 *   schema deviation    → non-fatal deviation reported upstream
 *   warnings            → contracts pass, warnings raised
 *   clean
 */

import { createLayerScore, ownEntry, LayerScore } from '../contracts/calibration.contract.js';
import { ChainEvidenceSchema, parseEvidenceSection } from '../contracts/evidence.contract.js';
import type { LayerEvaluationInput } from './layer_input.js';

const ANY_TYPE = 'any';

export function evaluateChainLayer(input: LayerEvaluationInput): LayerScore {
  const tiers = input.config.rubric.chain.tiers;
  const signature = input.declaration?.signature ?? null;

  if (!signature) {
    return createLayerScore({
      layer: 'CHAIN',
      value: tiers.hard_mismatch,
      components: { tier: tiers.hard_mismatch },
      rationale: `No declared signature for ${input.subject.methodId}`,
      formula: `@chain = hard_mismatch = ${tiers.hard_mismatch}`,
    });
  }

  const evidence = parseEvidenceSection('CHAIN', 'chain', ChainEvidenceSchema, input.evidence.chain);
  const provided = evidence.providedInputs;

  const missingRequired: string[] = [];
  const typeMismatches: string[] = [];
  for (const [name, declaredType] of Object.entries(signature.requiredInputs).sort(([a], [b]) => a.localeCompare(b))) {
    const providedType = ownEntry(provided, name);
    if (providedType === undefined) {
      missingRequired.push(name);
    } else if (declaredType !== ANY_TYPE && providedType !== declaredType) {
      typeMismatches.push(`${name}: expected ${declaredType}, got ${providedType}`);
    }
  }
  const missingBeneficial = signature.beneficialInputs.filter(name => ownEntry(provided, name) === undefined).sort();

  const snapshot = {
    providedInputs: Object.keys(provided).sort(),
    missingRequired,
    typeMismatches,
    missingBeneficial,
    schemaDeviations: evidence.schemaDeviations,
    warnings: evidence.warnings,
  };

  let tierName: keyof typeof tiers;
  let rationale: string;

  if (missingRequired.length > 0 || typeMismatches.length > 0) {
    tierName = 'hard_mismatch';
    rationale = missingRequired.length > 0
      ? `Required inputs missing: ${missingRequired.join(', ')}`
      : `Input type mismatch: ${typeMismatches.join('; ')}`;
  } else if (missingBeneficial.length > 0) {
    tierName = 'missing_beneficial';
    rationale = `Beneficial inputs missing: ${missingBeneficial.join(', ')}`;
  } else if (evidence.schemaDeviations.length > 0) {
    tierName = 'schema_deviation';
    rationale = `Schema deviations: ${evidence.schemaDeviations.join('; ')}`;
  } else if (evidence.warnings.length > 0) {
    tierName = 'warnings';
    rationale = `Contracts satisfied with ${evidence.warnings.length} warning(s)`;
  } else {
    tierName = 'clean';
    rationale = 'All input contracts satisfied';
  }

  const value = tiers[tierName];
  return createLayerScore({
    layer: 'CHAIN',
    value,
    components: {
      tier: value,
      missing_required: missingRequired.length,
      type_mismatches: typeMismatches.length,
      missing_beneficial: missingBeneficial.length,
    },
    rationale,
    formula: `@chain = ${tierName} = ${value}`,
    evidence: snapshot,
  });
}
