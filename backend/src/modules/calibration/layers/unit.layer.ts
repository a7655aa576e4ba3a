/**
 * UNIT LAYER (@u): sensitivity to the quality of the analysed document
 *
 * g_role(U) by role family:
 *   identity          g(U) = U
 *   piecewise_linear  0 below abort, slope·U + offset in the ramp, 1 at saturation
 *   sigmoid           1 − e^{−k(U − x0)}, 0 below x0
 *   insensitive       constant
 *
 * Hard gates force exactly 0 regardless of U.
 */

import { createLayerScore, fmt, LayerScore, MethodRole } from '../contracts/calibration.contract.js';
import type { LayerRubric } from '../contracts/config.contract.js';
import { UnitEvidenceSchema, parseEvidenceSection } from '../contracts/evidence.contract.js';
import { LayerEvaluationInput, clamp01 } from './layer_input.js';

export type UnitFamily = 'identity' | 'piecewise_linear' | 'sigmoid' | 'insensitive';

export function unitFamilyOf(rubric: LayerRubric, role: MethodRole): UnitFamily {
  if (rubric.unit.identity.roles.includes(role)) return 'identity';
  if (rubric.unit.piecewise_linear.roles.includes(role)) return 'piecewise_linear';
  if (rubric.unit.sigmoid.roles.includes(role)) return 'sigmoid';
  return 'insensitive';
}

/**
 * g_role(U). Exported for the ramp/monotonicity tests.
 */
export function unitResponse(rubric: LayerRubric, family: UnitFamily, u: number): { value: number; formula: string } {
  switch (family) {
    case 'identity':
      return { value: clamp01(u), formula: `g(U) = U = ${fmt(u)}` };

    case 'piecewise_linear': {
      const p = rubric.unit.piecewise_linear;
      if (u < p.abort_threshold) {
        return { value: 0, formula: `g(U) = 0 (U=${fmt(u)} < abort ${p.abort_threshold})` };
      }
      if (u >= p.saturation_threshold) {
        return { value: 1, formula: `g(U) = 1 (U=${fmt(u)} ≥ saturation ${p.saturation_threshold})` };
      }
      const value = clamp01(p.slope * u + p.offset);
      return { value, formula: `g(U) = ${p.slope}·${fmt(u)} + (${p.offset}) = ${fmt(value)}` };
    }

    case 'sigmoid': {
      const s = rubric.unit.sigmoid;
      if (u < s.x0) {
        return { value: 0, formula: `g(U) = 0 (U=${fmt(u)} < x0 ${s.x0})` };
      }
      const value = clamp01(1 - Math.exp(-s.k * (u - s.x0)));
      return { value, formula: `g(U) = 1 − e^(−${s.k}·(${fmt(u)} − ${s.x0})) = ${fmt(value)}` };
    }

    case 'insensitive':
      return { value: rubric.unit.insensitive_value, formula: `g(U) = ${rubric.unit.insensitive_value} (role not unit-sensitive)` };
  }
}

export function evaluateUnitLayer(input: LayerEvaluationInput): LayerScore {
  const rubric = input.config.rubric;
  const u = input.subject.context.unitQuality;
  const family = unitFamilyOf(rubric, input.subject.role);

  if (family === 'insensitive') {
    const { value, formula } = unitResponse(rubric, family, u);
    return createLayerScore({
      layer: 'UNIT',
      value,
      components: { U: u },
      rationale: `Role ${input.subject.role} is not sensitive to unit quality`,
      formula: `@u = ${formula}`,
      evidence: { family },
    });
  }

  const evidence = parseEvidenceSection('UNIT', 'unit', UnitEvidenceSchema, input.evidence.unit);
  const gates = rubric.unit.hard_gates;
  const snapshot = { family, unitQuality: u, ...evidence };

  if (evidence.structuralCompliance < gates.min_structural_compliance) {
    return createLayerScore({
      layer: 'UNIT',
      value: 0,
      components: { U: u, structural_compliance: evidence.structuralCompliance },
      rationale: `Hard gate min_structural_compliance: ${fmt(evidence.structuralCompliance)} < ${gates.min_structural_compliance}`,
      formula: '@u = 0 (hard gate)',
      evidence: snapshot,
      hardGate: 'min_structural_compliance',
    });
  }

  if (gates.require_indicator_matrix && !evidence.indicatorMatrixPresent) {
    return createLayerScore({
      layer: 'UNIT',
      value: 0,
      components: { U: u, structural_compliance: evidence.structuralCompliance },
      rationale: 'Hard gate require_indicator_matrix: indicator matrix absent',
      formula: '@u = 0 (hard gate)',
      evidence: snapshot,
      hardGate: 'require_indicator_matrix',
    });
  }

  const { value, formula } = unitResponse(rubric, family, u);
  return createLayerScore({
    layer: 'UNIT',
    value,
    components: { U: u, structural_compliance: evidence.structuralCompliance, g: value },
    rationale: `Unit quality ${fmt(u)} through ${family} response`,
    formula: `@u = ${formula}`,
    evidence: snapshot,
  });
}
