/**
 * LAYER REQUIREMENT RULES
 *
 * role → mandatory layers; declared layers must cover them
 * unless every gap carries a non-empty justification.
 */

import {
  sortLayers,
  layerSymbol,
  CanonicalLayer,
  MethodRole,
} from '../contracts/calibration.contract.js';
import type {
  LayerRequirementProfile,
  LoadedCalibrationConfig,
  MethodDeclaration,
} from '../contracts/config.contract.js';

export function requiredLayers(profile: LayerRequirementProfile, role: MethodRole): readonly CanonicalLayer[] {
  return profile[role];
}

/**
 * Active layers for one call: the declared set, or the role's
 * required set when the method is not registered.
 */
export function resolveActiveLayers(
  config: LoadedCalibrationConfig,
  role: MethodRole,
  declaration: MethodDeclaration | null
): readonly CanonicalLayer[] {
  return declaration ? declaration.activeLayers : requiredLayers(config.requirements, role);
}

export interface LayerCoverage {
  readonly missing: CanonicalLayer[];      // required, inactive, unjustified
  readonly justified: CanonicalLayer[];    // required, inactive, justified
}

export function layerCoverage(
  required: readonly CanonicalLayer[],
  active: readonly CanonicalLayer[],
  justifications: Readonly<Partial<Record<CanonicalLayer, string>>>
): LayerCoverage {
  const activeSet = new Set(active);
  const missing: CanonicalLayer[] = [];
  const justified: CanonicalLayer[] = [];

  for (const layer of sortLayers(required)) {
    if (activeSet.has(layer)) continue;
    const reason = justifications[layer];
    if (reason !== undefined && reason.trim().length > 0) {
      justified.push(layer);
    } else {
      missing.push(layer);
    }
  }
  return { missing, justified };
}

/**
 * Load-time check for one registered method.
 */
export function checkDeclaredLayers(
  methodId: string,
  role: MethodRole,
  declaration: Pick<MethodDeclaration, 'activeLayers' | 'justifications'>,
  profile: LayerRequirementProfile
): string[] {
  const { missing } = layerCoverage(requiredLayers(profile, role), declaration.activeLayers, declaration.justifications);
  return missing.map(layer =>
    `${methodId} (${role}) omits required layer ${layerSymbol(layer)} without a justification`
  );
}
