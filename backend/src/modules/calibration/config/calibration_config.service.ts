/**
 * CALIBRATION CONFIG SERVICE: C6
 *
 * Loads the calibration configuration set once per process:
 * 1. Read + zod-parse every file
 * 2. Resolve layer symbols, validate weights, requirements, registry
 * 3. Anti-universality scan
 * 4. Hash (sha256 over canonical JSON) + deep-freeze
 *
 * Any violation → CalibrationConfigError listing all of them.
 * Concurrent first callers await the same load.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';

import {
  isMethodRole,
  layerFromSymbol,
  layerOrder,
  mapRoles,
  ownEntry,
  sortLayers,
  CanonicalLayer,
} from '../contracts/calibration.contract.js';
import {
  CONFIG_FILES,
  CONFIG_SOURCE_KEYS,
  FusionFileSchema,
  RequirementsFileSchema,
  RubricFileSchema,
  RegistryFileSchema,
  IntrinsicFileSchema,
  PolicyFileSchema,
  CalibrationConfigSources,
  ConfigSourceKey,
  FusionConfiguration,
  InteractionTerm,
  InterplayGroup,
  LayerRequirementProfile,
  LoadedCalibrationConfig,
  MethodDeclaration,
  MethodRegistry,
  RoleFusionConfig,
  ValidationPolicy,
  FusionFile,
  RequirementsFile,
  RubricFile,
  RegistryFile,
  PolicyFile,
  IntrinsicFile,
} from '../contracts/config.contract.js';
import { CalibrationConfigError } from '../contracts/calibration.errors.js';
import { deepFreeze, taggedHash } from '../certificate/canonical.js';
import { checkDeclaredLayers, requiredLayers } from './layer_requirements.rules.js';
import { checkAntiUniversality } from './anti_universality.rules.js';
import { checkAliases } from '../registry/method_id.rules.js';

const WEIGHT_TOLERANCE = 1e-6;

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

// <root>/config/calibration, from src or from dist/
export const DEFAULT_CONFIG_DIR = ['../../../../..', '../../../../../..']
  .map(up => path.resolve(MODULE_DIR, up, 'config/calibration'))
  .find(dir => fs.existsSync(dir)) ?? path.resolve(MODULE_DIR, '../../../../../config/calibration');

export function configDir(): string {
  return process.env.CALIBRATION_CONFIG_DIR || DEFAULT_CONFIG_DIR;
}

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

function parseFile<T extends z.ZodTypeAny>(key: ConfigSourceKey, schema: T, raw: unknown, violations: string[]): z.output<T> | null {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  for (const issue of result.error.issues) {
    const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    violations.push(`${CONFIG_FILES[key]}: ${at}: ${issue.message}`);
  }
  return null;
}

function resolveSymbol(symbol: string, where: string, violations: string[]): CanonicalLayer | null {
  const layer = layerFromSymbol(symbol);
  if (!layer) violations.push(`${where}: unknown layer symbol '${symbol}'`);
  return layer;
}

function checkRoleKeys(file: string, keys: string[], violations: string[]): void {
  for (const key of keys) {
    if (!isMethodRole(key)) {
      violations.push(`${file}: unknown role '${key}'`);
    }
  }
}

// ─────────────────────────────────────────────────────────────
// Fusion weights
// ─────────────────────────────────────────────────────────────

function resolveFusion(file: FusionFile, violations: string[]): FusionConfiguration {
  const name = CONFIG_FILES.fusion;
  checkRoleKeys(name, Object.keys(file.roles), violations);

  const roles = mapRoles((role): RoleFusionConfig => {
    const entry = file.roles[role];
    if (!entry) {
      violations.push(`${name}: role '${role}' has no fusion weights`);
      return { role, linearWeights: {}, interactions: [], totalWeight: 0 };
    }

    const linearWeights: Partial<Record<CanonicalLayer, number>> = {};
    let linearTotal = 0;
    for (const [symbol, weight] of Object.entries(entry.linear_weights)) {
      const layer = resolveSymbol(symbol, `${name}: ${role}`, violations);
      if (weight < 0) violations.push(`${name}: ${role}: negative weight ${weight} for ${symbol}`);
      if (layer) linearWeights[layer] = weight;
      linearTotal += weight;
    }

    const interactions: InteractionTerm[] = [];
    const pairs = new Map<string, string>();   // unordered pair → first declaration
    let interactionTotal = 0;
    for (const term of entry.interaction_weights) {
      const [a, b] = term.pair;
      const layerA = resolveSymbol(a, `${name}: ${role}`, violations);
      const layerB = resolveSymbol(b, `${name}: ${role}`, violations);
      if (term.weight < 0) violations.push(`${name}: ${role}: negative weight ${term.weight} for (${a},${b})`);
      if (layerA && layerB) {
        if (layerA === layerB) violations.push(`${name}: ${role}: interaction (${a},${b}) pairs a layer with itself`);
        const key = layerOrder(layerA) <= layerOrder(layerB) ? `${layerA}|${layerB}` : `${layerB}|${layerA}`;
        const first = pairs.get(key);
        if (first) {
          violations.push(`${name}: ${role}: interaction (${a},${b}) duplicates ${first}`);
        } else {
          pairs.set(key, `(${a},${b})`);
        }
        interactions.push({ layerA, layerB, weight: term.weight, rationale: term.rationale });
      }
      interactionTotal += term.weight;
    }

    const totalWeight = linearTotal + interactionTotal;
    if (Math.abs(totalWeight - 1) > file.normalization_tolerance) {
      violations.push(
        `${name}: ${role}: weights sum to ${totalWeight} (linear ${linearTotal} + interaction ${interactionTotal}), ` +
        `expected 1 ± ${file.normalization_tolerance}`
      );
    }

    return { role, linearWeights, interactions, totalWeight };
  });

  return { version: file.version, tolerance: file.normalization_tolerance, roles };
}

// ─────────────────────────────────────────────────────────────
// Requirements
// ─────────────────────────────────────────────────────────────

function resolveRequirements(file: RequirementsFile, violations: string[]): LayerRequirementProfile {
  const name = CONFIG_FILES.requirements;
  checkRoleKeys(name, Object.keys(file.roles), violations);

  const profile = mapRoles((role): readonly CanonicalLayer[] => {
    const symbols = file.roles[role];
    if (!symbols) {
      violations.push(`${name}: role '${role}' has no required layers`);
      return ['BASE'];
    }
    const layers: CanonicalLayer[] = [];
    for (const symbol of symbols) {
      const layer = resolveSymbol(symbol, `${name}: ${role}`, violations);
      if (layer) layers.push(layer);
    }
    if (!layers.includes('BASE')) {
      violations.push(`${name}: role '${role}' must require @b`);
    }
    return sortLayers(layers);
  });
  return profile;
}

// ─────────────────────────────────────────────────────────────
// Rubric
// ─────────────────────────────────────────────────────────────

/**
 * Tiers listed worst → best must not decrease.
 */
function checkAscending(
  family: string,
  tiers: ReadonlyArray<readonly [string, number]>,
  violations: string[]
): void {
  for (let i = 1; i < tiers.length; i++) {
    const [prevName, prev] = tiers[i - 1];
    const [tierName, value] = tiers[i];
    if (value < prev) {
      violations.push(`${CONFIG_FILES.rubric}: ${family} tier '${tierName}' (${value}) is below '${prevName}' (${prev})`);
    }
  }
}

function checkRubric(rubric: RubricFile, violations: string[]): void {
  const name = CONFIG_FILES.rubric;
  const base = rubric.base.weights;
  const baseSum = base.w_th + base.w_imp + base.w_dep;
  if (Math.abs(baseSum - 1) > WEIGHT_TOLERANCE) {
    violations.push(`${name}: base weights sum to ${baseSum}, expected 1`);
  }

  const meta = rubric.meta.weights;
  const metaSum = meta.transparency + meta.governance + meta.cost;
  if (Math.abs(metaSum - 1) > WEIGHT_TOLERANCE) {
    violations.push(`${name}: meta weights sum to ${metaSum}, expected 1`);
  }

  const ramp = rubric.unit.piecewise_linear;
  if (ramp.abort_threshold > ramp.saturation_threshold) {
    violations.push(`${name}: piecewise_linear abort_threshold exceeds saturation_threshold`);
  }

  const seen = new Map<string, string>();
  const families = {
    identity: rubric.unit.identity.roles,
    piecewise_linear: rubric.unit.piecewise_linear.roles,
    sigmoid: rubric.unit.sigmoid.roles,
  };
  for (const [family, roles] of Object.entries(families)) {
    for (const role of roles) {
      const prior = seen.get(role);
      if (prior) violations.push(`${name}: role '${role}' assigned to both ${prior} and ${family}`);
      seen.set(role, family);
    }
  }

  const cost = rubric.meta.cost;
  if (cost.runtime_ms.fast > cost.runtime_ms.acceptable || cost.memory_mb.fast > cost.memory_mb.acceptable) {
    violations.push(`${name}: meta cost 'fast' limits must not exceed 'acceptable' limits`);
  }

  const chain = rubric.chain.tiers;
  checkAscending('chain', [
    ['hard_mismatch', chain.hard_mismatch],
    ['missing_beneficial', chain.missing_beneficial],
    ['schema_deviation', chain.schema_deviation],
    ['warnings', chain.warnings],
    ['clean', chain.clean],
  ], violations);

  const contextual = rubric.contextual.tiers;
  checkAscending('contextual', [
    ['incompatible', contextual.incompatible],
    ['undeclared', contextual.undeclared],
    ['compatible', contextual.compatible],
    ['secondary', contextual.secondary],
    ['primary', contextual.primary],
  ], violations);

  const conditions = rubric.meta.condition_tiers;
  checkAscending('meta condition', [
    ['none', conditions.none],
    ['one', conditions.one],
    ['two', conditions.two],
    ['all', conditions.all],
  ], violations);

  checkAscending('meta cost', [
    ['slow', cost.tiers.slow],
    ['acceptable', cost.tiers.acceptable],
    ['fast', cost.tiers.fast],
  ], violations);
}

// ─────────────────────────────────────────────────────────────
// Method registry
// ─────────────────────────────────────────────────────────────

function resolveRegistry(
  file: RegistryFile,
  profile: LayerRequirementProfile,
  violations: string[]
): MethodRegistry {
  const name = CONFIG_FILES.registry;
  const methods: Record<string, MethodDeclaration> = {};

  for (const methodId of Object.keys(file.methods).sort()) {
    const entry = file.methods[methodId];
    const where = `${name}: ${methodId}`;

    const declaredSymbols = entry.declared_layers;
    const activeLayers = declaredSymbols
      ? sortLayers(declaredSymbols.flatMap(s => {
          const layer = resolveSymbol(s, where, violations);
          return layer ? [layer] : [];
        }))
      : requiredLayers(profile, entry.role);

    const justifications: Partial<Record<CanonicalLayer, string>> = {};
    for (const [symbol, text] of Object.entries(entry.layer_justifications)) {
      const layer = resolveSymbol(symbol, `${where} justification`, violations);
      if (layer) justifications[layer] = text;
    }

    violations.push(...checkDeclaredLayers(methodId, entry.role, { activeLayers, justifications }, profile));

    const axes = [
      ['questions', file.domain.questions],
      ['dimensions', file.domain.dimensions],
      ['policies', file.domain.policies],
    ] as const;
    for (const [axis, domainValues] of axes) {
      for (const key of Object.keys(entry.compatibility[axis])) {
        if (!domainValues.includes(key)) {
          violations.push(`${where}: compatibility ${axis} key '${key}' is not in the configured domain`);
        }
      }
    }

    methods[methodId] = {
      methodId,
      role: entry.role,
      version: entry.version,
      activeLayers,
      justifications,
      compatibility: entry.compatibility,
      signature: entry.signature
        ? { requiredInputs: entry.signature.required_inputs, beneficialInputs: entry.signature.beneficial_inputs }
        : null,
      outputRange: entry.output_range ?? null,
      semanticTags: entry.semantic_tags,
      fusionRequirements: entry.fusion_requirements,
    };
  }

  const interplays: Record<string, InterplayGroup> = {};
  for (const interplayId of Object.keys(file.interplays).sort()) {
    const entry = file.interplays[interplayId];
    const unregistered = entry.participants.filter(p => !ownEntry(methods, p));
    if (unregistered.length > 0) {
      console.warn(`[Calibration Config] Interplay ${interplayId} has unregistered participants: ${unregistered.join(', ')}`);
    }
    interplays[interplayId] = {
      interplayId,
      participants: entry.participants,
      targetOutput: entry.target_output,
      targetRange: entry.target_range,
      fusionRule: entry.fusion_rule,
      transforms: entry.transforms,
    };
  }

  violations.push(...checkAliases(name, file.aliases, methods));

  return {
    version: file.version,
    domain: file.domain,
    aliases: file.aliases,
    methods,
    interplays,
  };
}

function checkIntrinsic(file: IntrinsicFile, violations: string[]): void {
  const name = CONFIG_FILES.intrinsic;
  for (const [methodId, entry] of Object.entries(file.methods)) {
    if (entry.status !== 'computed') continue;
    const missing = (['b_theory', 'b_impl', 'b_deploy'] as const).filter(k => entry[k] === undefined);
    if (missing.length > 0) {
      violations.push(`${name}: ${methodId} is computed but lacks ${missing.join(', ')}`);
    }
  }
}

function resolvePolicy(file: PolicyFile, violations: string[]): ValidationPolicy {
  const name = CONFIG_FILES.policy;
  checkRoleKeys(name, Object.keys(file.role_thresholds), violations);

  const roleThresholds = mapRoles((role): number => {
    const threshold = file.role_thresholds[role];
    if (threshold === undefined) {
      violations.push(`${name}: role '${role}' has no threshold`);
      return 1;
    }
    return threshold;
  });
  return { ...file, roleThresholds };
}

// ═══════════════════════════════════════════════════════════════
// RESOLVE
// ═══════════════════════════════════════════════════════════════

/**
 * Validate raw file contents and build the frozen configuration.
 * Throws CalibrationConfigError carrying every violation found.
 */
export function resolveCalibrationConfig(sources: CalibrationConfigSources): LoadedCalibrationConfig {
  const violations: string[] = [];

  const fusionFile = parseFile('fusion', FusionFileSchema, sources.fusion, violations);
  const requirementsFile = parseFile('requirements', RequirementsFileSchema, sources.requirements, violations);
  const rubric = parseFile('rubric', RubricFileSchema, sources.rubric, violations);
  const registryFile = parseFile('registry', RegistryFileSchema, sources.registry, violations);
  const intrinsic = parseFile('intrinsic', IntrinsicFileSchema, sources.intrinsic, violations);
  const policyFile = parseFile('policy', PolicyFileSchema, sources.policy, violations);

  if (!fusionFile || !requirementsFile || !rubric || !registryFile || !intrinsic || !policyFile) {
    throw new CalibrationConfigError(violations);
  }

  const fusion = resolveFusion(fusionFile, violations);
  const requirements = resolveRequirements(requirementsFile, violations);
  checkRubric(rubric, violations);
  const registry = resolveRegistry(registryFile, requirements, violations);
  checkIntrinsic(intrinsic, violations);
  const policy = resolvePolicy(policyFile, violations);
  violations.push(...checkAntiUniversality(rubric, registry, policy.anti_universality_threshold));

  if (violations.length > 0) {
    throw new CalibrationConfigError(violations);
  }

  const provenance = {
    fusion: { file: CONFIG_FILES.fusion, version: fusionFile.version },
    requirements: { file: CONFIG_FILES.requirements, version: requirementsFile.version },
    rubric: { file: CONFIG_FILES.rubric, version: rubric.version },
    registry: { file: CONFIG_FILES.registry, version: registryFile.version },
    intrinsic: { file: CONFIG_FILES.intrinsic, version: intrinsic.version },
    policy: { file: CONFIG_FILES.policy, version: policyFile.version },
  };

  const configHash = taggedHash({
    [CONFIG_FILES.fusion]: sources.fusion,
    [CONFIG_FILES.requirements]: sources.requirements,
    [CONFIG_FILES.rubric]: sources.rubric,
    [CONFIG_FILES.registry]: sources.registry,
    [CONFIG_FILES.intrinsic]: sources.intrinsic,
    [CONFIG_FILES.policy]: sources.policy,
  });

  return deepFreeze({
    fusion,
    requirements,
    rubric,
    registry,
    intrinsic,
    policy,
    configHash,
    provenance,
    loadedAt: new Date().toISOString(),
  });
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

async function readJson(file: string): Promise<unknown> {
  const text = await fs.promises.readFile(file, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new CalibrationConfigError(`${path.basename(file)}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
}

export async function readConfigSources(dir: string = configDir()): Promise<CalibrationConfigSources> {
  const entries = await Promise.all(CONFIG_SOURCE_KEYS.map(async key => {
    const file = path.join(dir, CONFIG_FILES[key]);
    if (!fs.existsSync(file)) {
      throw new CalibrationConfigError(`${CONFIG_FILES[key]}: not found in ${dir}`);
    }
    return [key, await readJson(file)] as const;
  }));

  const sources: CalibrationConfigSources = {
    fusion: undefined,
    requirements: undefined,
    rubric: undefined,
    registry: undefined,
    intrinsic: undefined,
    policy: undefined,
  };
  for (const [key, value] of entries) sources[key] = value;
  return sources;
}

export async function loadCalibrationConfig(dir: string = configDir()): Promise<LoadedCalibrationConfig> {
  const sources = await readConfigSources(dir);
  const config = resolveCalibrationConfig(sources);
  console.log(
    `[Calibration Config] Loaded from ${dir}: ${Object.keys(config.registry.methods).length} methods, ` +
    `${Object.keys(config.registry.interplays).length} interplays, hash ${config.configHash.slice(0, 19)}`
  );
  return config;
}

// ═══════════════════════════════════════════════════════════════
// SINGLETON
// ═══════════════════════════════════════════════════════════════

let configPromise: Promise<LoadedCalibrationConfig> | null = null;

export function getCalibrationConfig(): Promise<LoadedCalibrationConfig> {
  if (!configPromise) {
    configPromise = loadCalibrationConfig().catch((error: unknown) => {
      configPromise = null;
      throw error;
    });
  }
  return configPromise;
}

export function resetCalibrationConfig(): void {
  configPromise = null;
}
