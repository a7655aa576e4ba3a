/**
 * CALIBRATION CONFIG CONTRACT: C2
 *
 * File schemas (zod) for the calibration configuration set, and the
 * resolved read-only shapes the engine receives after loading:
 *
 * - fusion_specification.json   → per-role Choquet weights
 * - layer_requirements.json     → per-role mandatory layers
 * - layer_rubric.json           → tiers / thresholds for every evaluator
 * - method_registry.json        → method declarations + interplay groups
 * - intrinsic_calibration.json  → @b registry values
 * - validation_policy.json      → decision thresholds
 */

import { z } from 'zod';
import {
  METHOD_ROLES,
  CanonicalLayer,
  MethodRole,
} from './calibration.contract.js';

// ═══════════════════════════════════════════════════════════════
// FILE SCHEMAS
// ═══════════════════════════════════════════════════════════════

const unit01 = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const roleEnum = z.enum(METHOD_ROLES);
const range = z.tuple([z.number(), z.number()]);

export const FusionFileSchema = z.object({
  version: z.string(),
  normalization_tolerance: z.number().positive().default(1e-6),
  roles: z.record(z.string(), z.object({
    linear_weights: z.record(z.string(), z.number()),
    interaction_weights: z.array(z.object({
      pair: z.tuple([z.string(), z.string()]),
      weight: z.number(),
      rationale: z.string().default(''),
    })).default([]),
  })),
});

export const RequirementsFileSchema = z.object({
  version: z.string(),
  roles: z.record(z.string(), z.array(z.string()).min(1)),
});

export const RubricFileSchema = z.object({
  version: z.string(),
  base: z.object({
    weights: z.object({ w_th: nonNegative, w_imp: nonNegative, w_dep: nonNegative }),
    fallbacks: z.object({ pending: unit01, none: unit01 }),
  }),
  chain: z.object({
    tiers: z.object({
      hard_mismatch: unit01,
      missing_beneficial: unit01,
      schema_deviation: unit01,
      warnings: unit01,
      clean: unit01,
    }),
  }),
  unit: z.object({
    identity: z.object({ roles: z.array(roleEnum) }),
    piecewise_linear: z.object({
      roles: z.array(roleEnum),
      abort_threshold: unit01,
      saturation_threshold: unit01,
      slope: nonNegative,
      offset: z.number(),
    }),
    sigmoid: z.object({
      roles: z.array(roleEnum),
      k: z.number().positive(),
      x0: unit01,
    }),
    insensitive_value: unit01,
    hard_gates: z.object({
      min_structural_compliance: unit01,
      require_indicator_matrix: z.boolean(),
    }),
  }),
  contextual: z.object({
    tiers: z.object({
      primary: unit01,
      secondary: unit01,
      compatible: unit01,
      undeclared: unit01,
      incompatible: unit01,
    }),
  }),
  congruence: z.object({
    alone: z.object({ registered: unit01, unregistered: unit01 }),
    scale: z.object({ same_range: unit01, convertible: unit01, incompatible: unit01 }),
    fusion: z.object({ complete: unit01, partial: unit01, undeclared: unit01 }),
    fusion_rules: z.array(z.string()).min(1),
  }),
  meta: z.object({
    weights: z.object({ transparency: nonNegative, governance: nonNegative, cost: nonNegative }),
    condition_tiers: z.object({ all: unit01, two: unit01, one: unit01, none: unit01 }),
    cost: z.object({
      runtime_ms: z.object({ fast: nonNegative, acceptable: nonNegative }),
      memory_mb: z.object({ fast: nonNegative, acceptable: nonNegative }),
      tiers: z.object({ fast: unit01, acceptable: unit01, slow: unit01 }),
    }),
  }),
});

export const COMPATIBILITY_TIERS = ['primary', 'secondary', 'compatible', 'incompatible'] as const;
export type CompatibilityTier = typeof COMPATIBILITY_TIERS[number];

const compatibilityTable = z.record(z.string(), z.enum(COMPATIBILITY_TIERS)).default({});

export const RegistryFileSchema = z.object({
  version: z.string(),
  domain: z.object({
    questions: z.array(z.string()).min(1),
    dimensions: z.array(z.string()).min(1),
    policies: z.array(z.string()).min(1),
  }),
  aliases: z.record(z.string(), z.string()).default({}),   // display id → catalogue id
  methods: z.record(z.string(), z.object({
    role: roleEnum,
    version: z.string(),
    declared_layers: z.array(z.string()).optional(),
    layer_justifications: z.record(z.string(), z.string()).default({}),
    compatibility: z.object({
      questions: compatibilityTable,
      dimensions: compatibilityTable,
      policies: compatibilityTable,
    }).default({}),
    signature: z.object({
      required_inputs: z.record(z.string(), z.string()).default({}),
      beneficial_inputs: z.array(z.string()).default([]),
    }).optional(),
    output_range: range.optional(),
    semantic_tags: z.array(z.string()).default([]),
    fusion_requirements: z.array(z.string()).default([]),
  })),
  interplays: z.record(z.string(), z.object({
    participants: z.array(z.string()).min(2),
    target_output: z.string(),
    target_range: range,
    fusion_rule: z.string().nullable().default(null),
    transforms: z.array(z.object({ from: range, to: range })).default([]),
  })).default({}),
});

export const INTRINSIC_STATUSES = ['computed', 'pending', 'excluded', 'none'] as const;
export type IntrinsicStatus = typeof INTRINSIC_STATUSES[number];

export const IntrinsicFileSchema = z.object({
  version: z.string(),
  methods: z.record(z.string(), z.object({
    status: z.enum(INTRINSIC_STATUSES),
    b_theory: unit01.optional(),
    b_impl: unit01.optional(),
    b_deploy: unit01.optional(),
    last_updated: z.string().optional(),
  })),
});

export const PolicyFileSchema = z.object({
  version: z.string(),
  role_thresholds: z.record(z.string(), unit01),
  method_thresholds: z.record(z.string(), unit01).default({}),
  conditional_band: unit01,
  layer_floor: unit01,
  plan_conditional_ratio: unit01,
  anti_universality_threshold: unit01,
  subject_timeout_ms: z.number().int().positive(),
});

export type FusionFile = z.infer<typeof FusionFileSchema>;
export type RequirementsFile = z.infer<typeof RequirementsFileSchema>;
export type RubricFile = z.infer<typeof RubricFileSchema>;
export type RegistryFile = z.infer<typeof RegistryFileSchema>;
export type IntrinsicFile = z.infer<typeof IntrinsicFileSchema>;
export type PolicyFile = z.infer<typeof PolicyFileSchema>;

/**
 * Raw (unparsed) contents of the six configuration files.
 */
export interface CalibrationConfigSources {
  fusion: unknown;
  requirements: unknown;
  rubric: unknown;
  registry: unknown;
  intrinsic: unknown;
  policy: unknown;
}

export type ConfigSourceKey = keyof CalibrationConfigSources;

export const CONFIG_SOURCE_KEYS: readonly ConfigSourceKey[] = [
  'fusion',
  'requirements',
  'rubric',
  'registry',
  'intrinsic',
  'policy',
];

export const CONFIG_FILES: Record<ConfigSourceKey, string> = {
  fusion: 'fusion_specification.json',
  requirements: 'layer_requirements.json',
  rubric: 'layer_rubric.json',
  registry: 'method_registry.json',
  intrinsic: 'intrinsic_calibration.json',
  policy: 'validation_policy.json',
};

// ═══════════════════════════════════════════════════════════════
// RESOLVED SHAPES
// ═══════════════════════════════════════════════════════════════

export type LayerWeights = Readonly<Partial<Record<CanonicalLayer, number>>>;

export interface InteractionTerm {
  readonly layerA: CanonicalLayer;
  readonly layerB: CanonicalLayer;
  readonly weight: number;
  readonly rationale: string;
}

export interface RoleFusionConfig {
  readonly role: MethodRole;
  readonly linearWeights: LayerWeights;
  readonly interactions: readonly InteractionTerm[];
  readonly totalWeight: number;
}

export interface FusionConfiguration {
  readonly version: string;
  readonly tolerance: number;
  readonly roles: Readonly<Record<MethodRole, RoleFusionConfig>>;
}

export type LayerRequirementProfile = Readonly<Record<MethodRole, readonly CanonicalLayer[]>>;

export interface MethodSignature {
  readonly requiredInputs: Readonly<Record<string, string>>;   // name → declared type
  readonly beneficialInputs: readonly string[];
}

export interface CompatibilityDeclaration {
  readonly questions: Readonly<Record<string, CompatibilityTier>>;
  readonly dimensions: Readonly<Record<string, CompatibilityTier>>;
  readonly policies: Readonly<Record<string, CompatibilityTier>>;
}

export interface MethodDeclaration {
  readonly methodId: string;
  readonly role: MethodRole;
  readonly version: string;
  readonly activeLayers: readonly CanonicalLayer[];
  readonly justifications: Readonly<Partial<Record<CanonicalLayer, string>>>;
  readonly compatibility: CompatibilityDeclaration;
  readonly signature: MethodSignature | null;
  readonly outputRange: readonly [number, number] | null;
  readonly semanticTags: readonly string[];
  readonly fusionRequirements: readonly string[];
}

export interface InterplayGroup {
  readonly interplayId: string;
  readonly participants: readonly string[];
  readonly targetOutput: string;
  readonly targetRange: readonly [number, number];
  readonly fusionRule: string | null;
  readonly transforms: ReadonlyArray<{ readonly from: readonly [number, number]; readonly to: readonly [number, number] }>;
}

export interface MethodRegistry {
  readonly version: string;
  readonly domain: {
    readonly questions: readonly string[];
    readonly dimensions: readonly string[];
    readonly policies: readonly string[];
  };
  readonly aliases: Readonly<Record<string, string>>;
  readonly methods: Readonly<Record<string, MethodDeclaration>>;
  readonly interplays: Readonly<Record<string, InterplayGroup>>;
}

export type LayerRubric = Readonly<RubricFile>;
export type ValidationPolicy = Readonly<PolicyFile> & {
  readonly roleThresholds: Readonly<Record<MethodRole, number>>;
};

export interface ConfigProvenance {
  readonly file: string;
  readonly version: string;
}

export interface LoadedCalibrationConfig {
  readonly fusion: FusionConfiguration;
  readonly requirements: LayerRequirementProfile;
  readonly rubric: LayerRubric;
  readonly registry: MethodRegistry;
  readonly intrinsic: Readonly<IntrinsicFile>;
  readonly policy: ValidationPolicy;
  readonly configHash: string;
  readonly provenance: Readonly<Record<ConfigSourceKey, ConfigProvenance>>;
  readonly loadedAt: string;
}
