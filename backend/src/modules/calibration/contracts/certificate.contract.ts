/**
 * CALIBRATION CERTIFICATE CONTRACT: C4
 *
 * Immutable audit record of one calibration call.
 * Discriminated on `status`:
 *   CALIBRATED → full fusion trace
 *   SKIPPED    → registry exclusion or timeout
 *   REJECTED   → evidence error, worst-case score
 *   FAILED     → calibration raised (registry I/O, fusion bounds), worst-case score
 */

import type {
  CanonicalLayer,
  CalibrationSubject,
  LayerScore,
} from './calibration.contract.js';

// ═══════════════════════════════════════════════════════════════
// FUSION TRACE
// ═══════════════════════════════════════════════════════════════

export interface FusionTraceTerm {
  readonly kind: 'linear' | 'interaction';
  readonly term: string;                        // '@b' or 'min(@u,@chain)'
  readonly layers: readonly CanonicalLayer[];
  readonly weight: number;
  readonly value: number;                       // layer value, or the pair min
  readonly contribution: number;                // weight · value
}

export interface FusionResult {
  readonly linearSum: number;
  readonly interactionSum: number;
  readonly finalScore: number;
  readonly activeLayers: readonly CanonicalLayer[];
  readonly trace: readonly FusionTraceTerm[];
  readonly symbolic: string;
  readonly expanded: string;
}

export interface InteractionContribution {
  readonly layerA: CanonicalLayer;
  readonly layerB: CanonicalLayer;
  readonly weight: number;
  readonly valueA: number;
  readonly valueB: number;
  readonly minValue: number;
  readonly contribution: number;
  readonly formula: string;
  readonly interpretation: string;
  readonly rationale: string;
}

// ═══════════════════════════════════════════════════════════════
// AUDIT SECTIONS
// ═══════════════════════════════════════════════════════════════

export interface ParameterProvenanceEntry {
  readonly parameter: string;
  readonly value: number | string;
  readonly source: string;
  readonly version: string;
}

export interface CheckResult {
  readonly passed: boolean;
  readonly detail: string;
}

export interface ValidationChecks {
  readonly boundedness: CheckResult;
  readonly normalization: CheckResult;
  readonly completeness: CheckResult & { readonly missing: readonly CanonicalLayer[] };
}

export interface LayerSensitivity {
  readonly layer: CanonicalLayer;
  readonly weight: number;
  readonly value: number;
  readonly loss: number;                         // weight · (1 − value)
}

export interface InteractionSensitivity {
  readonly pair: readonly [CanonicalLayer, CanonicalLayer];
  readonly weight: number;
  readonly minValue: number;
  readonly loss: number;                         // weight · (1 − min)
}

export interface SensitivityAnalysis {
  readonly mostImpactfulLayer: LayerSensitivity | null;
  readonly mostImpactfulInteraction: InteractionSensitivity | null;
}

// ═══════════════════════════════════════════════════════════════
// CERTIFICATE UNION
// ═══════════════════════════════════════════════════════════════

export type CertificateStatus = 'CALIBRATED' | 'SKIPPED' | 'REJECTED' | 'FAILED';
export type SkipCause = 'excluded' | 'timeout';

interface CertificateBase {
  readonly status: CertificateStatus;
  readonly instanceId: string;
  readonly subject: CalibrationSubject;
  readonly configHash: string;
  readonly timestamp: string;
  readonly validatorVersion: string;
  readonly certificateHash: string;
}

export interface CalibratedCertificate extends CertificateBase {
  readonly status: 'CALIBRATED';
  readonly methodVersion: string | null;
  readonly layerScores: readonly LayerScore[];
  readonly interactions: readonly InteractionContribution[];
  readonly linearSum: number;
  readonly interactionSum: number;
  readonly finalScore: number;
  readonly fusion: {
    readonly symbolic: string;
    readonly expanded: string;
    readonly trace: readonly FusionTraceTerm[];
  };
  readonly provenance: readonly ParameterProvenanceEntry[];
  readonly checks: ValidationChecks;
  readonly sensitivity: SensitivityAnalysis;
  readonly graphHash: string;
}

export interface SkippedCertificate extends CertificateBase {
  readonly status: 'SKIPPED';
  readonly skipCause: SkipCause;
  readonly detail: string;
}

export interface RejectedCertificate extends CertificateBase {
  readonly status: 'REJECTED';
  readonly finalScore: 0;
  readonly evidenceError: {
    readonly layer: CanonicalLayer;
    readonly field: string;
    readonly message: string;
  };
}

export interface FailedCertificate extends CertificateBase {
  readonly status: 'FAILED';
  readonly finalScore: 0;
  readonly error: string;
}

export type CalibrationCertificate =
  | CalibratedCertificate
  | SkippedCertificate
  | RejectedCertificate
  | FailedCertificate;

// ═══════════════════════════════════════════════════════════════
// EXPORTED RECORD (snake_case boundary format)
// ═══════════════════════════════════════════════════════════════

export interface ExportedLayerEntry {
  readonly layer: string;
  readonly score: number;
  readonly weight: number;
  readonly contribution: number;
  readonly components: Readonly<Record<string, number>>;
  readonly rationale: string;
  readonly formula: string;
  readonly evidence: Readonly<Record<string, unknown>>;
  readonly hard_gate: string | null;
}

export interface ExportedInteractionEntry {
  readonly layers: readonly [string, string];
  readonly weight: number;
  readonly min_value: number;
  readonly contribution: number;
  readonly formula: string;
  readonly interpretation: string;
}

export interface ExportedAuditTrail {
  readonly timestamp: string;
  readonly config_hash: string;
  readonly graph_hash: string | null;
  readonly validator_version: string;
  readonly certificate_hash: string;
}

export interface ExportedCertificate {
  readonly status: CertificateStatus;
  readonly instance_id: string;
  readonly method: string;
  readonly node: string;
  readonly role: string;
  readonly context: {
    readonly question: string;
    readonly dimension: string;
    readonly policy: string;
    readonly unit_quality: number;
  };
  readonly calibration_score: number | null;
  readonly layer_breakdown: Readonly<Record<string, ExportedLayerEntry>>;              // keyed by '@u'
  readonly interaction_breakdown: Readonly<Record<string, ExportedInteractionEntry>>;  // keyed by '(@u,@chain)'
  readonly fusion_formula: {
    readonly symbolic: string;
    readonly expanded: string;
    readonly computation_trace: ReadonlyArray<{
      readonly kind: 'linear' | 'interaction';
      readonly term: string;
      readonly weight: number;
      readonly value: number;
      readonly contribution: number;
    }>;
  } | null;
  readonly parameter_provenance: readonly ParameterProvenanceEntry[];
  readonly validation_checks: {
    readonly boundedness: boolean;
    readonly normalization: boolean;
    readonly completeness: boolean;
  } | null;
  readonly sensitivity_analysis: {
    readonly most_impactful_layer: string | null;
    readonly most_impactful_interaction: readonly [string, string] | null;
  } | null;
  readonly skip_cause: SkipCause | null;
  readonly evidence_error: { readonly layer: string; readonly field: string } | null;
  readonly calibration_error: string | null;
  readonly audit_trail: ExportedAuditTrail;
}

export interface CertificateVerification {
  readonly valid: boolean;
  readonly scoreReproduced: boolean;
  readonly hashMatches: boolean;
  readonly issues: readonly string[];
}
