/**
 * CERTIFICATE BUILDER: C7
 *
 * Packages one calibration call into an immutable, self-verifying record.
 *
 * certificateHash = sha256 over the canonical exported record
 * (everything except the hash itself), so the exported form verifies
 * without access to the engine.
 */

import { z } from 'zod';
import {
  VALIDATOR_VERSION,
  instanceIdOf,
  layerSymbol,
  fmt,
  CalibrationSubject,
  CanonicalLayer,
  LayerScore,
} from '../contracts/calibration.contract.js';
import type {
  LoadedCalibrationConfig,
  MethodDeclaration,
} from '../contracts/config.contract.js';
import type { IntrinsicRecord } from '../contracts/registry.contract.js';
import type {
  CalibratedCertificate,
  CalibrationCertificate,
  CertificateVerification,
  FailedCertificate,
  ExportedAuditTrail,
  ExportedCertificate,
  ExportedInteractionEntry,
  ExportedLayerEntry,
  FusionResult,
  FusionTraceTerm,
  ParameterProvenanceEntry,
  RejectedCertificate,
  SensitivityAnalysis,
  SkipCause,
  SkippedCertificate,
  ValidationChecks,
} from '../contracts/certificate.contract.js';
import type { EvidenceError } from '../contracts/calibration.errors.js';
import { deepFreeze, taggedHash } from './canonical.js';
import { interactionContributions, sumContributions } from '../fusion/choquet_fusion.service.js';
import { layerCoverage, requiredLayers } from '../config/layer_requirements.rules.js';

type UnsignedExport = Omit<ExportedCertificate, 'audit_trail'> & {
  readonly audit_trail: Omit<ExportedAuditTrail, 'certificate_hash'>;
};

// ═══════════════════════════════════════════════════════════════
// SENSITIVITY
// ═══════════════════════════════════════════════════════════════

/**
 * Largest score loss against a perfect score, per term kind.
 * Ties keep the first term in trace (canonical) order.
 */
export function computeSensitivity(trace: readonly FusionTraceTerm[]): SensitivityAnalysis {
  let layer: SensitivityAnalysis['mostImpactfulLayer'] = null;
  let interaction: SensitivityAnalysis['mostImpactfulInteraction'] = null;

  for (const term of trace) {
    const loss = term.weight * (1 - term.value);
    if (term.kind === 'linear') {
      if (term.weight > 0 && (layer === null || loss > layer.loss)) {
        layer = { layer: term.layers[0], weight: term.weight, value: term.value, loss };
      }
    } else {
      const [a, b] = term.layers;
      if (term.weight > 0 && (interaction === null || loss > interaction.loss)) {
        interaction = { pair: [a, b], weight: term.weight, minValue: term.value, loss };
      }
    }
  }

  return { mostImpactfulLayer: layer, mostImpactfulInteraction: interaction };
}

// ═══════════════════════════════════════════════════════════════
// CHECKS + PROVENANCE
// ═══════════════════════════════════════════════════════════════

function buildChecks(
  config: LoadedCalibrationConfig,
  subject: CalibrationSubject,
  declaration: MethodDeclaration | null,
  fusion: FusionResult
): ValidationChecks {
  const roleFusion = config.fusion.roles[subject.role];
  const deviation = Math.abs(roleFusion.totalWeight - 1);
  const coverage = layerCoverage(
    requiredLayers(config.requirements, subject.role),
    fusion.activeLayers,
    declaration?.justifications ?? {}
  );

  const justifiedNote = coverage.justified.length > 0
    ? `; justified omissions: ${coverage.justified.map(layerSymbol).join(', ')}`
    : '';

  return {
    boundedness: {
      passed: fusion.finalScore >= 0 && fusion.finalScore <= 1,
      detail: `0 ≤ ${fmt(fusion.finalScore)} ≤ 1`,
    },
    normalization: {
      passed: deviation <= config.fusion.tolerance,
      detail: `Σ weights(${subject.role}) = ${roleFusion.totalWeight}`,
    },
    completeness: {
      passed: coverage.missing.length === 0,
      missing: coverage.missing,
      detail: coverage.missing.length === 0
        ? `all required layers for ${subject.role} evaluated${justifiedNote}`
        : `missing required layers: ${coverage.missing.map(layerSymbol).join(', ')}`,
    },
  };
}

function buildProvenance(
  config: LoadedCalibrationConfig,
  subject: CalibrationSubject,
  declaration: MethodDeclaration | null,
  intrinsic: IntrinsicRecord,
  fusion: FusionResult
): ParameterProvenanceEntry[] {
  const { provenance } = config;
  const entries: ParameterProvenanceEntry[] = fusion.trace.map(term => ({
    parameter: `fusion.${subject.role}.${term.term}`,
    value: term.weight,
    source: provenance.fusion.file,
    version: provenance.fusion.version,
  }));

  entries.push(
    {
      parameter: `requirements.${subject.role}`,
      value: requiredLayers(config.requirements, subject.role).map(layerSymbol).join(','),
      source: provenance.requirements.file,
      version: provenance.requirements.version,
    },
    {
      parameter: 'rubric.layers',
      value: fusion.activeLayers.map(layerSymbol).join(','),
      source: provenance.rubric.file,
      version: provenance.rubric.version,
    },
    {
      parameter: `registry.${subject.methodId}`,
      value: declaration ? declaration.version : 'unregistered',
      source: provenance.registry.file,
      version: provenance.registry.version,
    },
    {
      parameter: `intrinsic.${subject.methodId}`,
      value: intrinsic.status,
      source: intrinsic.source,
      version: intrinsic.version,
    },
    {
      parameter: `threshold.${subject.role}`,
      value: config.policy.roleThresholds[subject.role],
      source: provenance.policy.file,
      version: provenance.policy.version,
    }
  );
  return entries;
}

// ═══════════════════════════════════════════════════════════════
// EXPORT
// ═══════════════════════════════════════════════════════════════

function subjectFields(subject: CalibrationSubject) {
  return {
    instance_id: instanceIdOf(subject),
    method: subject.methodId,
    node: subject.nodeId,
    role: subject.role,
    context: {
      question: subject.context.questionId,
      dimension: subject.context.dimension,
      policy: subject.context.policyArea,
      unit_quality: subject.context.unitQuality,
    },
  };
}

function pairKey(a: CanonicalLayer, b: CanonicalLayer): string {
  return `(${layerSymbol(a)},${layerSymbol(b)})`;
}

function unsignedExport(certificate: CalibrationCertificate): UnsignedExport {
  const base = subjectFields(certificate.subject);

  switch (certificate.status) {
    case 'CALIBRATED': {
      const trace = certificate.fusion.trace;
      const weightOf = (layer: CanonicalLayer): number =>
        trace.find(t => t.kind === 'linear' && t.layers[0] === layer)?.weight ?? 0;
      const { mostImpactfulLayer, mostImpactfulInteraction } = certificate.sensitivity;

      return {
        status: 'CALIBRATED',
        ...base,
        calibration_score: certificate.finalScore,
        layer_breakdown: Object.fromEntries(certificate.layerScores.map((score): [string, ExportedLayerEntry] => {
          const weight = weightOf(score.layer);
          return [layerSymbol(score.layer), {
            layer: score.layer,
            score: score.value,
            weight,
            contribution: weight * score.value,
            components: score.components,
            rationale: score.rationale,
            formula: score.formula,
            evidence: score.evidence,
            hard_gate: score.hardGate ?? null,
          }];
        })),
        interaction_breakdown: Object.fromEntries(certificate.interactions.map((i): [string, ExportedInteractionEntry] => [
          pairKey(i.layerA, i.layerB),
          {
            layers: [layerSymbol(i.layerA), layerSymbol(i.layerB)],
            weight: i.weight,
            min_value: i.minValue,
            contribution: i.contribution,
            formula: i.formula,
            interpretation: i.interpretation,
          },
        ])),
        fusion_formula: {
          symbolic: certificate.fusion.symbolic,
          expanded: certificate.fusion.expanded,
          computation_trace: certificate.fusion.trace.map(t => ({
            kind: t.kind,
            term: t.term,
            weight: t.weight,
            value: t.value,
            contribution: t.contribution,
          })),
        },
        parameter_provenance: certificate.provenance,
        validation_checks: {
          boundedness: certificate.checks.boundedness.passed,
          normalization: certificate.checks.normalization.passed,
          completeness: certificate.checks.completeness.passed,
        },
        sensitivity_analysis: {
          most_impactful_layer: mostImpactfulLayer ? layerSymbol(mostImpactfulLayer.layer) : null,
          most_impactful_interaction: mostImpactfulInteraction
            ? [layerSymbol(mostImpactfulInteraction.pair[0]), layerSymbol(mostImpactfulInteraction.pair[1])]
            : null,
        },
        skip_cause: null,
        evidence_error: null,
        calibration_error: null,
        audit_trail: {
          timestamp: certificate.timestamp,
          config_hash: certificate.configHash,
          graph_hash: certificate.graphHash,
          validator_version: certificate.validatorVersion,
        },
      };
    }

    case 'SKIPPED':
    case 'REJECTED':
    case 'FAILED':
      return {
        status: certificate.status,
        ...base,
        calibration_score: certificate.status === 'SKIPPED' ? null : certificate.finalScore,
        layer_breakdown: {},
        interaction_breakdown: {},
        fusion_formula: null,
        parameter_provenance: [],
        validation_checks: null,
        sensitivity_analysis: null,
        skip_cause: certificate.status === 'SKIPPED' ? certificate.skipCause : null,
        evidence_error: certificate.status === 'REJECTED'
          ? { layer: layerSymbol(certificate.evidenceError.layer), field: certificate.evidenceError.field }
          : null,
        calibration_error: certificate.status === 'FAILED' ? certificate.error : null,
        audit_trail: {
          timestamp: certificate.timestamp,
          config_hash: certificate.configHash,
          graph_hash: null,
          validator_version: certificate.validatorVersion,
        },
      };
  }
}

/**
 * Render the snake_case boundary record.
 */
export function exportCertificate(certificate: CalibrationCertificate): ExportedCertificate {
  const unsigned = unsignedExport(certificate);
  return deepFreeze({
    ...unsigned,
    audit_trail: { ...unsigned.audit_trail, certificate_hash: certificate.certificateHash },
  });
}

function sign<T extends CalibrationCertificate>(certificate: T): T {
  return deepFreeze({ ...certificate, certificateHash: taggedHash(unsignedExport(certificate)) });
}

// ═══════════════════════════════════════════════════════════════
// BUILDERS
// ═══════════════════════════════════════════════════════════════

export interface CalibratedCertificateInput {
  subject: CalibrationSubject;
  config: LoadedCalibrationConfig;
  declaration: MethodDeclaration | null;
  intrinsic: IntrinsicRecord;
  layerScores: readonly LayerScore[];
  fusion: FusionResult;
}

export function buildCalibratedCertificate(input: CalibratedCertificateInput): CalibratedCertificate {
  const { subject, config, declaration, intrinsic, layerScores, fusion } = input;
  const roleFusion = config.fusion.roles[subject.role];

  const graphHash = taggedHash({
    instance: instanceIdOf(subject),
    role: subject.role,
    layers: fusion.activeLayers.map(layerSymbol),
    terms: fusion.trace.map(t => t.term),
  });

  return sign<CalibratedCertificate>({
    status: 'CALIBRATED',
    instanceId: instanceIdOf(subject),
    subject,
    methodVersion: declaration?.version ?? null,
    layerScores: [...layerScores],
    interactions: interactionContributions(roleFusion, fusion.trace),
    linearSum: fusion.linearSum,
    interactionSum: fusion.interactionSum,
    finalScore: fusion.finalScore,
    fusion: { symbolic: fusion.symbolic, expanded: fusion.expanded, trace: fusion.trace },
    provenance: buildProvenance(config, subject, declaration, intrinsic, fusion),
    checks: buildChecks(config, subject, declaration, fusion),
    sensitivity: computeSensitivity(fusion.trace),
    configHash: config.configHash,
    graphHash,
    timestamp: subject.asOf,
    validatorVersion: VALIDATOR_VERSION,
    certificateHash: '',
  });
}

export function buildSkippedCertificate(
  subject: CalibrationSubject,
  skipCause: SkipCause,
  detail: string,
  configHash: string
): SkippedCertificate {
  return sign<SkippedCertificate>({
    status: 'SKIPPED',
    instanceId: instanceIdOf(subject),
    subject,
    skipCause,
    detail,
    configHash,
    timestamp: subject.asOf,
    validatorVersion: VALIDATOR_VERSION,
    certificateHash: '',
  });
}

export function buildRejectedCertificate(
  subject: CalibrationSubject,
  error: EvidenceError,
  configHash: string
): RejectedCertificate {
  return sign<RejectedCertificate>({
    status: 'REJECTED',
    instanceId: instanceIdOf(subject),
    subject,
    finalScore: 0,
    evidenceError: { layer: error.layer, field: error.field, message: error.message },
    configHash,
    timestamp: subject.asOf,
    validatorVersion: VALIDATOR_VERSION,
    certificateHash: '',
  });
}

export function buildFailedCertificate(
  subject: CalibrationSubject,
  error: string,
  configHash: string
): FailedCertificate {
  return sign<FailedCertificate>({
    status: 'FAILED',
    instanceId: instanceIdOf(subject),
    subject,
    finalScore: 0,
    error,
    configHash,
    timestamp: subject.asOf,
    validatorVersion: VALIDATOR_VERSION,
    certificateHash: '',
  });
}

// ═══════════════════════════════════════════════════════════════
// VERIFICATION
// ═══════════════════════════════════════════════════════════════

function verifyTrace(
  trace: ReadonlyArray<Pick<FusionTraceTerm, 'kind' | 'term' | 'weight' | 'value' | 'contribution'>>,
  expected: number,
  issues: string[]
): boolean {
  let ok = true;
  for (const term of trace) {
    if (term.weight * term.value !== term.contribution) {
      issues.push(`term ${term.term}: ${term.weight}·${term.value} ≠ ${term.contribution}`);
      ok = false;
    }
  }
  const final = sumContributions(trace, 'linear') + sumContributions(trace, 'interaction');
  if (final !== expected) {
    issues.push(`trace sums to ${final}, certificate states ${expected}`);
    ok = false;
  }
  return ok;
}

/**
 * Reproduce the final score from the trace bit-for-bit and re-derive the hash.
 */
export function verifyCertificate(certificate: CalibrationCertificate): CertificateVerification {
  const issues: string[] = [];
  let scoreReproduced = true;

  if (certificate.status === 'CALIBRATED') {
    scoreReproduced = verifyTrace(certificate.fusion.trace, certificate.finalScore, issues);
    if (sumContributions(certificate.fusion.trace, 'linear') !== certificate.linearSum) {
      issues.push('linear sum does not match trace');
      scoreReproduced = false;
    }
    if (sumContributions(certificate.fusion.trace, 'interaction') !== certificate.interactionSum) {
      issues.push('interaction sum does not match trace');
      scoreReproduced = false;
    }
  }

  const recomputed = taggedHash(unsignedExport(certificate));
  const hashMatches = recomputed === certificate.certificateHash;
  if (!hashMatches) issues.push(`certificate hash mismatch: expected ${recomputed}`);

  return { valid: scoreReproduced && hashMatches, scoreReproduced, hashMatches, issues };
}

const ExportedRecordSchema = z.object({
  status: z.enum(['CALIBRATED', 'SKIPPED', 'REJECTED', 'FAILED']),
  calibration_score: z.number().nullable(),
  fusion_formula: z.object({
    computation_trace: z.array(z.object({
      kind: z.enum(['linear', 'interaction']),
      term: z.string(),
      weight: z.number(),
      value: z.number(),
      contribution: z.number(),
    }).passthrough()),
  }).passthrough().nullable(),
  audit_trail: z.object({ certificate_hash: z.string() }).passthrough(),
}).passthrough();

/**
 * Verify an exported record received from outside the process.
 */
export function verifyExportedCertificate(record: unknown): CertificateVerification {
  const parsed = ExportedRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      valid: false,
      scoreReproduced: false,
      hashMatches: false,
      issues: [`not a certificate record: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`],
    };
  }

  const issues: string[] = [];
  const data = parsed.data;
  let scoreReproduced = true;
  if (data.status === 'CALIBRATED') {
    if (!data.fusion_formula || data.calibration_score === null) {
      issues.push('calibrated record lacks a computation trace');
      scoreReproduced = false;
    } else {
      scoreReproduced = verifyTrace(data.fusion_formula.computation_trace, data.calibration_score, issues);
    }
  }

  const { certificate_hash: stated, ...audit } = data.audit_trail;
  const recomputed = taggedHash({ ...data, audit_trail: audit });
  const hashMatches = recomputed === stated;
  if (!hashMatches) issues.push(`certificate hash mismatch: expected ${recomputed}`);

  return { valid: scoreReproduced && hashMatches, scoreReproduced, hashMatches, issues };
}
