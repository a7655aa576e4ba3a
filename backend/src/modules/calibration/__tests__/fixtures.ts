import { createSubject, CalibrationSubject, MethodRole } from '../contracts/calibration.contract.js';
import type { LoadedCalibrationConfig } from '../contracts/config.contract.js';
import type { CalibrationEvidence } from '../contracts/evidence.contract.js';
import type { IntrinsicRecord, IntrinsicScoreRegistry } from '../contracts/registry.contract.js';
import { DEFAULT_CONFIG_DIR, loadCalibrationConfig } from '../config/calibration_config.service.js';

export const AS_OF = '2025-11-15T12:00:00.000Z';

export const CAUSAL = 'CausalExtractor.diagnose_critical_links';
export const BAYESIAN = 'BayesianMechanismInference.infer_mechanisms';
export const PDF = 'PDFProcessor.extract_text';
export const STRUCTURER = 'DocumentStructurer.segment_sections';
export const AGGREGATOR = 'PolicyAggregator.aggregate_dimension';
export const TRACE_FORMATTER = 'TraceFormatter.format_trace';
export const LEGACY = 'LegacyScorer.score';
export const FUZZY = 'FuzzyMatcher.match_terms';
export const ENSEMBLE = 'Q001_causal_ensemble';

let cached: Promise<LoadedCalibrationConfig> | null = null;

export function testConfig(): Promise<LoadedCalibrationConfig> {
  if (!cached) cached = loadCalibrationConfig(DEFAULT_CONFIG_DIR);
  return cached;
}

export function subject(
  methodId: string,
  role: MethodRole,
  overrides: Partial<{ nodeId: string; questionId: string; dimension: string; policyArea: string; unitQuality: number }> = {}
): CalibrationSubject {
  return createSubject({
    methodId,
    nodeId: overrides.nodeId,
    role,
    context: {
      questionId: overrides.questionId ?? 'Q001',
      dimension: overrides.dimension ?? 'D1',
      policyArea: overrides.policyArea ?? 'PA01',
      unitQuality: overrides.unitQuality ?? 0.9,
    },
    asOf: AS_OF,
  });
}

export const GOOD_META = {
  formulaExported: true,
  traceComplete: true,
  logsConformSchema: true,
  versionTagged: true,
  configHashMatches: true,
  signatureValid: true,
  runtimeMs: 500,
  memoryMb: 128,
};

export const GOOD_UNIT = { structuralCompliance: 0.9, indicatorMatrixPresent: true };

/**
 * Causal extractor inside the Q001 ensemble with every input supplied.
 */
export function causalEvidence(overrides: Partial<CalibrationEvidence> = {}): CalibrationEvidence {
  return {
    chain: {
      providedInputs: { document_text: 'string', segments: 'list', indicator_matrix: 'matrix' },
    },
    unit: GOOD_UNIT,
    congruence: { interplayId: ENSEMBLE, providedInputs: ['confidence', 'posterior'] },
    meta: GOOD_META,
    ...overrides,
  };
}

export function near(actual: number, expected: number, tolerance = 1e-12): boolean {
  return Math.abs(actual - expected) <= tolerance;
}

/**
 * Delegates to another registry, but lookups for the listed methods reject
 * the way a dropped database connection would.
 */
export class UnreachableRegistry implements IntrinsicScoreRegistry {
  readonly source = 'unreachable';

  constructor(
    private readonly inner: IntrinsicScoreRegistry,
    private readonly failing: readonly string[]
  ) {}

  getIntrinsic(methodId: string): Promise<IntrinsicRecord> {
    if (this.failing.includes(methodId)) return Promise.reject(new Error('connection reset'));
    return this.inner.getIntrinsic(methodId);
  }
}
