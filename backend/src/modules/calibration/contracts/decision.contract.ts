/**
 * VALIDATION DECISION CONTRACT: C5
 */

import type { CalibrationSubject } from './calibration.contract.js';
import type { CalibrationEvidence } from './evidence.contract.js';
import type { SkipCause } from './certificate.contract.js';

export type DecisionOutcome = 'PASS' | 'FAIL' | 'CONDITIONAL_PASS' | 'SKIPPED';

export const FAILURE_REASONS = [
  'BASE_LAYER_LOW',
  'CHAIN_LAYER_FAIL',
  'UNIT_LAYER_FAIL',
  'CONGRUENCE_FAIL',
  'CONTEXTUAL_FAIL',
  'META_LAYER_FAIL',
  'SCORE_BELOW_THRESHOLD',
  'CALIBRATION_ERROR',
] as const;

export type FailureReason = typeof FAILURE_REASONS[number];

export interface Decision {
  readonly instanceId: string;
  readonly methodId: string;
  readonly nodeId: string;
  readonly outcome: DecisionOutcome;
  readonly score: number;
  readonly threshold: number;
  readonly failureReason: FailureReason | null;
  readonly failureDetails: string | null;
  readonly recommendations: readonly string[];
  readonly skipCause: SkipCause | null;
  readonly certificateHash: string;
}

export interface CalibrationRequest {
  readonly subject: CalibrationSubject;
  readonly evidence: CalibrationEvidence;
}

export interface PlanReport {
  readonly planId: string;
  readonly overallDecision: DecisionOutcome;
  readonly passRate: number;
  readonly total: number;
  readonly evaluated: number;
  readonly passed: number;
  readonly failed: number;
  readonly conditionalPass: number;
  readonly skipped: number;
  readonly perMethod: readonly Decision[];
  readonly configHash: string;
}
