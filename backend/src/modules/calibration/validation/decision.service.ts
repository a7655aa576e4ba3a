/**
 * VALIDATION DECISION: C8
 *
 * certificate + threshold → PASS | CONDITIONAL_PASS | FAIL | SKIPPED
 *
 * REJECTED and FAILED certificates always FAIL (score 0).
 *
 * FAIL attribution: the layer with the lowest value (contribution ÷ weight)
 * below the floor, ties in canonical order; else SCORE_BELOW_THRESHOLD.
 */

import { layerOrder, fmt, ownEntry, CalibrationSubject } from '../contracts/calibration.contract.js';
import type { LoadedCalibrationConfig } from '../contracts/config.contract.js';
import type { CalibrationCertificate } from '../contracts/certificate.contract.js';
import type { Decision, FailureReason } from '../contracts/decision.contract.js';
import {
  failureReasonFor,
  layerFailureDetails,
  rankedRecommendations,
  thresholdFailureDetails,
} from './failure_recommendations.rules.js';
import { canonicalMethodId } from '../registry/method_id.rules.js';

export interface DecisionPolicy {
  readonly conditionalBand: number;
  readonly layerFloor: number;
}

export function decisionPolicyOf(config: LoadedCalibrationConfig): DecisionPolicy {
  return {
    conditionalBand: config.policy.conditional_band,
    layerFloor: config.policy.layer_floor,
  };
}

/**
 * Per-method override (by catalogue id), else per-role threshold.
 */
export function resolveThreshold(config: LoadedCalibrationConfig, subject: CalibrationSubject): number {
  const methodId = canonicalMethodId(config.registry, subject.methodId);
  return ownEntry(config.policy.method_thresholds, methodId) ?? config.policy.roleThresholds[subject.role];
}

export function decide(certificate: CalibrationCertificate, threshold: number, policy: DecisionPolicy): Decision {
  const identity = {
    instanceId: certificate.instanceId,
    methodId: certificate.subject.methodId,
    nodeId: certificate.subject.nodeId,
    threshold,
    certificateHash: certificate.certificateHash,
  };

  switch (certificate.status) {
    case 'SKIPPED':
      return {
        ...identity,
        outcome: 'SKIPPED',
        score: 0,
        failureReason: null,
        failureDetails: null,
        recommendations: [],
        skipCause: certificate.skipCause,
      };

    case 'REJECTED': {
      const reason = failureReasonFor(certificate.evidenceError.layer);
      return {
        ...identity,
        outcome: 'FAIL',
        score: 0,
        failureReason: reason,
        failureDetails: certificate.evidenceError.message,
        recommendations: rankedRecommendations([reason]),
        skipCause: null,
      };
    }

    case 'FAILED':
      return {
        ...identity,
        outcome: 'FAIL',
        score: 0,
        failureReason: 'CALIBRATION_ERROR',
        failureDetails: certificate.error,
        recommendations: rankedRecommendations(['CALIBRATION_ERROR']),
        skipCause: null,
      };

    case 'CALIBRATED': {
      const score = certificate.finalScore;
      if (score >= threshold) {
        return {
          ...identity,
          outcome: 'PASS',
          score,
          failureReason: null,
          failureDetails: null,
          recommendations: [],
          skipCause: null,
        };
      }

      if (score >= threshold - policy.conditionalBand) {
        return {
          ...identity,
          outcome: 'CONDITIONAL_PASS',
          score,
          failureReason: null,
          failureDetails: `Score ${fmt(score)} within ${fmt(policy.conditionalBand)} of the threshold ${fmt(threshold)}`,
          recommendations: [],
          skipCause: null,
        };
      }

      const belowFloor = certificate.layerScores
        .filter(s => s.value < policy.layerFloor)
        .sort((a, b) => a.value - b.value || layerOrder(a.layer) - layerOrder(b.layer));

      const attributed = belowFloor[0];
      const reasons: FailureReason[] = attributed
        ? belowFloor.map(s => failureReasonFor(s.layer))
        : ['SCORE_BELOW_THRESHOLD'];

      return {
        ...identity,
        outcome: 'FAIL',
        score,
        failureReason: reasons[0],
        failureDetails: attributed
          ? layerFailureDetails(attributed.layer, attributed.value, policy.layerFloor)
          : thresholdFailureDetails(score, threshold),
        recommendations: rankedRecommendations(reasons),
        skipCause: null,
      };
    }
  }
}
