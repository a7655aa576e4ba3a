/**
 * PLAN VALIDATION
 *
 * Many subjects → one report. Subjects run concurrently and
 * independently (a subject that errors is FAILED on its own); the
 * report is ordered by instance id.
 *
 * Overall:
 *   nothing evaluated                  → SKIPPED
 *   no FAIL                            → PASS
 *   passed ≥ ratio × evaluated         → CONDITIONAL_PASS
 *   else                               → FAIL
 */

import { instanceIdOf } from '../contracts/calibration.contract.js';
import type { CalibrationRequest, Decision, DecisionOutcome, PlanReport } from '../contracts/decision.contract.js';
import type { CalibrationEngine } from '../engine/calibration_engine.service.js';
import { canonicalJson, sha256Hex } from '../certificate/canonical.js';

export interface PlanOptions {
  planId?: string;
  timeoutMs?: number;
}

export function planIdFor(requests: readonly CalibrationRequest[]): string {
  const ids = requests.map(r => instanceIdOf(r.subject)).sort();
  return `plan_${sha256Hex(canonicalJson(ids)).slice(0, 12)}`;
}

export function summarizePlan(
  planId: string,
  decisions: readonly Decision[],
  conditionalRatio: number,
  configHash: string
): PlanReport {
  const perMethod = [...decisions].sort((a, b) =>
    a.instanceId < b.instanceId ? -1 : a.instanceId > b.instanceId ? 1 : 0
  );

  const count = (outcome: DecisionOutcome) => perMethod.filter(d => d.outcome === outcome).length;
  const passed = count('PASS');
  const failed = count('FAIL');
  const conditionalPass = count('CONDITIONAL_PASS');
  const skipped = count('SKIPPED');
  const total = perMethod.length;
  const evaluated = total - skipped;

  let overallDecision: DecisionOutcome;
  if (evaluated === 0) {
    overallDecision = 'SKIPPED';
  } else if (failed === 0) {
    overallDecision = 'PASS';
  } else if (passed >= conditionalRatio * evaluated) {
    overallDecision = 'CONDITIONAL_PASS';
  } else {
    overallDecision = 'FAIL';
  }

  return {
    planId,
    overallDecision,
    passRate: total > 0 ? passed / total : 0,
    total,
    evaluated,
    passed,
    failed,
    conditionalPass,
    skipped,
    perMethod,
    configHash,
  };
}

export async function validatePlan(
  engine: CalibrationEngine,
  requests: readonly CalibrationRequest[],
  options: PlanOptions = {}
): Promise<PlanReport> {
  const planId = options.planId ?? planIdFor(requests);
  const outcomes = await Promise.all(
    requests.map(r => engine.evaluate(r.subject, r.evidence, options.timeoutMs))
  );

  const report = summarizePlan(
    planId,
    outcomes.map(o => o.decision),
    engine.config.policy.plan_conditional_ratio,
    engine.config.configHash
  );

  console.log(
    `[Calibration] Plan ${planId}: ${report.overallDecision} ` +
    `(${report.passed} pass, ${report.conditionalPass} conditional, ${report.failed} fail, ${report.skipped} skipped)`
  );
  return report;
}

/**
 * snake_case rendering of the plan report.
 */
export function exportPlanReport(report: PlanReport) {
  return {
    plan_id: report.planId,
    overall_decision: report.overallDecision,
    pass_rate: report.passRate,
    total_methods: report.total,
    evaluated: report.evaluated,
    passed: report.passed,
    failed: report.failed,
    conditional_pass: report.conditionalPass,
    skipped: report.skipped,
    config_hash: report.configHash,
    per_method: report.perMethod.map(d => ({
      instance_id: d.instanceId,
      method: d.methodId,
      node: d.nodeId,
      decision: d.outcome,
      score: d.score,
      threshold: d.threshold,
      failure_reason: d.failureReason,
      failure_details: d.failureDetails,
      recommendations: d.recommendations,
      skip_cause: d.skipCause,
      certificate_hash: d.certificateHash,
    })),
  };
}
