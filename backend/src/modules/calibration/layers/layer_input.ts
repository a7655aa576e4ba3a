import type { CalibrationSubject } from '../contracts/calibration.contract.js';
import type { LoadedCalibrationConfig, MethodDeclaration } from '../contracts/config.contract.js';
import type { CalibrationEvidence } from '../contracts/evidence.contract.js';
import type { IntrinsicRecord } from '../contracts/registry.contract.js';

/**
 * Everything one layer evaluator may read. Built once per call by the engine.
 * `declaration` is null for methods absent from the registry.
 */
export interface LayerEvaluationInput {
  readonly subject: CalibrationSubject;
  readonly declaration: MethodDeclaration | null;
  readonly evidence: CalibrationEvidence;
  readonly intrinsic: IntrinsicRecord;
  readonly config: LoadedCalibrationConfig;
}

export function clamp01(x: number): number {
  return Math.max(0, Math.min(1, x));
}
