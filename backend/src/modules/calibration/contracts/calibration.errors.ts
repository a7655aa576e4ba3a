/**
 * CALIBRATION ERRORS
 *
 * Two disjoint classes:
 * - CalibrationConfigError: fatal, raised while loading configuration
 *   (or when fusion produces an out-of-bounds score)
 * - EvidenceError: per call, a layer's required evidence field is absent
 *
 * Hard-gate zeros are results, not errors.
 */

import type { CanonicalLayer } from './calibration.contract.js';
import { layerSymbol } from './calibration.contract.js';

export class CalibrationConfigError extends Error {
  readonly violations: readonly string[];

  constructor(violations: string[] | string) {
    const list = Array.isArray(violations) ? violations : [violations];
    super(
      list.length === 1
        ? `Calibration configuration rejected: ${list[0]}`
        : `Calibration configuration rejected (${list.length} violations):\n  - ${list.join('\n  - ')}`
    );
    this.name = 'CalibrationConfigError';
    this.violations = Object.freeze([...list]);
  }
}

export class EvidenceError extends Error {
  readonly layer: CanonicalLayer;
  readonly field: string;

  constructor(layer: CanonicalLayer, field: string, detail?: string) {
    super(`Evidence for ${layerSymbol(layer)} is missing field '${field}'${detail ? `: ${detail}` : ''}`);
    this.name = 'EvidenceError';
    this.layer = layer;
    this.field = field;
  }
}

export class CalibrationTimeoutError extends Error {
  readonly instanceId: string;
  readonly timeoutMs: number;

  constructor(instanceId: string, timeoutMs: number) {
    super(`Calibration of ${instanceId} exceeded ${timeoutMs}ms`);
    this.name = 'CalibrationTimeoutError';
    this.instanceId = instanceId;
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
