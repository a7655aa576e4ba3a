/**
 * CALIBRATION ENGINE: C9
 *
 * subject + evidence → certificate → decision
 *
 * Pipeline:
 * 1. Intrinsic registry lookup (async, abortable)
 * 2. Active layers (declared set, or role requirements)
 * 3. Layer catalog
 * 4. Choquet fusion under the role's weights
 * 5. Certificate
 *
 * Display ids resolve to catalogue ids first (method_registry.json aliases).
 * Registry exclusion → SKIPPED. EvidenceError → REJECTED.
 * Timeout → SKIPPED(timeout). Any other error → FAILED for that subject only.
 */

import { createSubject, instanceIdOf, ownEntry, CalibrationSubject, LayerScore } from '../contracts/calibration.contract.js';
import type { LoadedCalibrationConfig } from '../contracts/config.contract.js';
import type { CalibrationEvidence } from '../contracts/evidence.contract.js';
import type { CalibrationCertificate } from '../contracts/certificate.contract.js';
import type { Decision } from '../contracts/decision.contract.js';
import type { IntrinsicScoreRegistry } from '../contracts/registry.contract.js';
import { CalibrationTimeoutError, EvidenceError, errorMessage } from '../contracts/calibration.errors.js';
import { resolveActiveLayers } from '../config/layer_requirements.rules.js';
import { getCalibrationConfig } from '../config/calibration_config.service.js';
import { evaluateLayers } from '../layers/layer_catalog.js';
import { fuse } from '../fusion/choquet_fusion.service.js';
import {
  buildCalibratedCertificate,
  buildFailedCertificate,
  buildRejectedCertificate,
  buildSkippedCertificate,
} from '../certificate/certificate.builder.js';
import { decide, decisionPolicyOf, resolveThreshold } from '../validation/decision.service.js';
import { createIntrinsicRegistry } from '../registry/intrinsic_registry.service.js';
import { canonicalMethodId } from '../registry/method_id.rules.js';

export interface CalibrateOptions {
  signal?: AbortSignal;
}

export interface CalibrationOutcome {
  certificate: CalibrationCertificate;
  decision: Decision;
}

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class CalibrationEngine {
  constructor(
    readonly config: LoadedCalibrationConfig,
    private readonly registry: IntrinsicScoreRegistry
  ) {}

  get registrySource(): string {
    return this.registry.source;
  }

  /**
   * CALIBRATION_SUBJECT_TIMEOUT_MS overrides the policy file.
   */
  defaultTimeoutMs(): number {
    const fromEnv = Number(process.env.CALIBRATION_SUBJECT_TIMEOUT_MS);
    return Number.isFinite(fromEnv) && fromEnv > 0 ? fromEnv : this.config.policy.subject_timeout_ms;
  }

  /**
   * Same subject under its catalogue id. The node keeps the caller's id.
   */
  canonicalSubject(subject: CalibrationSubject): CalibrationSubject {
    const methodId = canonicalMethodId(this.config.registry, subject.methodId);
    if (methodId === subject.methodId) return subject;
    console.log(`[Calibration] ${subject.methodId} resolves to ${methodId}`);
    return createSubject({ ...subject, methodId });
  }

  /**
   * Calibrate one subject. Pure in (subject, evidence, config, registry).
   */
  async calibrate(
    requested: CalibrationSubject,
    evidence: CalibrationEvidence,
    options: CalibrateOptions = {}
  ): Promise<CalibrationCertificate> {
    const { config } = this;
    const { signal } = options;
    const subject = this.canonicalSubject(requested);

    const declaration = ownEntry(config.registry.methods, subject.methodId) ?? null;
    if (declaration && declaration.role !== subject.role) {
      console.warn(
        `[Calibration] ${subject.methodId} is registered as ${declaration.role} but calibrated as ${subject.role}`
      );
    }

    const intrinsic = await abortable(this.registry.getIntrinsic(subject.methodId), signal);
    signal?.throwIfAborted();

    if (intrinsic.status === 'excluded') {
      return buildSkippedCertificate(
        subject,
        'excluded',
        `${subject.methodId} is excluded from calibration in ${intrinsic.source}`,
        config.configHash
      );
    }

    const activeLayers = resolveActiveLayers(config, subject.role, declaration);

    let layerScores: LayerScore[];
    try {
      layerScores = evaluateLayers(activeLayers, { subject, declaration, evidence, intrinsic, config });
    } catch (error) {
      if (error instanceof EvidenceError) {
        console.warn(`[Calibration] ${instanceIdOf(subject)} rejected: ${error.message}`);
        return buildRejectedCertificate(subject, error, config.configHash);
      }
      throw error;
    }

    const fusion = fuse(config.fusion.roles[subject.role], layerScores);

    return buildCalibratedCertificate({ subject, config, declaration, intrinsic, layerScores, fusion });
  }

  /**
   * Calibrate under a per-subject deadline. Never throws: a timeout yields
   * SKIPPED(timeout), any other error a FAILED certificate.
   */
  async calibrateWithin(
    requested: CalibrationSubject,
    evidence: CalibrationEvidence,
    timeoutMs: number = this.defaultTimeoutMs()
  ): Promise<CalibrationCertificate> {
    const subject = this.canonicalSubject(requested);
    const instanceId = instanceIdOf(subject);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new CalibrationTimeoutError(instanceId, timeoutMs)), timeoutMs);

    try {
      return await this.calibrate(subject, evidence, { signal: controller.signal });
    } catch (error) {
      if (error instanceof CalibrationTimeoutError) {
        console.warn(`[Calibration] ${error.message}; skipping`);
        return buildSkippedCertificate(subject, 'timeout', error.message, this.config.configHash);
      }
      const message = errorMessage(error);
      console.error(`[Calibration] ${instanceId} failed: ${message}`);
      return buildFailedCertificate(subject, message, this.config.configHash);
    } finally {
      clearTimeout(timer);
    }
  }

  decide(certificate: CalibrationCertificate): Decision {
    return decide(certificate, resolveThreshold(this.config, certificate.subject), decisionPolicyOf(this.config));
  }

  async evaluate(
    subject: CalibrationSubject,
    evidence: CalibrationEvidence,
    timeoutMs?: number
  ): Promise<CalibrationOutcome> {
    const certificate = await this.calibrateWithin(subject, evidence, timeoutMs);
    return { certificate, decision: this.decide(certificate) };
  }
}

// ═══════════════════════════════════════════════════════════════
// SINGLETON
// ═══════════════════════════════════════════════════════════════

let enginePromise: Promise<CalibrationEngine> | null = null;

export function getCalibrationEngine(): Promise<CalibrationEngine> {
  if (!enginePromise) {
    enginePromise = getCalibrationConfig()
      .then(config => new CalibrationEngine(config, createIntrinsicRegistry(config)))
      .catch((error: unknown) => {
        enginePromise = null;
        throw error;
      });
  }
  return enginePromise;
}

export function resetCalibrationEngine(): void {
  enginePromise = null;
}
