/**
 * CALIBRATION ROUTES
 *
 * ROUTES:
 * - GET  /api/calibration/health                     - Module health
 * - GET  /api/calibration/config                     - Loaded config summary + hash
 * - GET  /api/calibration/layers/:role               - Required layers + fusion weights for a role
 * - POST /api/calibration/calibrate                  - Calibrate one subject → certificate + decision
 * - POST /api/calibration/validate-plan              - Calibrate many subjects → plan report
 * - GET  /api/calibration/certificates/:instanceId   - Latest stored certificate
 * - POST /api/calibration/certificates/verify        - Verify an exported certificate
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';

import {
  createSubject,
  isCanonicalLayer,
  isMethodRole,
  layerSymbol,
  sortLayers,
  METHOD_ROLES,
  VALIDATOR_VERSION,
} from '../contracts/calibration.contract.js';
import { CalibrationEvidenceSchema } from '../contracts/evidence.contract.js';
import type { CalibrationRequest } from '../contracts/decision.contract.js';
import { CalibrationConfigError, errorMessage } from '../contracts/calibration.errors.js';
import { getCalibrationEngine } from '../engine/calibration_engine.service.js';
import { exportCertificate, verifyExportedCertificate } from '../certificate/certificate.builder.js';
import { getCertificateRepo } from '../certificate/certificate.repo.js';
import { exportPlanReport, validatePlan } from '../validation/plan_validation.service.js';
import { requiredLayers } from '../config/layer_requirements.rules.js';

// ═══════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════

const SubjectSchema = z.object({
  methodId: z.string().min(1),
  nodeId: z.string().min(1).optional(),
  role: z.enum(METHOD_ROLES),
  context: z.object({
    questionId: z.string(),
    dimension: z.string(),
    policyArea: z.string(),
    unitQuality: z.number().min(0).max(1),
  }),
  asOf: z.string().datetime(),
});

const CalibrateBodySchema = z.object({
  subject: SubjectSchema,
  evidence: CalibrationEvidenceSchema,
  timeoutMs: z.number().int().positive().optional(),
});

const PlanBodySchema = z.object({
  planId: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  subjects: z.array(z.object({
    subject: SubjectSchema,
    evidence: CalibrationEvidenceSchema,
  })).min(1),
});

const VerifyBodySchema = z.object({
  certificate: z.unknown(),
});

type SubjectBody = z.infer<typeof SubjectSchema>;

function toRequest(subject: SubjectBody, evidence: CalibrationRequest['evidence']): CalibrationRequest {
  return { subject: createSubject(subject), evidence };
}

function badRequest(reply: FastifyReply, error: z.ZodError) {
  const issue = error.issues[0];
  return reply.status(400).send({
    ok: false,
    error: 'INVALID_REQUEST',
    message: issue ? `${issue.path.join('.') || '(body)'}: ${issue.message}` : 'invalid request',
  });
}

function serverError(reply: FastifyReply, route: string, error: unknown) {
  console.error(`[Calibration] ${route} error:`, errorMessage(error));
  return reply.status(500).send({
    ok: false,
    error: error instanceof CalibrationConfigError ? 'CONFIG_REJECTED' : 'INTERNAL_ERROR',
    message: errorMessage(error),
  });
}

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerCalibrationRoutes(app: FastifyInstance): Promise<void> {

  // ─────────────────────────────────────────────────────────────
  // Health check
  // ─────────────────────────────────────────────────────────────
  app.get('/api/calibration/health', async (_req: FastifyRequest, reply: FastifyReply) => {
    try {
      const engine = await getCalibrationEngine();
      return reply.send({
        ok: true,
        module: 'calibration',
        validatorVersion: VALIDATOR_VERSION,
        configHash: engine.config.configHash,
        registry: engine.registrySource,
        methods: Object.keys(engine.config.registry.methods).length,
        loadedAt: engine.config.loadedAt,
      });
    } catch (error) {
      return serverError(reply, 'health', error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // Config summary
  // ─────────────────────────────────────────────────────────────
  app.get('/api/calibration/config', async (_req: FastifyRequest, reply: FastifyReply) => {
    try {
      const { config } = await getCalibrationEngine();
      return reply.send({
        ok: true,
        configHash: config.configHash,
        provenance: config.provenance,
        fusionVersion: config.fusion.version,
        roles: METHOD_ROLES.map(role => ({
          role,
          requiredLayers: requiredLayers(config.requirements, role).map(layerSymbol),
          totalWeight: config.fusion.roles[role].totalWeight,
          threshold: config.policy.roleThresholds[role],
        })),
        methods: Object.values(config.registry.methods).map(m => ({
          methodId: m.methodId,
          role: m.role,
          version: m.version,
          layers: m.activeLayers.map(layerSymbol),
        })),
        interplays: Object.keys(config.registry.interplays),
        policy: {
          roleThresholds: config.policy.roleThresholds,
          conditionalBand: config.policy.conditional_band,
          layerFloor: config.policy.layer_floor,
          subjectTimeoutMs: config.policy.subject_timeout_ms,
        },
      });
    } catch (error) {
      return serverError(reply, 'config', error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // Layers for a role
  // ─────────────────────────────────────────────────────────────
  app.get('/api/calibration/layers/:role', async (
    req: FastifyRequest<{ Params: { role: string } }>,
    reply: FastifyReply
  ) => {
    try {
      const { role } = req.params;
      if (!isMethodRole(role)) {
        return reply.status(400).send({
          ok: false,
          error: 'UNKNOWN_ROLE',
          message: `Unknown role '${role}'. Expected one of: ${METHOD_ROLES.join(', ')}`,
        });
      }

      const { config } = await getCalibrationEngine();
      const fusion = config.fusion.roles[role];
      return reply.send({
        ok: true,
        role,
        requiredLayers: requiredLayers(config.requirements, role).map(layerSymbol),
        linearWeights: sortLayers(Object.keys(fusion.linearWeights).filter(isCanonicalLayer))
          .map(layer => ({ layer: layerSymbol(layer), weight: fusion.linearWeights[layer] ?? 0 })),
        interactions: fusion.interactions.map(i => ({
          pair: [layerSymbol(i.layerA), layerSymbol(i.layerB)],
          weight: i.weight,
          rationale: i.rationale,
        })),
        totalWeight: fusion.totalWeight,
        threshold: config.policy.roleThresholds[role],
      });
    } catch (error) {
      return serverError(reply, 'layers', error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // Calibrate one subject
  // ─────────────────────────────────────────────────────────────
  app.post('/api/calibration/calibrate', async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = CalibrateBodySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const engine = await getCalibrationEngine();
      const { subject, evidence } = toRequest(parsed.data.subject, parsed.data.evidence);
      const { certificate, decision } = await engine.evaluate(subject, evidence, parsed.data.timeoutMs);

      const exported = exportCertificate(certificate);
      await getCertificateRepo().save(exported);

      return reply.send({ ok: true, certificate: exported, decision });
    } catch (error) {
      return serverError(reply, 'calibrate', error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // Validate a plan
  // ─────────────────────────────────────────────────────────────
  app.post('/api/calibration/validate-plan', async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = PlanBodySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const engine = await getCalibrationEngine();
      const requests = parsed.data.subjects.map(s => toRequest(s.subject, s.evidence));
      const report = await validatePlan(engine, requests, {
        planId: parsed.data.planId,
        timeoutMs: parsed.data.timeoutMs,
      });
      return reply.send({ ok: true, report: exportPlanReport(report) });
    } catch (error) {
      return serverError(reply, 'validate-plan', error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // Stored certificate
  // ─────────────────────────────────────────────────────────────
  app.get('/api/calibration/certificates/:instanceId', async (
    req: FastifyRequest<{ Params: { instanceId: string } }>,
    reply: FastifyReply
  ) => {
    try {
      const stored = await getCertificateRepo().findLatest(req.params.instanceId);
      if (!stored) {
        return reply.status(404).send({
          ok: false,
          error: 'NOT_FOUND',
          message: `No certificate stored for ${req.params.instanceId}`,
        });
      }
      return reply.send({ ok: true, ...stored });
    } catch (error) {
      return serverError(reply, 'certificates', error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // Verify an exported certificate
  // ─────────────────────────────────────────────────────────────
  app.post('/api/calibration/certificates/verify', async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = VerifyBodySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const verification = verifyExportedCertificate(parsed.data.certificate);
    return reply.send({ ok: true, ...verification });
  });

  console.log('[Calibration] Routes registered:');
  console.log('  - GET  /api/calibration/health');
  console.log('  - GET  /api/calibration/config');
  console.log('  - GET  /api/calibration/layers/:role');
  console.log('  - POST /api/calibration/calibrate');
  console.log('  - POST /api/calibration/validate-plan');
  console.log('  - GET  /api/calibration/certificates/:instanceId');
  console.log('  - POST /api/calibration/certificates/verify');
}
