import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import type { FastifyInstance } from 'fastify';

import { buildServer } from '../../../server.js';
import { MemoryCertificateRepo, setCertificateRepo } from '../index.js';
import { AS_OF, CAUSAL, ENSEMBLE, GOOD_META, GOOD_UNIT } from './fixtures.js';

const causalBody = {
  subject: {
    methodId: CAUSAL,
    nodeId: 'node-7',
    role: 'analyzer',
    context: { questionId: 'Q001', dimension: 'D1', policyArea: 'PA01', unitQuality: 0.9 },
    asOf: AS_OF,
  },
  evidence: {
    chain: { providedInputs: { document_text: 'string', segments: 'list', indicator_matrix: 'matrix' } },
    unit: GOOD_UNIT,
    congruence: { interplayId: ENSEMBLE, providedInputs: ['confidence', 'posterior'] },
    meta: GOOD_META,
  },
};

describe('calibration routes', () => {
  let app: FastifyInstance;
  const repo = new MemoryCertificateRepo();

  before(async () => {
    setCertificateRepo(repo);
    app = await buildServer({ logger: false });
    await app.ready();
  });

  after(async () => {
    await app.close();
    setCertificateRepo(null);
  });

  it('GET /health reports the config hash', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/calibration/health' });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.ok, true);
    assert.match(body.configHash, /^sha256:/);
    assert.equal(body.registry, 'intrinsic_calibration.json');
  });

  it('GET /layers/:role lists required layers', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/calibration/layers/utility' });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json().requiredLayers, ['@b', '@chain', '@m']);
  });

  it('GET /layers/:role rejects unknown roles', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/calibration/layers/wizard' });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json().error, 'UNKNOWN_ROLE');
  });

  it('POST /calibrate returns and stores the certificate', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/calibration/calibrate', payload: causalBody });
    assert.equal(res.statusCode, 200);

    const body = res.json();
    assert.equal(body.certificate.status, 'CALIBRATED');
    assert.equal(body.decision.outcome, 'PASS');
    assert.equal(repo.size(), 1);

    const stored = await app.inject({ method: 'GET', url: `/api/calibration/certificates/${encodeURIComponent(`${CAUSAL}@node-7`)}` });
    assert.equal(stored.statusCode, 200);
    assert.equal(stored.json().certificateHash, body.certificate.audit_trail.certificate_hash);

    const verified = await app.inject({
      method: 'POST',
      url: '/api/calibration/certificates/verify',
      payload: { certificate: body.certificate },
    });
    assert.equal(verified.json().valid, true);
  });

  it('POST /calibrate rejects malformed subjects with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/calibration/calibrate',
      payload: { ...causalBody, subject: { ...causalBody.subject, role: 'wizard' } },
    });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json().error, 'INVALID_REQUEST');
    assert.match(res.json().message, /^subject\.role: /);
  });

  it('GET /certificates/:instanceId is 404 for unknown instances', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/calibration/certificates/nothing' });
    assert.equal(res.statusCode, 404);
  });

  it('POST /validate-plan reports every subject', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/calibration/validate-plan',
      payload: {
        planId: 'plan-test',
        subjects: [
          causalBody,
          { subject: { ...causalBody.subject, methodId: 'LegacyScorer.score', nodeId: undefined }, evidence: {} },
        ],
      },
    });
    assert.equal(res.statusCode, 200);

    const { report } = res.json();
    assert.equal(report.plan_id, 'plan-test');
    assert.equal(report.overall_decision, 'PASS');
    assert.equal(report.skipped, 1);
    assert.equal(report.per_method.length, 2);
  });
});
