import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { CalibrationEngine } from '../engine/calibration_engine.service.js';
import { FileIntrinsicRegistry } from '../registry/intrinsic_registry.service.js';
import { exportCertificate, verifyCertificate, verifyExportedCertificate } from '../certificate/certificate.builder.js';
import { canonicalJson, taggedHash } from '../certificate/canonical.js';
import { MemoryCertificateRepo } from '../certificate/certificate.repo.js';
import { testConfig, subject, causalEvidence, UnreachableRegistry, CAUSAL, LEGACY } from './fixtures.js';

async function engine(): Promise<CalibrationEngine> {
  const config = await testConfig();
  return new CalibrationEngine(config, new FileIntrinsicRegistry(config.intrinsic));
}

function reparsed(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

describe('canonical hashing', () => {
  it('ignores key order and undefined members', () => {
    assert.equal(canonicalJson({ b: 1, a: { d: undefined, c: [2, 1] } }), '{"a":{"c":[2,1]},"b":1}');
    assert.equal(taggedHash({ x: 1, y: 2 }), taggedHash({ y: 2, x: 1 }));
  });
});

describe('calibration certificate', () => {
  it('verifies the score and hash of a fresh certificate', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    assert.deepEqual(verifyCertificate(certificate), {
      valid: true,
      scoreReproduced: true,
      hashMatches: true,
      issues: [],
    });
  });

  it('is immutable', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    assert.ok(Object.isFrozen(certificate));
    if (certificate.status !== 'CALIBRATED') throw new Error(`expected CALIBRATED, got ${certificate.status}`);
    assert.ok(Object.isFrozen(certificate.layerScores));
    assert.ok(Object.isFrozen(certificate.fusion.trace[0]));
  });

  it('exports a snake_case record that verifies after a JSON round trip', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    const exported = exportCertificate(certificate);

    assert.equal(exported.status, 'CALIBRATED');
    assert.equal(exported.instance_id, `${CAUSAL}@${CAUSAL}`);
    assert.equal(exported.calibration_score, certificate.status === 'CALIBRATED' ? certificate.finalScore : null);
    assert.deepEqual(Object.keys(exported.layer_breakdown), ['@b', '@chain', '@u', '@q', '@d', '@p', '@C', '@m']);
    assert.deepEqual(Object.keys(exported.interaction_breakdown), ['(@chain,@C)', '(@u,@chain)', '(@q,@d)']);
    assert.equal(exported.calibration_error, null);
    assert.deepEqual(exported.sensitivity_analysis?.most_impactful_interaction, ['@chain', '@C']);
    assert.equal(exported.audit_trail.certificate_hash, certificate.certificateHash);
    assert.equal(exported.audit_trail.timestamp, '2025-11-15T12:00:00.000Z');

    assert.equal(verifyExportedCertificate(reparsed(exported)).valid, true);
  });

  it('keys the breakdowns by layer symbol and pair with their scores', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    if (certificate.status !== 'CALIBRATED') throw new Error(`expected CALIBRATED, got ${certificate.status}`);
    const exported = exportCertificate(certificate);

    const unit = certificate.layerScores.find(s => s.layer === 'UNIT');
    assert.equal(exported.layer_breakdown['@u']?.layer, 'UNIT');
    assert.equal(exported.layer_breakdown['@u']?.score, unit?.value);
    assert.deepEqual(
      Object.values(exported.layer_breakdown).map(e => e.score),
      certificate.layerScores.map(s => s.value)
    );

    const pair = exported.interaction_breakdown['(@u,@chain)'];
    assert.deepEqual(pair?.layers, ['@u', '@chain']);
    assert.deepEqual(
      Object.values(exported.interaction_breakdown).map(e => e.contribution),
      certificate.interactions.map(i => i.contribution)
    );
  });

  it('detects a tampered score', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    const tampered = { ...exportCertificate(certificate), calibration_score: 0.99 };

    const result = verifyExportedCertificate(reparsed(tampered));
    assert.equal(result.valid, false);
    assert.equal(result.scoreReproduced, false);
    assert.equal(result.hashMatches, false);
  });

  it('detects a tampered trace weight', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    const exported = exportCertificate(certificate);
    const fusion = exported.fusion_formula;
    if (!fusion) throw new Error('calibrated export lacks a fusion formula');

    const trace = fusion.computation_trace.map((t, i) => (i === 0 ? { ...t, weight: t.weight + 0.01 } : t));
    const tampered = { ...exported, fusion_formula: { ...fusion, computation_trace: trace } };

    const result = verifyExportedCertificate(reparsed(tampered));
    assert.equal(result.valid, false);
    assert.equal(result.hashMatches, false);
    assert.ok(result.issues.some(issue => issue.startsWith('term @b:')));
  });

  it('detects a tampered context field through the hash', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence());
    const exported = exportCertificate(certificate);
    const tampered = { ...exported, context: { ...exported.context, question: 'Q002' } };

    const result = verifyExportedCertificate(reparsed(tampered));
    assert.equal(result.scoreReproduced, true);
    assert.equal(result.hashMatches, false);
  });

  it('rejects records that are not certificates', () => {
    const result = verifyExportedCertificate({ hello: 'world' });
    assert.equal(result.valid, false);
    assert.match(result.issues[0], /^not a certificate record: /);
  });

  it('exports skipped certificates without a score', async () => {
    const certificate = await (await engine()).calibrate(subject(LEGACY, 'analyzer'), {});
    const exported = exportCertificate(certificate);

    assert.equal(exported.status, 'SKIPPED');
    assert.equal(exported.calibration_score, null);
    assert.equal(exported.skip_cause, 'excluded');
    assert.equal(exported.fusion_formula, null);
    assert.deepEqual(exported.layer_breakdown, {});
    assert.deepEqual(exported.interaction_breakdown, {});
    assert.equal(verifyExportedCertificate(reparsed(exported)).valid, true);
  });

  it('exports rejected certificates with the failing field', async () => {
    const certificate = await (await engine()).calibrate(subject(CAUSAL, 'analyzer'), causalEvidence({ chain: {} }));
    const exported = exportCertificate(certificate);

    assert.equal(exported.status, 'REJECTED');
    assert.equal(exported.calibration_score, 0);
    assert.deepEqual(exported.evidence_error, { layer: '@chain', field: 'chain.providedInputs' });
    assert.equal(verifyCertificate(certificate).valid, true);
  });

  it('exports failed certificates with the error and a zero score', async () => {
    const config = await testConfig();
    const e = new CalibrationEngine(config, new UnreachableRegistry(new FileIntrinsicRegistry(config.intrinsic), [CAUSAL]));
    const certificate = await e.calibrateWithin(subject(CAUSAL, 'analyzer'), causalEvidence());
    const exported = exportCertificate(certificate);

    assert.equal(exported.status, 'FAILED');
    assert.equal(exported.calibration_score, 0);
    assert.equal(exported.calibration_error, 'connection reset');
    assert.equal(exported.skip_cause, null);
    assert.equal(verifyCertificate(certificate).valid, true);
    assert.equal(verifyExportedCertificate(reparsed(exported)).valid, true);
  });
});

describe('MemoryCertificateRepo', () => {
  it('keeps only the latest certificate per instance', async () => {
    const repo = new MemoryCertificateRepo();
    const e = await engine();
    const first = exportCertificate(await e.calibrate(subject(CAUSAL, 'analyzer'), causalEvidence()));
    const second = exportCertificate(await e.calibrate(
      subject(CAUSAL, 'analyzer'),
      causalEvidence({ congruence: undefined })
    ));

    await repo.save(first);
    await repo.save(second);

    const latest = await repo.findLatest(first.instance_id);
    assert.equal(latest?.certificateHash, second.audit_trail.certificate_hash);
    assert.equal(repo.size(), 1);
    assert.equal(await repo.findLatest('missing@node'), null);

    for (const nodeId of ['n1', 'n2', 'n1', 'n2', 'n1']) {
      await repo.save(exportCertificate(await e.calibrate(subject(CAUSAL, 'analyzer', { nodeId }), causalEvidence())));
    }
    assert.equal(repo.size(), 3);
  });
});
