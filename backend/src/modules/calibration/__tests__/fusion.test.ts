import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createLayerScore, CANONICAL_LAYERS, CanonicalLayer, LayerScore } from '../contracts/calibration.contract.js';
import type { RoleFusionConfig } from '../contracts/config.contract.js';
import { CalibrationConfigError } from '../contracts/calibration.errors.js';
import { fuse, orderedInteractions } from '../fusion/choquet_fusion.service.js';
import { computeSensitivity } from '../certificate/certificate.builder.js';
import { testConfig, near } from './fixtures.js';

function scores(values: Partial<Record<CanonicalLayer, number>>): LayerScore[] {
  return CANONICAL_LAYERS.flatMap(layer => {
    const value = values[layer];
    return value === undefined
      ? []
      : [createLayerScore({ layer, value, rationale: 'test', formula: 'test' })];
  });
}

const SCENARIO_C = {
  BASE: 0.9,
  CHAIN: 1.0,
  UNIT: 0.6,
  QUESTION: 1.0,
  DIMENSION: 1.0,
  POLICY: 0.8,
  CONGRUENCE: 1.0,
  META: 0.95,
};

describe('Choquet fusion', () => {
  it('reproduces the end-to-end analyzer example', async () => {
    const { fusion } = await testConfig();
    const result = fuse(fusion.roles.analyzer, scores(SCENARIO_C));

    assert.ok(near(result.finalScore, 0.8617216121, 1e-9));
    assert.ok(near(result.linearSum, 0.6401098907, 1e-9));
    assert.ok(near(result.interactionSum, 0.2216117214, 1e-9));
    assert.equal(result.finalScore, result.linearSum + result.interactionSum);
  });

  it('(@u,@chain) is the most impactful interaction; @u the most impactful layer', async () => {
    const { fusion } = await testConfig();
    const { trace } = fuse(fusion.roles.analyzer, scores(SCENARIO_C));
    const sensitivity = computeSensitivity(trace);

    assert.equal(sensitivity.mostImpactfulLayer?.layer, 'UNIT');
    assert.deepEqual(sensitivity.mostImpactfulInteraction?.pair, ['UNIT', 'CHAIN']);
  });

  it('orders the trace canonically: linear terms, then interactions by declared pair', async () => {
    const { fusion } = await testConfig();
    const { trace } = fuse(fusion.roles.analyzer, scores(SCENARIO_C));

    assert.deepEqual(trace.map(t => t.term), [
      '@b', '@chain', '@u', '@q', '@d', '@p', '@C', '@m',
      'min(@chain,@C)', 'min(@u,@chain)', 'min(@q,@d)',
    ]);
    assert.deepEqual(orderedInteractions(fusion.roles.analyzer).map(i => i.layerA), ['CHAIN', 'UNIT', 'QUESTION']);
  });

  it('skips interactions whose layers are not both active', async () => {
    const { fusion } = await testConfig();
    const result = fuse(fusion.roles.utility, scores({ BASE: 0.9, META: 1 }));

    assert.deepEqual(result.trace.map(t => t.term), ['@b', '@m']);
    assert.ok(near(result.finalScore, 0.61));
    assert.equal(result.interactionSum, 0);
  });

  it('stays within [0,1] at the extremes for every role', async () => {
    const { fusion } = await testConfig();
    for (const config of Object.values(fusion.roles)) {
      const zeros = fuse(config, scores(Object.fromEntries(CANONICAL_LAYERS.map(l => [l, 0]))));
      const ones = fuse(config, scores(Object.fromEntries(CANONICAL_LAYERS.map(l => [l, 1]))));
      assert.equal(zeros.finalScore, 0);
      assert.ok(ones.finalScore <= 1 + 1e-9, `${config.role}: ${ones.finalScore}`);
      assert.ok(near(ones.finalScore, 1, 1e-6), `${config.role}: ${ones.finalScore}`);
    }
  });

  it('is monotone in every layer', async () => {
    const { fusion } = await testConfig();
    const config = fusion.roles.analyzer;
    for (const layer of CANONICAL_LAYERS) {
      let previous = -1;
      for (let i = 0; i <= 10; i++) {
        const { finalScore } = fuse(config, scores({ ...SCENARIO_C, [layer]: i / 10 }));
        assert.ok(finalScore >= previous, `${layer} decreased at ${i / 10}`);
        previous = finalScore;
      }
    }
  });

  it('raises a configuration error instead of clamping an out-of-bounds score', () => {
    const broken: RoleFusionConfig = {
      role: 'utility',
      linearWeights: { BASE: 0.8, META: 0.7 },
      interactions: [],
      totalWeight: 1.5,
    };
    assert.throws(() => fuse(broken, scores({ BASE: 1, META: 1 })), CalibrationConfigError);
  });

  it('renders symbolic and expanded formulas', async () => {
    const { fusion } = await testConfig();
    const result = fuse(fusion.roles.utility, scores({ BASE: 0.9, META: 1 }));

    assert.equal(result.symbolic, 'Cal(I) = a@b·x@b + a@m·x@m');
    assert.equal(result.expanded, 'Cal(I) = 0.4·0.9000 + 0.25·1.0000 = 0.6100');
  });
});
