import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { CalibrationConfigError } from '../contracts/calibration.errors.js';
import {
  FusionFileSchema,
  PolicyFileSchema,
  RegistryFileSchema,
  RubricFileSchema,
  CalibrationConfigSources,
} from '../contracts/config.contract.js';
import {
  DEFAULT_CONFIG_DIR,
  readConfigSources,
  resolveCalibrationConfig,
} from '../config/calibration_config.service.js';
import { layerCoverage, resolveActiveLayers } from '../config/layer_requirements.rules.js';
import { scanUniversality } from '../config/anti_universality.rules.js';
import { testConfig, CAUSAL, PDF, TRACE_FORMATTER } from './fixtures.js';

function rejectionOf(sources: CalibrationConfigSources): readonly string[] {
  try {
    resolveCalibrationConfig(sources);
  } catch (error) {
    if (error instanceof CalibrationConfigError) return error.violations;
    throw error;
  }
  throw new Error('configuration was accepted');
}

describe('calibration config', () => {
  it('loads the shipped configuration', async () => {
    const config = await testConfig();
    assert.equal(config.fusion.version, '2025.11.1');
    assert.match(config.configHash, /^sha256:[0-9a-f]{64}$/);
    assert.deepEqual(config.requirements.analyzer, [
      'BASE', 'CHAIN', 'UNIT', 'QUESTION', 'DIMENSION', 'POLICY', 'CONGRUENCE', 'META',
    ]);
    assert.deepEqual(config.registry.methods[TRACE_FORMATTER].activeLayers, ['BASE', 'META']);
    assert.equal(config.policy.roleThresholds.analyzer, 0.7);
    assert.equal(config.registry.aliases.D1Q1_Executor, CAUSAL);
  });

  it('is deeply frozen', async () => {
    const config = await testConfig();
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.fusion.roles.analyzer.linearWeights));
    assert.ok(Object.isFrozen(config.registry.methods[CAUSAL].compatibility.questions));
  });

  it('hashes identical sources identically', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    assert.equal(resolveCalibrationConfig(sources).configHash, resolveCalibrationConfig(sources).configHash);
  });

  it('changes the hash when any parameter changes', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const policy = PolicyFileSchema.parse(sources.policy);
    policy.conditional_band = 0.04;
    assert.notEqual(
      resolveCalibrationConfig(sources).configHash,
      resolveCalibrationConfig({ ...sources, policy }).configHash
    );
  });

  it('rejects weights that do not sum to 1', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const fusion = FusionFileSchema.parse(sources.fusion);
    fusion.roles.processor.linear_weights['@b'] = 0.5;

    const violations = rejectionOf({ ...sources, fusion });
    assert.equal(violations.length, 1);
    assert.match(violations[0], /^fusion_specification\.json: processor: weights sum to 1\.2/);
  });

  it('rejects a repeated interaction pair in either order', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const fusion = FusionFileSchema.parse(sources.fusion);
    fusion.roles.processor.interaction_weights.push(
      { pair: ['@chain', '@u'], weight: 0, rationale: '' },
      { pair: ['@u', '@chain'], weight: 0, rationale: '' }
    );

    assert.deepEqual(rejectionOf({ ...sources, fusion }), [
      'fusion_specification.json: processor: interaction (@chain,@u) duplicates (@u,@chain)',
      'fusion_specification.json: processor: interaction (@u,@chain) duplicates (@u,@chain)',
    ]);
  });

  it('rejects a negative linear weight even when the total is 1', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const fusion = FusionFileSchema.parse(sources.fusion);
    fusion.roles.processor.linear_weights['@b'] = -0.1;
    fusion.roles.processor.linear_weights['@chain'] = 0.6;

    assert.deepEqual(rejectionOf({ ...sources, fusion }), [
      'fusion_specification.json: processor: negative weight -0.1 for @b',
    ]);
  });

  it('rejects a negative interaction weight even when the total is 1', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const fusion = FusionFileSchema.parse(sources.fusion);
    fusion.roles.processor.linear_weights['@b'] = 0.5;
    fusion.roles.processor.interaction_weights[0].weight = -0.05;

    assert.deepEqual(rejectionOf({ ...sources, fusion }), [
      'fusion_specification.json: processor: negative weight -0.05 for (@u,@chain)',
    ]);
  });

  it('rejects aliases that shadow or miss registered methods', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const registry = RegistryFileSchema.parse(sources.registry);
    registry.aliases = { D9Q9_Executor: 'Missing.method', [CAUSAL]: PDF };

    assert.deepEqual(rejectionOf({ ...sources, registry }), [
      `method_registry.json: alias '${CAUSAL}' shadows a registered method`,
      "method_registry.json: alias 'D9Q9_Executor' points to unregistered method 'Missing.method'",
    ]);
  });

  it('rejects rubric tiers that are out of order', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const rubric = RubricFileSchema.parse(sources.rubric);
    rubric.chain.tiers.clean = 0.7;

    assert.deepEqual(rejectionOf({ ...sources, rubric }), [
      "layer_rubric.json: chain tier 'clean' (0.7) is below 'warnings' (0.8)",
    ]);
  });

  it('rejects unknown layer symbols and roles', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const fusion = FusionFileSchema.parse(sources.fusion);
    fusion.roles.scorer = fusion.roles.utility;
    fusion.roles.utility.linear_weights = { '@b': 0.4, '@x': 0.25, '@m': 0.25 };

    const violations = rejectionOf({ ...sources, fusion });
    assert.ok(violations.includes("fusion_specification.json: unknown role 'scorer'"));
    assert.ok(violations.includes("fusion_specification.json: utility: unknown layer symbol '@x'"));
  });

  it('rejects a universally compatible method', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const registry = RegistryFileSchema.parse(sources.registry);
    const all = (keys: string[]) => Object.fromEntries(keys.map(k => [k, 'primary' as const]));
    registry.methods['Universal.method'] = {
      role: 'analyzer',
      version: '1.0.0',
      layer_justifications: {},
      compatibility: {
        questions: all(registry.domain.questions),
        dimensions: all(registry.domain.dimensions),
        policies: all(registry.domain.policies),
      },
      semantic_tags: [],
      fusion_requirements: [],
    };

    const violations = rejectionOf({ ...sources, registry });
    assert.deepEqual(violations, [
      'Anti-universality violated by Universal.method: scores ≥ 0.9 on @q, @d and @p for all 120 combinations scanned',
    ]);
  });

  it('accepts a method that misses universality on one axis', async () => {
    const config = await testConfig();
    const finding = scanUniversality(config.rubric, config.registry, config.registry.methods[CAUSAL], 0.9);
    assert.equal(finding.universal, false);
    assert.equal(finding.combinationsScanned, 120);
    assert.equal(finding.minQuestion, 0);
  });

  it('rejects an omitted required layer without a justification', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const registry = RegistryFileSchema.parse(sources.registry);
    registry.methods[TRACE_FORMATTER].layer_justifications = {};

    const violations = rejectionOf({ ...sources, registry });
    assert.deepEqual(violations, [
      'TraceFormatter.format_trace (utility) omits required layer @chain without a justification',
    ]);
  });

  it('collects every violation before failing', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const rubric = RubricFileSchema.parse(sources.rubric);
    rubric.base.weights.w_th = 0.5;
    rubric.meta.weights.cost = 0.2;

    const violations = rejectionOf({ ...sources, rubric });
    assert.equal(violations.length, 2);
    assert.match(violations[0], /^layer_rubric\.json: base weights sum to/);
    assert.match(violations[1], /^layer_rubric\.json: meta weights sum to/);
  });

  it('reports schema errors with their path', async () => {
    const sources = await readConfigSources(DEFAULT_CONFIG_DIR);
    const violations = rejectionOf({ ...sources, policy: { version: '1' } });
    assert.ok(violations.some(v => v.startsWith('validation_policy.json: role_thresholds:')));
  });
});

describe('layer requirements', () => {
  it('unregistered methods get the role requirements', async () => {
    const config = await testConfig();
    assert.deepEqual(resolveActiveLayers(config, 'utility', null), ['BASE', 'CHAIN', 'META']);
  });

  it('separates justified and missing gaps', () => {
    const coverage = layerCoverage(['BASE', 'CHAIN', 'META'], ['BASE'], { CHAIN: 'not wired', META: '  ' });
    assert.deepEqual(coverage.justified, ['CHAIN']);
    assert.deepEqual(coverage.missing, ['META']);
  });
});
