/**
 * CALIBRATION ENGINE CONTRACT: C1
 *
 * Core types shared by every calibration step:
 * - Canonical layers (closed set of 8)
 * - Method roles
 * - Calibration subject + context
 * - Layer scores
 */

// ═══════════════════════════════════════════════════════════════
// CANONICAL LAYERS
// ═══════════════════════════════════════════════════════════════

export const CANONICAL_LAYERS = [
  'BASE',
  'CHAIN',
  'UNIT',
  'QUESTION',
  'DIMENSION',
  'POLICY',
  'CONGRUENCE',
  'META',
] as const;

export type CanonicalLayer = typeof CANONICAL_LAYERS[number];

export const LAYER_SYMBOLS: Record<CanonicalLayer, string> = {
  BASE: '@b',
  CHAIN: '@chain',
  UNIT: '@u',
  QUESTION: '@q',
  DIMENSION: '@d',
  POLICY: '@p',
  CONGRUENCE: '@C',
  META: '@m',
};

export const CONTEXTUAL_LAYERS: readonly CanonicalLayer[] = ['QUESTION', 'DIMENSION', 'POLICY'];

export function layerSymbol(layer: CanonicalLayer): string {
  return LAYER_SYMBOLS[layer];
}

export function isCanonicalLayer(value: string): value is CanonicalLayer {
  return CANONICAL_LAYERS.some(layer => layer === value);
}

/**
 * Resolve "@u" style symbols (config files) to layer identities.
 */
export function layerFromSymbol(symbol: string): CanonicalLayer | null {
  for (const layer of CANONICAL_LAYERS) {
    if (LAYER_SYMBOLS[layer] === symbol) return layer;
  }
  return null;
}

/**
 * Canonical ordering index, used for every deterministic trace.
 */
export function layerOrder(layer: CanonicalLayer): number {
  return CANONICAL_LAYERS.indexOf(layer);
}

export function sortLayers(layers: Iterable<CanonicalLayer>): CanonicalLayer[] {
  return Array.from(new Set(layers)).sort((a, b) => layerOrder(a) - layerOrder(b));
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}

// ═══════════════════════════════════════════════════════════════
// ROLES
// ═══════════════════════════════════════════════════════════════

export const METHOD_ROLES = [
  'analyzer',
  'processor',
  'ingest',
  'structure',
  'extract',
  'aggregate',
  'report',
  'utility',
  'orchestrator',
  'meta',
  'transform',
] as const;

export type MethodRole = typeof METHOD_ROLES[number];

export function isMethodRole(value: string): value is MethodRole {
  return METHOD_ROLES.some(role => role === value);
}

/**
 * Build a total role table. Listing every role keeps it exhaustive.
 */
export function mapRoles<T>(fn: (role: MethodRole) => T): Record<MethodRole, T> {
  return {
    analyzer: fn('analyzer'),
    processor: fn('processor'),
    ingest: fn('ingest'),
    structure: fn('structure'),
    extract: fn('extract'),
    aggregate: fn('aggregate'),
    report: fn('report'),
    utility: fn('utility'),
    orchestrator: fn('orchestrator'),
    meta: fn('meta'),
    transform: fn('transform'),
  };
}

// ═══════════════════════════════════════════════════════════════
// SUBJECT
// ═══════════════════════════════════════════════════════════════

export interface ExecutionContext {
  readonly questionId: string;
  readonly dimension: string;
  readonly policyArea: string;
  readonly unitQuality: number;   // U ∈ [0,1]
}

export interface CalibrationSubject {
  readonly methodId: string;
  readonly nodeId: string;
  readonly role: MethodRole;
  readonly context: ExecutionContext;
  readonly asOf: string;          // ISO timestamp stamped on the certificate
}

export function createSubject(input: {
  methodId: string;
  nodeId?: string;
  role: MethodRole;
  context: ExecutionContext;
  asOf: string;
}): CalibrationSubject {
  if (!input.methodId) throw new Error('Subject requires a methodId');
  if (!(input.context.unitQuality >= 0 && input.context.unitQuality <= 1)) {
    throw new Error(`unitQuality must be in [0,1], got ${input.context.unitQuality}`);
  }

  return Object.freeze({
    methodId: input.methodId,
    nodeId: input.nodeId ?? input.methodId,
    role: input.role,
    context: Object.freeze({ ...input.context }),
    asOf: input.asOf,
  });
}

export function instanceIdOf(subject: CalibrationSubject): string {
  return `${subject.methodId}@${subject.nodeId}`;
}

// ═══════════════════════════════════════════════════════════════
// LAYER SCORE
// ═══════════════════════════════════════════════════════════════

export type EvidenceSnapshot = Readonly<Record<string, unknown>>;

export interface LayerScore {
  readonly layer: CanonicalLayer;
  readonly value: number;                              // ∈ [0,1]
  readonly components: Readonly<Record<string, number>>;
  readonly rationale: string;
  readonly formula: string;
  readonly evidence: EvidenceSnapshot;
  readonly hardGate?: string;                          // gate name when forced to 0
}

export function createLayerScore(score: {
  layer: CanonicalLayer;
  value: number;
  components?: Record<string, number>;
  rationale: string;
  formula: string;
  evidence?: Record<string, unknown>;
  hardGate?: string;
}): LayerScore {
  if (!(score.value >= 0 && score.value <= 1)) {
    throw new RangeError(`Layer ${layerSymbol(score.layer)} value ${score.value} out of range [0,1]`);
  }

  const out: LayerScore = {
    layer: score.layer,
    value: score.value,
    components: Object.freeze({ ...(score.components ?? {}) }),
    rationale: score.rationale,
    formula: score.formula,
    evidence: Object.freeze({ ...(score.evidence ?? {}) }),
    ...(score.hardGate ? { hardGate: score.hardGate } : {}),
  };
  return Object.freeze(out);
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function round4(x: number): number {
  return Math.round(x * 10000) / 10000;
}

export function fmt(x: number): string {
  return x.toFixed(4);
}

/**
 * Lookup for tables keyed by caller-supplied ids. Inherited keys
 * ('toString', 'constructor') miss.
 */
export function ownEntry<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export const VALIDATOR_VERSION = '1.0.0';
