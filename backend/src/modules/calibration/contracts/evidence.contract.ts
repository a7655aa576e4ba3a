/**
 * EVIDENCE CONTRACT: C3
 *
 * Per-layer evidence sections supplied by the caller.
 * Each section is parsed on demand by the evaluator that needs it;
 * a missing section or field fails closed with EvidenceError.
 */

import { z } from 'zod';
import type { CanonicalLayer } from './calibration.contract.js';
import { EvidenceError } from './calibration.errors.js';

// ═══════════════════════════════════════════════════════════════
// SECTION SCHEMAS
// ═══════════════════════════════════════════════════════════════

export const ChainEvidenceSchema = z.object({
  providedInputs: z.record(z.string(), z.string()),   // name → provided type
  schemaDeviations: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([]),
});

export const UnitEvidenceSchema = z.object({
  structuralCompliance: z.number().min(0).max(1),
  indicatorMatrixPresent: z.boolean(),
});

export const CongruenceEvidenceSchema = z.object({
  interplayId: z.string().min(1),
  providedInputs: z.array(z.string()),
});

export const MetaEvidenceSchema = z.object({
  formulaExported: z.boolean(),
  traceComplete: z.boolean(),
  logsConformSchema: z.boolean(),
  versionTagged: z.boolean(),
  configHashMatches: z.boolean(),
  signatureValid: z.boolean(),
  runtimeMs: z.number().min(0),
  memoryMb: z.number().min(0),
});

export type ChainEvidence = z.infer<typeof ChainEvidenceSchema>;
export type UnitEvidence = z.infer<typeof UnitEvidenceSchema>;
export type CongruenceEvidence = z.infer<typeof CongruenceEvidenceSchema>;
export type MetaEvidence = z.infer<typeof MetaEvidenceSchema>;

/**
 * Evidence bundle as it arrives from the supplier.
 * Sections stay `unknown` until the owning evaluator parses them.
 */
export interface CalibrationEvidence {
  readonly chain?: unknown;
  readonly unit?: unknown;
  readonly congruence?: unknown;
  readonly meta?: unknown;
}

export const CalibrationEvidenceSchema = z.object({
  chain: z.unknown().optional(),
  unit: z.unknown().optional(),
  congruence: z.unknown().optional(),
  meta: z.unknown().optional(),
}).default({});

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

/**
 * Parse one evidence section. The first failing path becomes the
 * EvidenceError field, prefixed by the section name.
 */
export function parseEvidenceSection<T extends z.ZodTypeAny>(
  layer: CanonicalLayer,
  section: string,
  schema: T,
  raw: unknown
): z.output<T> {
  if (raw === undefined || raw === null) {
    throw new EvidenceError(layer, section);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${section}.${issue.path.join('.')}` : section;
    throw new EvidenceError(layer, path, issue?.message);
  }
  return result.data;
}
