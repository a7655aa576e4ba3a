/**
 * Canonical JSON + hashing for certificates and configuration.
 *
 * Keys sorted recursively, `undefined` members dropped, arrays kept in order.
 */

import * as crypto from 'crypto';

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    const out: Record<string, unknown> = {};
    for (const [key, member] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (member === undefined) continue;
      out[key] = canonicalize(member);
    }
    return out;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(payload: string): string {
  return crypto.createHash('sha256').update(payload).digest('hex');
}

/**
 * "sha256:<hex>" over the canonical JSON of `value`.
 */
export function taggedHash(value: unknown): string {
  return `sha256:${sha256Hex(canonicalJson(value))}`;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
    Object.freeze(value);
  }
  return value;
}
