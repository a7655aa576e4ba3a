/**
 * METHOD ID RULES
 *
 * Executors and plans refer to methods by display ids ("D1Q1_Executor");
 * the registry, intrinsic scores and thresholds are keyed by catalogue id.
 * `aliases` in method_registry.json maps one to the other.
 */

import { ownEntry } from '../contracts/calibration.contract.js';
import type { MethodRegistry } from '../contracts/config.contract.js';

export function canonicalMethodId(registry: Pick<MethodRegistry, 'aliases'>, methodId: string): string {
  return ownEntry(registry.aliases, methodId) ?? methodId;
}

/**
 * Load-time check: every alias lands on a registered method and no alias
 * hides a registered id.
 */
export function checkAliases(
  file: string,
  aliases: Readonly<Record<string, string>>,
  methods: Readonly<Record<string, unknown>>
): string[] {
  const violations: string[] = [];
  for (const alias of Object.keys(aliases).sort()) {
    const target = aliases[alias];
    if (ownEntry(methods, alias) !== undefined) {
      violations.push(`${file}: alias '${alias}' shadows a registered method`);
    } else if (ownEntry(methods, target) === undefined) {
      violations.push(`${file}: alias '${alias}' points to unregistered method '${target}'`);
    }
  }
  return violations;
}
