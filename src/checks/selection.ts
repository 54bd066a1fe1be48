/**
 * selection.ts - Resolves user-supplied check names into the checks to run
 *
 * Vocabulary:
 *   all            → black, isort, flake8
 *   black          → black
 *   isort          → isort
 *   lint, flake8   → flake8
 *
 * Names are read left to right. "all" short-circuits: once it appears the
 * full set runs and the rest of the list is not looked at, so
 * ["all", "typo"] is valid while ["typo", "all"] is not.
 */

import { CheckUsageError } from "./errors";
import { ALL_CHECKS, type CheckName } from "./types";

const CHECK_ALIASES: ReadonlyMap<string, CheckName> = new Map<string, CheckName>([
  ["black", "black"],
  ["isort", "isort"],
  ["lint", "flake8"],
  ["flake8", "flake8"],
]);

/** Accepted names, in the order the help text lists them */
export const CHECK_VOCABULARY = ["all", "black", "isort", "lint", "flake8"] as const;

/**
 * Resolves requested check names.
 *
 * @param requested - Names from the command line (may be empty)
 * @returns Checks to run, deduplicated, in first-mention order
 * @throws CheckUsageError for a name outside the vocabulary
 */
export function resolveChecks(requested: readonly string[]): CheckName[] {
  if (requested.length === 0) {
    return [...ALL_CHECKS];
  }

  const resolved: CheckName[] = [];

  for (const name of requested) {
    if (name === "all") {
      return [...ALL_CHECKS];
    }

    const check = CHECK_ALIASES.get(name);
    if (!check) {
      throw new CheckUsageError(
        `Unknown check '${name}'. Valid checks: ${CHECK_VOCABULARY.join(", ")}.`
      );
    }

    // "lint flake8" would otherwise run Flake8 twice
    if (!resolved.includes(check)) {
      resolved.push(check);
    }
  }

  return resolved;
}
