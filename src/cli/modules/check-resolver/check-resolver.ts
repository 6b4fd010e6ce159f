/**
 * Check name resolution.
 */

import type { CheckDefinition, CheckDefinitions } from '../types.ts';

/** A check name paired with the definition that will run for it. */
export type ResolvedCheck = readonly [name: string, definition: CheckDefinition];

/**
 * Definition used for names that are not configured: the name itself is run
 * as a shell command.
 */
export function checkFromCommand(command: string): CheckDefinition {
  return { run: command, description: command, env: {} };
}

/**
 * Look up one name, never failing.
 */
export function resolveCheck(name: string, definitions: CheckDefinitions): CheckDefinition {
  const definition = Object.hasOwn(definitions, name) ? definitions[name] : undefined;
  return definition ?? checkFromCommand(name);
}

/**
 * Resolve each requested name, preserving order and duplicates.
 */
export function resolveChecks(
  names: readonly string[],
  definitions: CheckDefinitions,
): ResolvedCheck[] {
  return names.map((name) => [name, resolveCheck(name, definitions)] as const);
}
