/**
 * Enablement evaluation for checks.
 *
 * Predicates are evaluated in a fixed order (file, directory, command) and the
 * first unsatisfied one decides the outcome. Evaluation never throws.
 */

import path from 'node:path';

import { commandExists } from '../binary-checker/binary-checker.ts';
import { directoryExists, pathExists } from '../file-system/file-system.ts';
import type { CheckDefinition } from '../types.ts';

/** Outcome of an enablement evaluation. */
export type SkipDecision = { readonly skip: false } | { readonly skip: true; readonly reason: string };

/** Filesystem and PATH probes, replaceable in tests. */
export interface EnablementProbes {
  readonly pathExists: (target: string) => Promise<boolean>;
  readonly directoryExists: (target: string) => Promise<boolean>;
  readonly commandExists: (name: string) => Promise<boolean>;
}

const defaultProbes: EnablementProbes = {
  pathExists,
  directoryExists,
  commandExists: (name) => commandExists(name),
};

const RUN: SkipDecision = { skip: false };

function skip(reason: string): SkipDecision {
  return { skip: true, reason };
}

/**
 * Decide whether `check` should be skipped.
 *
 * Without a repository root, file and directory predicates are unsatisfied;
 * the command predicate is still evaluated.
 *
 * @param check - Definition whose `enabledIf` is evaluated.
 * @param repoRoot - Root used to resolve relative predicate paths.
 * @param probes - Optional probe overrides.
 */
export async function shouldSkipCheck(
  check: CheckDefinition,
  repoRoot: string | undefined,
  probes: EnablementProbes = defaultProbes,
): Promise<SkipDecision> {
  const condition = check.enabledIf;
  if (condition === undefined) {
    return RUN;
  }

  if (condition.fileExists !== undefined) {
    if (repoRoot === undefined) {
      return skip(`No repository root to resolve ${condition.fileExists}`);
    }
    if (!(await probes.pathExists(path.resolve(repoRoot, condition.fileExists)))) {
      return skip(`File not found: ${condition.fileExists}`);
    }
  }

  if (condition.dirExists !== undefined) {
    if (repoRoot === undefined) {
      return skip(`No repository root to resolve ${condition.dirExists}`);
    }
    if (!(await probes.directoryExists(path.resolve(repoRoot, condition.dirExists)))) {
      return skip(`Directory not found: ${condition.dirExists}`);
    }
  }

  if (condition.commandExists !== undefined) {
    if (!(await probes.commandExists(condition.commandExists))) {
      return skip(`Command not found on PATH: ${condition.commandExists}`);
    }
  }

  return RUN;
}

/**
 * Boolean form of `shouldSkipCheck`.
 */
export async function isCheckEnabled(
  check: CheckDefinition,
  repoRoot?: string,
  probes?: EnablementProbes,
): Promise<boolean> {
  return !(await shouldSkipCheck(check, repoRoot, probes)).skip;
}
