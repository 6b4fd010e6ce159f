/**
 * @file CLI — Executor module re-exports
 *
 * Centralized re-export of execution building blocks (process management,
 * enablement, resolution, result building). Keep this file as a thin
 * re-export layer with no executable behavior.
 */

export * from './binary-checker/binary-checker.ts';
export * from './check-resolver/check-resolver.ts';
export * from './file-system/file-system.ts';
export * from './mode-detector/mode-detector.ts';
export * from './process-manager/process-manager.ts';
export * from './result-builder/result-builder.ts';
export * from './skip-checker/skip-checker.ts';
export type * from './types.ts';
