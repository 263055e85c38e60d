/**
 * Failure helpers shared by the reader, extractors and consolidator
 */

import type { Failure, FailureKind, FileFailure, Result } from '@/lib/types';

/** Thrown for configuration and usage problems (never for per-file failures) */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: FailureKind, reason: string, names?: string[]): Result<T> {
  const failure: Failure = names ? { kind, reason, names } : { kind, reason };
  return { ok: false, failure };
}

/** Extract a message from anything thrown by a codec */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * One-line, operator-facing description of a file failure
 */
export function describeFailure(failure: FileFailure): string {
  const where = [failure.condition, failure.fileName, failure.blockLabel]
    .filter((part): part is string => part !== undefined && part !== '')
    .join(' / ');
  return `${where}: ${failure.reason}`;
}
