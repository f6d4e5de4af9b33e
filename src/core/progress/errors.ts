/**
 * Error types raised by the progress engine.
 *
 * - ConfigurationError: a session configuration failed validation; thrown from
 *   `resetProgress` before any state changes
 * - SinkWriteError: a console or file write failed; never thrown to the caller,
 *   only logged, so a broken sink cannot abort the job it reports on
 *
 * @module progress/errors
 */

import type { ZodIssue } from "zod";

/**
 * One failed validation rule.
 */
export interface ConfigurationIssue {
  /** Dotted path of the offending field, empty for the whole object */
  path: string;
  message: string;
}

export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    super(`Invalid progress configuration: ${issues.map(formatIssue).join("; ")}`);
    this.issues = issues;
  }

  /**
   * Build from zod validation issues.
   */
  static fromZodIssues(issues: ZodIssue[]): ConfigurationError {
    return new ConfigurationError(issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })));
  }
}

function formatIssue(issue: ConfigurationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export type SinkKind = "console" | "file";

export class SinkWriteError extends Error {
  override readonly name = "SinkWriteError";
  readonly sink: SinkKind;
  readonly target: string;

  constructor(sink: SinkKind, target: string, cause: unknown) {
    super(`Failed writing progress to ${sink} (${target}): ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.sink = sink;
    this.target = target;
  }
}
