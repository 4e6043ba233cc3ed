export type ErrorCode =
  | "USAGE_INVALID"
  | "CONFIG_INVALID"
  | "PRECONDITION_FAILED"
  | "COMMAND_FAILED"
  | "SUBJECT_FAILED";

/** Base class for every failure the CLI knows how to report. */
export class LgiError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad invocation: unknown analysis level, malformed CPU count. */
export class UsageError extends LgiError {
  constructor(message: string) {
    super("USAGE_INVALID", message);
  }
}

/** Missing credential, missing environment variable or a config file that fails its schema. */
export class ConfigurationError extends LgiError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** An upstream stage left the output directory in a state we cannot work from. */
export class PreconditionError extends LgiError {
  constructor(message: string) {
    super("PRECONDITION_FAILED", message);
  }
}

export class CommandFailedError extends LgiError {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super("COMMAND_FAILED", `Non zero return code: ${exitCode}`);
    this.exitCode = exitCode;
  }
}

/**
 * Raised once a subject's timepoints have all been attempted and at least one
 * of them failed. Carries the session labels, not the full timepoint names.
 */
export class SubjectFailedError extends LgiError {
  readonly subject: string;
  readonly failedSessions: string[];

  constructor(subject: string, failedSessions: string[]) {
    super("SUBJECT_FAILED", `Timepoints failed for ${subject}: ${failedSessions.join(" ")}`);
    this.subject = subject;
    this.failedSessions = failedSessions;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
