import type { ErrorCode } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  SUBJECT_FAILED: 1,
  INVALID_ARGS: 2,
  CONFIG_INVALID: 3,
  PRECONDITION_FAILED: 4,
  UNEXPECTED: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: ErrorCode | undefined): ExitCode {
  switch (code) {
    case "SUBJECT_FAILED":
      return EXIT.SUBJECT_FAILED;
    case "USAGE_INVALID":
      return EXIT.INVALID_ARGS;
    case "CONFIG_INVALID":
      return EXIT.CONFIG_INVALID;
    case "PRECONDITION_FAILED":
      return EXIT.PRECONDITION_FAILED;
    default:
      return EXIT.UNEXPECTED;
  }
}
