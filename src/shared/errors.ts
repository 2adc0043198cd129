import type { ValidationError } from "../types/validation.js";

export enum ComposeErrorCode {
  INVALID_DESCRIPTOR = "INVALID_DESCRIPTOR",
  UNKNOWN_PROFILE = "UNKNOWN_PROFILE",
  UNKNOWN_OVERRIDE_KEY = "UNKNOWN_OVERRIDE_KEY",
  PROFILE_LOAD_FAILED = "PROFILE_LOAD_FAILED",
  CATALOG_LOAD_FAILED = "CATALOG_LOAD_FAILED",
  INVALID_TOOL = "INVALID_TOOL",
}

/** Fail-fast error for programming and data-file mistakes; validation problems travel as ValidationError values instead. */
export class ComposeError extends Error {
  readonly code: ComposeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ComposeErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ComposeError";
    this.code = code;
    this.context = context;
  }

  /** Throwable form of a failed tryCompose: an unknown profile, else the unknown override paths. */
  static fromCompose(profile: string, errors: readonly ValidationError[]): ComposeError {
    const [first] = errors;
    if (first?.kind === "unknown_profile") {
      return new ComposeError(ComposeErrorCode.UNKNOWN_PROFILE, first.message, { profile: first.profile, known: first.known });
    }
    return new ComposeError(
      ComposeErrorCode.UNKNOWN_OVERRIDE_KEY,
      `Profile "${profile}" overrides keys missing from the baseline`,
      { paths: errors.map((e) => ("path" in e ? e.path : e.message)) },
    );
  }
}
