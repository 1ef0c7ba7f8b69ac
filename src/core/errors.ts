export class ArchiverError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ArchiverError";
  }
}

export class ValidationError extends ArchiverError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ValidationError";
  }
}

export class InputNotFoundError extends ValidationError {
  constructor(public readonly inputPath: string) {
    super(`Input folder does not exist: ${inputPath}`);
    this.name = "InputNotFoundError";
  }
}

export class NotADirectoryError extends ValidationError {
  constructor(public readonly inputPath: string) {
    super(`Input path is not a directory: ${inputPath}`);
    this.name = "NotADirectoryError";
  }
}

export class ConfigError extends ArchiverError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ToolUnavailableError extends ArchiverError {
  constructor(
    public readonly tool: string,
    cause?: unknown,
  ) {
    super(`${tool} executable not found in PATH`, cause);
    this.name = "ToolUnavailableError";
  }
}

export class ExecutionError extends ArchiverError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ExecutionError";
  }
}

export class VerificationError extends ArchiverError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "VerificationError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  validation: "VALIDATION_ERROR",
  config: "CONFIG_ERROR",
  tool: "TOOL_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends ArchiverError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
