import type { FailureReason } from "./types.js";

export type ErrorCode =
  | "CONFIG_ERROR"
  | "BREW_COMMAND_FAILED"
  | "BATCH_IN_PROGRESS"
  | "EMPTY_BATCH"
  | "UNKNOWN_PROMPT"
  | "INVALID_CREDENTIAL"
  | "UNSUPPORTED_OPERATION";

export class TapdeckError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TapdeckError";
  }
}

export class ConfigError extends TapdeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/**
 * Raised by the brew repository when a command fails; the reason is already
 * classified so callers can turn it straight into an outcome.
 */
export class BrewCommandError extends TapdeckError {
  constructor(public readonly reason: FailureReason) {
    super(reason.message, "BREW_COMMAND_FAILED", { failure: reason.code });
    this.name = "BrewCommandError";
  }
}

export class BatchInProgressError extends TapdeckError {
  constructor(label: string) {
    super(`A batch is already running: ${label}`, "BATCH_IN_PROGRESS");
    this.name = "BatchInProgressError";
  }
}

export class EmptyBatchError extends TapdeckError {
  constructor() {
    super("Nothing selected", "EMPTY_BATCH");
    this.name = "EmptyBatchError";
  }
}

export class UnknownPromptError extends TapdeckError {
  constructor(promptId: string) {
    super(`No open password prompt with id ${promptId}`, "UNKNOWN_PROMPT", { promptId });
    this.name = "UnknownPromptError";
  }
}

export class InvalidCredentialError extends TapdeckError {
  constructor() {
    super("Password must not be empty", "INVALID_CREDENTIAL");
    this.name = "InvalidCredentialError";
  }
}

export class UnsupportedOperationError extends TapdeckError {
  constructor(message: string) {
    super(message, "UNSUPPORTED_OPERATION");
    this.name = "UnsupportedOperationError";
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
