export type ErrorCode =
  | "CONFIG_INVALID"
  | "GENERATION_FAILED"
  | "EXECUTION_FAILED"
  | "UNSAFE_COMMAND_REFUSED"
  | "INPUT_FAILURE";

export class AskShellError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AskShellError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export class GenerationError extends AskShellError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_FAILED", message, options);
  }
}

/**
 * The command ran (or tried to) and did not exit cleanly. Whatever it wrote
 * before failing is kept in `output`.
 */
export class ExecutionError extends AskShellError {
  readonly output: string;
  readonly exitCode: number | null;

  constructor(message: string, output: string, exitCode: number | null, options?: { cause?: unknown }) {
    super("EXECUTION_FAILED", message, options);
    this.output = output;
    this.exitCode = exitCode;
  }
}

/**
 * Raised by the executor when a dangerous command shows up without a strict
 * confirmation for that exact command.
 */
export class UnsafeCommandError extends AskShellError {
  readonly reason: string;

  constructor(reason: string) {
    super("UNSAFE_COMMAND_REFUSED", `refused unsafe command: ${reason}`);
    this.reason = reason;
  }
}

export class InputFailureError extends AskShellError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INPUT_FAILURE", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
