import { CommanderError } from "commander";

export type CliOutputFormat = "text" | "json";
export const CLI_OUTPUT_FORMATS: readonly CliOutputFormat[] = ["text", "json"];

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface CodegenErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class CodegenError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: CodegenErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class InvalidNameError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "INVALID_NAME", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class UnknownExtensionError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "UNKNOWN_EXTENSION", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ConfigError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class FileWriteError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "FILE_WRITE", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class MissingBaselineError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "MISSING_BASELINE", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class SubprocessFailureError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "SUBPROCESS_FAILURE", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class SchemaOutOfDateError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "SCHEMA_OUT_OF_DATE", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class ExecutionError extends CodegenError {
  constructor(message: string, options: CodegenErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export function normalizeError(error: unknown): CodegenError {
  if (error instanceof CodegenError) return error;
  if (error instanceof CommanderError) {
    return new UserInputError(error.message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function toJsonErrorPayload(error: CodegenError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
