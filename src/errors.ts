export enum ErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  CONFIGURATION = "CONFIGURATION",
  AUTHENTICATION = "AUTHENTICATION",
  RATE_LIMIT = "RATE_LIMIT",
  UPSTREAM = "UPSTREAM",
  NETWORK = "NETWORK",
  TOOL_NOT_FOUND = "TOOL_NOT_FOUND",
  EXECUTION = "EXECUTION",
  INTERRUPTED = "INTERRUPTED",
  UNKNOWN = "UNKNOWN",
}

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  aborted: 2,
  invalidInput: 64,
  network: 69,
  rateLimit: 75,
  upstream: 76,
  authentication: 77,
  configuration: 78,
  toolNotFound: 127,
  interrupted: 130,
} as const;

export class SmartFfmpegError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    exitCode: number,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SmartFfmpegError";
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;
  }
}

export class InvalidInputError extends SmartFfmpegError {
  constructor(message: string) {
    super(ErrorCode.INVALID_INPUT, message, EXIT_CODES.invalidInput);
    this.name = "InvalidInputError";
  }
}

export class ConfigurationError extends SmartFfmpegError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION, message, EXIT_CODES.configuration, context);
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends SmartFfmpegError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(ErrorCode.AUTHENTICATION, message, EXIT_CODES.authentication, {
      status,
    });
    this.name = "AuthenticationError";
    this.status = status;
  }
}

export class RateLimitError extends SmartFfmpegError {
  constructor(message: string) {
    super(ErrorCode.RATE_LIMIT, message, EXIT_CODES.rateLimit, { status: 429 });
    this.name = "RateLimitError";
  }
}

export class UpstreamError extends SmartFfmpegError {
  readonly status?: number;

  constructor(message: string, status?: number, context?: Record<string, unknown>) {
    super(ErrorCode.UPSTREAM, message, EXIT_CODES.upstream, { status, ...context });
    this.name = "UpstreamError";
    this.status = status;
  }
}

export class NetworkError extends SmartFfmpegError {
  constructor(message: string) {
    super(ErrorCode.NETWORK, message, EXIT_CODES.network);
    this.name = "NetworkError";
  }
}

export class ToolNotFoundError extends SmartFfmpegError {
  readonly tool: string;

  constructor(tool: string) {
    super(
      ErrorCode.TOOL_NOT_FOUND,
      `'${tool}' command not found. Is it installed and on your PATH?`,
      EXIT_CODES.toolNotFound,
      { tool }
    );
    this.name = "ToolNotFoundError";
    this.tool = tool;
  }
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export class ExecutionError extends SmartFfmpegError {
  readonly result: ExecutionResult;

  constructor(result: ExecutionResult, signal?: string) {
    super(
      ErrorCode.EXECUTION,
      signal
        ? `Command was terminated by ${signal} (exit code ${result.exitCode}).`
        : `Command exited with code ${result.exitCode}.`,
      result.exitCode,
      { signal }
    );
    this.name = "ExecutionError";
    this.result = result;
  }
}

export class InterruptedError extends SmartFfmpegError {
  constructor(message = "Interrupted by user.") {
    super(ErrorCode.INTERRUPTED, message, EXIT_CODES.interrupted);
    this.name = "InterruptedError";
  }
}

export function toSmartFfmpegError(err: unknown): SmartFfmpegError {
  if (err instanceof SmartFfmpegError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SmartFfmpegError(ErrorCode.UNKNOWN, message, EXIT_CODES.failure, {
    cause: err instanceof Error ? err.name : typeof err,
  });
}
