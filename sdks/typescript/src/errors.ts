export type ErrorStage = "headers" | "serialization" | "transport" | "status" | "deserialization";

export class ClientError extends Error {
  public readonly stage: ErrorStage;

  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ClientError";
    this.stage = stage;
  }
}

export class ApiError extends ClientError {
  public readonly code: string;
  public readonly httpStatus: number;
  public readonly details?: Record<string, unknown>;
  public readonly body: string;

  constructor(options: {
    code: string;
    httpStatus: number;
    message: string;
    body: string;
    details?: Record<string, unknown>;
  }) {
    super("status", options.message);
    this.name = "ApiError";
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.details = options.details;
    this.body = options.body;
  }
}

export class RateLimitedError extends ApiError {
  public readonly retryAfterMs?: number;

  constructor(options: ConstructorParameters<typeof ApiError>[0] & { retryAfterMs?: number }) {
    super(options);
    this.name = "RateLimitedError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class InvalidBodyError extends ApiError {
  constructor(options: ConstructorParameters<typeof ApiError>[0]) {
    super(options);
    this.name = "InvalidBodyError";
  }
}

export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid client configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}

export function isRateLimited(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}

export function isInvalidBody(error: unknown): error is InvalidBodyError {
  return error instanceof InvalidBodyError;
}
