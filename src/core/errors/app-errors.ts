export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = "INTERNAL_ERROR",
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

export class SpintaxSyntaxError extends ValidationError {
  constructor(details: string[]) {
    super(`Invalid spintax: ${details.join("; ")}`, details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, statusCode: number = 500) {
    super(message, statusCode, "CONFIGURATION_ERROR");
  }
}

export class NoServerAvailableError extends ConfigurationError {
  constructor(message = "No enabled SMTP server in the pool") {
    super(message, 503);
  }
}

export type BounceType = "hard" | "soft";

export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly serverName: string,
    public readonly bounceType?: BounceType,
    options?: { cause?: unknown },
  ) {
    super(message, 502, "TRANSPORT_ERROR");
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export class TrackingResolutionError extends AppError {
  constructor(message: string) {
    super(message, 404, "TRACKING_NOT_RESOLVED");
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid dispatch transition ${from} -> ${to}`, 500, "INVALID_TRANSITION");
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
