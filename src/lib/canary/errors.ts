/**
 * Error types for canary operations.
 * Gateway failures keep their upstream status code; nothing here retries.
 */

export type CanaryErrorCode =
  | "NOT_FOUND"
  | "MALFORMED_WORKLOAD"
  | "INVALID_TAG"
  | "GATEWAY_ERROR"
  | "CANCELLED";

/**
 * Base error class for canary-switch errors
 */
export class CanarySwitchError extends Error {
  constructor(
    message: string,
    public readonly code: CanaryErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "CanarySwitchError";
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A named Deployment, Service or Endpoints object does not exist
 */
export class NotFoundError extends CanarySwitchError {
  constructor(
    public readonly kind: string,
    public readonly resourceName: string,
    cause?: Error
  ) {
    super(`${kind} "${resourceName}" not found`, "NOT_FOUND", cause);
    this.name = "NotFoundError";
  }
}

/**
 * Workload declares no containers
 */
export class MalformedWorkloadError extends CanarySwitchError {
  constructor(public readonly workloadName: string) {
    super(`Deployment "${workloadName}" declares no containers`, "MALFORMED_WORKLOAD");
    this.name = "MalformedWorkloadError";
  }
}

export class InvalidTagError extends CanarySwitchError {
  constructor(public readonly tag: string) {
    super("Image tag must be a non-empty string", "INVALID_TAG");
    this.name = "InvalidTagError";
  }
}

/**
 * Transport, auth or conflict failure reported by the cluster
 */
export class GatewayError extends CanarySwitchError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error
  ) {
    super(message, "GATEWAY_ERROR", cause);
    this.name = "GatewayError";
  }
}

export class CancelledError extends CanarySwitchError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}
