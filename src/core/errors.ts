/**
 * Custom error types for routefs
 */

import { types } from "util";

export class RouteFsError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RouteFsError";
    Object.setPrototypeOf(this, RouteFsError.prototype);
  }
}

/**
 * Route is empty or names a partition that was never registered.
 */
export class RouteError extends RouteFsError {
  constructor(public route: readonly string[]) {
    super(
      route.length === 0
        ? "Route is empty"
        : `Unknown partition: ${route[0]}`,
      "UNKNOWN_PARTITION",
      404,
      { route: [...route] }
    );
    this.name = "RouteError";
    Object.setPrototypeOf(this, RouteError.prototype);
  }
}

export class ReadError extends RouteFsError {
  constructor(
    message: string,
    public path: string,
    public cause?: Error
  ) {
    const osCode = errnoCode(cause);
    super(
      `Read failed: ${message}`,
      "READ_ERROR",
      osCode === "ENOENT" ? 404 : 500,
      { path, osCode }
    );
    this.name = "ReadError";
    Object.setPrototypeOf(this, ReadError.prototype);
  }
}

export class UnsupportedTypeError extends RouteFsError {
  constructor(public path: string, public entryType: string) {
    super(
      `Unsupported entry type (${entryType}): ${path}`,
      "UNSUPPORTED_TYPE",
      415,
      { path, entryType }
    );
    this.name = "UnsupportedTypeError";
    Object.setPrototypeOf(this, UnsupportedTypeError.prototype);
  }
}

export class UnsupportedOperationError extends RouteFsError {
  constructor(public operation: string) {
    super(
      `Operation not supported: ${operation}`,
      "UNSUPPORTED_OPERATION",
      501,
      { operation }
    );
    this.name = "UnsupportedOperationError";
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}

/**
 * A change arrived with a timestamp older than the newest logged entry.
 */
export class ChangeOrderError extends RouteFsError {
  constructor(public timestamp: number, public latest: number) {
    super(
      `Change timestamp ${timestamp} is older than the latest entry (${latest})`,
      "CHANGE_ORDER",
      409,
      { timestamp, latest }
    );
    this.name = "ChangeOrderError";
    Object.setPrototypeOf(this, ChangeOrderError.prototype);
  }
}

export class ValidationError extends RouteFsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      `Validation failed: ${message}`,
      "VALIDATION_ERROR",
      400,
      details
    );
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function errnoCode(err: Error | undefined): string | undefined {
  if (err && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Errors thrown by Node's own modules fail `instanceof Error` under a VM
 * context such as Jest's, so recognise them by their internal tag.
 */
export function toError(value: unknown): Error {
  return types.isNativeError(value) ? value : new Error(String(value));
}
