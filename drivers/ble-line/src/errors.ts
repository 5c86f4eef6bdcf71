/** Numeric codes carried by `error` events. */
export const StreamErrorCode = {
  Info: 0,
  Configuration: 1,
  ConnectTimeout: 2,
  SubscribeTimeout: 3,
  Transport: 4,
  LinkLost: 5,
  WriteFailed: 6,
  ReconnectExhausted: 7,
  Internal: 8
} as const;

export type StreamErrorCode = (typeof StreamErrorCode)[keyof typeof StreamErrorCode];

export type SessionOperation = "connect" | "subscribe" | "write" | "unsubscribe" | "disconnect";

export class TransportError extends Error {
  constructor(
    readonly operation: SessionOperation,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(operation: SessionOperation, readonly budgetMs: number) {
    super(operation, `${operation} timed out after ${budgetMs}ms`);
    this.name = "TransportTimeoutError";
  }
}

export class CancelledError extends Error {
  constructor(message = "operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function isCancellation(err: unknown): boolean {
  return err instanceof CancelledError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function codeForFailure(err: unknown): StreamErrorCode {
  if (err instanceof TransportTimeoutError) {
    if (err.operation === "connect") return StreamErrorCode.ConnectTimeout;
    if (err.operation === "subscribe") return StreamErrorCode.SubscribeTimeout;
  }
  if (err instanceof TransportError) {
    return err.operation === "write" ? StreamErrorCode.WriteFailed : StreamErrorCode.Transport;
  }
  if (err instanceof ConfigurationError) return StreamErrorCode.Configuration;
  return StreamErrorCode.Internal;
}
