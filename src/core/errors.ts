export type BotErrorCode = 'BACKEND' | 'MIDDLEWARE' | 'DATABASE' | 'CONSUMER' | 'STATUS';

/**
 * Base error for everything the dispatch core raises.
 * Check `code` to tell the kinds apart without instanceof chains.
 */
export class BotError extends Error {
  readonly code: BotErrorCode;

  constructor(message: string, code: BotErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BotError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type BackendErrorKind = 'timeout' | 'status' | 'body' | 'other';

/**
 * Failure talking to the messaging backend (reply, reaction, debug, startup...).
 */
export class BackendError extends BotError {
  readonly kind: BackendErrorKind;

  constructor(message: string, kind: BackendErrorKind = 'other', options?: { cause?: unknown }) {
    super(message, 'BACKEND', options);
    this.name = 'BackendError';
    this.kind = kind;
  }
}

/**
 * A middleware threw while processing an event. Fatal to the event loop.
 */
export class MiddlewareError extends BotError {
  readonly middleware: string;

  constructor(middleware: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`middleware ${middleware} failed: ${reason}`, 'MIDDLEWARE', { cause });
    this.name = 'MiddlewareError';
    this.middleware = middleware;
  }
}

export class DatabaseError extends BotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DATABASE', options);
    this.name = 'DatabaseError';
  }
}

/**
 * The event queue was closed while the loop was still consuming it.
 */
export class ConsumerError extends BotError {
  constructor(message: string) {
    super(message, 'CONSUMER');
    this.name = 'ConsumerError';
  }
}

/**
 * The backend reported a protocol-level failure.
 */
export class StatusError extends BotError {
  readonly statusCode: number;

  constructor(message: string, statusCode = 0) {
    super(message, 'STATUS');
    this.name = 'StatusError';
    this.statusCode = statusCode;
  }
}
