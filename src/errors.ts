'use strict';

export type RouterErrorKind = 'auth-failure' | 'session-expired' | 'transport' | 'protocol';

/**
 * Base class for everything that can go wrong while talking to the router.
 * `retryable` tells the caller whether the next poll cycle may try again.
 */
export abstract class RouterError extends Error {

  abstract readonly kind: RouterErrorKind;

  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

}

/** Bad or missing credentials. Nothing recovers this without the operator. */
export class AuthFailureError extends RouterError {

  readonly kind = 'auth-failure';

  readonly retryable = false;

}

/** Session was dropped by the router, usually by a competing login. */
export class SessionExpiredError extends RouterError {

  readonly kind = 'session-expired';

  readonly retryable = true;

}

export class TransportError extends RouterError {

  readonly kind = 'transport';

  readonly retryable = true;

}

/** Router answered, but not with the shape or code we expect. */
export class ProtocolError extends RouterError {

  readonly kind = 'protocol';

  readonly retryable = false;

}

/** Lockdown start/stop against the wrong state. Reported, never thrown. */
export type StateConflict = 'already-active' | 'not-active';

export function isRouterError(error: unknown): error is RouterError {
  return error instanceof RouterError;
}
