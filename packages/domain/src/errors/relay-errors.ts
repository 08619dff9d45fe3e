export type RelayErrorCode =
  | 'AUTH'
  | 'TRANSPORT'
  | 'MALFORMED_FRAME'
  | 'DECRYPTION'
  | 'SINK_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'SERVICE_UNAVAILABLE'
  | 'SHUTDOWN';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or revoked access token. Terminal: the engine stops instead of retrying.
 */
export class AuthError extends RelayError {
  readonly code = 'AUTH';
}

export type TransportErrorReason = 'disconnected' | 'timeout' | 'overflow' | 'network';

export class TransportError extends RelayError {
  readonly code = 'TRANSPORT';

  constructor(
    readonly reason: TransportErrorReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedFrameError extends RelayError {
  readonly code = 'MALFORMED_FRAME';
}

export type DecryptionErrorReason = 'bad-key' | 'authentication-failed' | 'bad-envelope' | 'no-key';

export class DecryptionError extends RelayError {
  readonly code = 'DECRYPTION';

  constructor(
    readonly reason: DecryptionErrorReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class SinkUnavailableError extends RelayError {
  readonly code = 'SINK_UNAVAILABLE';
}

export class NotFoundError extends RelayError {
  readonly code = 'NOT_FOUND';
}

export class ServiceUnavailableError extends RelayError {
  readonly code = 'SERVICE_UNAVAILABLE';
}

/**
 * Raised from suspension points (frame wait, backoff wait) once shutdown is requested.
 */
export class ShutdownError extends RelayError {
  readonly code = 'SHUTDOWN';

  constructor(message = 'Shutdown requested') {
    super(message);
  }
}
