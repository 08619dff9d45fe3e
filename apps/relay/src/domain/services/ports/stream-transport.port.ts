import type { AccessToken } from '@pbr/domain';

/**
 * One live connection to the event stream. `receive` rejects with a
 * TransportError once the connection is gone and with a ShutdownError when
 * `signal` aborts.
 */
export interface TransportHandle {
  receive(signal?: AbortSignal): Promise<string>;
  close(): void;
  readonly closed: boolean;
}

export interface StreamTransportPort {
  /** Rejects with AuthError when the service refuses the token. */
  open(token: AccessToken, signal?: AbortSignal): Promise<TransportHandle>;
}
