import type { AccessToken, BackoffState, DecryptionKey } from '@pbr/domain';
import type { TransportHandle } from '@pbr/relay/domain/services/ports/stream-transport.port';

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'terminated';

export interface Credentials {
  readonly accessToken: AccessToken;
  readonly encryptionPassword: string | null;
}

export interface Session {
  /** Stable for the process lifetime; reconnects keep it. */
  readonly id: string;
  /** Incremented every time a fresh transport is attached. */
  generation: number;
  state: SessionState;
  handle: TransportHandle | null;
  lastHeartbeatAt: number;
  backoff: BackoffState;
  readonly credentials: Credentials;
  readonly userIden: string;
  readonly decryptionKey: DecryptionKey | null;
}

export interface RawFrame {
  readonly data: string;
  readonly receivedAt: number;
  /** Session generation the frame arrived on. */
  readonly generation: number;
}
