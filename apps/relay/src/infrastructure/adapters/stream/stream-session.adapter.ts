import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import {
  type BackoffPolicy,
  type ClockPort,
  INITIAL_BACKOFF_STATE,
  ServiceUnavailableError,
  ShutdownError,
  TransportError,
} from '@pbr/domain';
import { isHeartbeatFrame } from '@pbr/relay/application/decoders';
import type { AccountPort, AccountUser } from '@pbr/relay/domain/services/ports/account.port';
import type { CryptoServicePort } from '@pbr/relay/domain/services/ports/crypto.port';
import type { StreamTransportPort, TransportHandle } from '@pbr/relay/domain/services/ports/stream-transport.port';
import type { Credentials, RawFrame, Session, SessionState } from '@pbr/relay/domain/types/session';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';

const log = createChildLogger('stream-session');

export interface StreamSessionOptions {
  transport: StreamTransportPort;
  account: AccountPort;
  crypto: CryptoServicePort;
  backoff: BackoffPolicy;
  clock: ClockPort;
  heartbeatTimeoutMs: number;
}

export interface RetryScheduledEvent {
  readonly attempt: number;
  readonly delayMs: number;
  readonly nextRetryAt: number;
}

export interface StreamSession {
  connect(credentials: Credentials, signal?: AbortSignal): Promise<Session>;
  nextFrame(session: Session, signal?: AbortSignal): Promise<RawFrame>;
  reconnect(session: Session, signal?: AbortSignal): Promise<void>;
  shutdown(session: Session): void;
}

/**
 * Owns the realtime connection: authentication, staleness detection and the
 * reconnect loop. Emits `state` (state, session) and `retry-scheduled`.
 */
export class StreamSessionAdapter extends EventEmitter implements StreamSession {
  constructor(private readonly options: StreamSessionOptions) {
    super();
  }

  async connect(credentials: Credentials, signal?: AbortSignal): Promise<Session> {
    const user = await this.lookupUser(signal);

    const decryptionKey = credentials.encryptionPassword
      ? this.options.crypto.deriveKey(credentials.encryptionPassword, user.iden)
      : null;

    const session: Session = {
      id: randomUUID(),
      generation: 0,
      state: 'disconnected',
      handle: null,
      lastHeartbeatAt: this.options.clock.now(),
      backoff: INITIAL_BACKOFF_STATE,
      credentials,
      userIden: user.iden,
      decryptionKey,
    };

    log.info(`Authenticated as ${user.name ?? user.iden}${decryptionKey ? ' (end-to-end decryption enabled)' : ''}`);

    this.setState(session, 'connecting');
    try {
      await this.attach(session, signal);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        this.setState(session, 'terminated');
        throw error;
      }
      log.warn(`Initial stream connection failed: ${error.message}`);
      await this.reconnect(session, signal);
    }

    return session;
  }

  async nextFrame(session: Session, signal?: AbortSignal): Promise<RawFrame> {
    for (;;) {
      const handle = session.handle;
      if (!handle || session.state !== 'connected') {
        throw new TransportError('disconnected', 'Session has no open transport');
      }

      const remaining = session.lastHeartbeatAt + this.options.heartbeatTimeoutMs - this.options.clock.now();
      const data = remaining > 0 ? await this.receiveWithin(handle, remaining, signal) : null;

      if (data === null) {
        log.warn(`No frame for ${this.options.heartbeatTimeoutMs}ms; treating stream as stale`);
        this.closeHandle(session);
        throw new TransportError('timeout', `Stream stale for ${this.options.heartbeatTimeoutMs}ms`);
      }

      const receivedAt = this.options.clock.now();
      session.lastHeartbeatAt = receivedAt;

      if (isHeartbeatFrame(data)) {
        log.trace('Heartbeat');
        continue;
      }

      return { data, receivedAt, generation: session.generation };
    }
  }

  async reconnect(session: Session, signal?: AbortSignal): Promise<void> {
    this.closeHandle(session);
    this.setState(session, 'reconnecting');

    for (;;) {
      const retry = this.options.backoff.next(session.backoff, this.options.clock.now());
      session.backoff = retry.state;
      this.scheduleRetry(retry.state.attempt, retry.delayMs);
      log.info(`Reconnecting in ${retry.delayMs}ms (attempt ${retry.state.attempt})`);

      try {
        await this.options.clock.sleep(retry.delayMs, signal);
        this.setState(session, 'connecting');
        await this.attach(session, signal);
        return;
      } catch (error) {
        if (error instanceof TransportError) {
          log.warn(`Reconnect attempt ${retry.state.attempt} failed: ${error.message}`);
          this.setState(session, 'reconnecting');
          continue;
        }
        this.setState(session, 'terminated');
        throw error;
      }
    }
  }

  /** Terminal. The decryption key is wiped; a new session derives a fresh one. */
  shutdown(session: Session): void {
    this.closeHandle(session);
    session.decryptionKey?.destroy();
    this.setState(session, 'terminated');
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async attach(session: Session, signal?: AbortSignal): Promise<void> {
    const handle = await this.options.transport.open(session.credentials.accessToken, signal);
    session.handle = handle;
    session.generation += 1;
    session.lastHeartbeatAt = this.options.clock.now();
    session.backoff = this.options.backoff.reset();
    this.setState(session, 'connected');
    log.info(`Stream connected (generation ${session.generation})`);
  }

  /** Resolves with the next frame, or null once `timeoutMs` elapses without one. */
  private async receiveWithin(handle: TransportHandle, timeoutMs: number, signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) {
      throw new ShutdownError();
    }

    const race = new AbortController();
    const onAbort = (): void => race.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([
        handle.receive(race.signal),
        this.options.clock.sleep(timeoutMs, race.signal).then(() => null),
      ]);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      race.abort();
    }
  }

  private async lookupUser(signal?: AbortSignal): Promise<AccountUser> {
    let backoff = INITIAL_BACKOFF_STATE;

    for (;;) {
      if (signal?.aborted) {
        throw new ShutdownError();
      }
      try {
        return await this.options.account.getCurrentUser();
      } catch (error) {
        if (!(error instanceof ServiceUnavailableError || error instanceof TransportError)) {
          throw error;
        }
        const retry = this.options.backoff.next(backoff, this.options.clock.now());
        backoff = retry.state;
        this.scheduleRetry(retry.state.attempt, retry.delayMs);
        log.warn(`Account lookup failed (${error.message}); retrying in ${retry.delayMs}ms`);
        await this.options.clock.sleep(retry.delayMs, signal);
      }
    }
  }

  private closeHandle(session: Session): void {
    if (session.handle) {
      session.handle.close();
      session.handle = null;
    }
  }

  private scheduleRetry(attempt: number, delayMs: number): void {
    const event: RetryScheduledEvent = { attempt, delayMs, nextRetryAt: this.options.clock.now() + delayMs };
    this.emit('retry-scheduled', event);
  }

  private setState(session: Session, state: SessionState): void {
    if (session.state === state) {
      return;
    }
    log.debug(`Session ${session.id}: ${session.state} -> ${state}`);
    session.state = state;
    this.emit('state', state, session);
  }
}
