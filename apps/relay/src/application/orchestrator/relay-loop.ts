import {
  DecryptionError,
  MalformedFrameError,
  ShutdownError,
  type StreamEvent,
  TransportError,
} from '@pbr/domain';
import { type DecodedFrame, decodeEphemeral, decodeFrame } from '@pbr/relay/application/decoders';
import type {
  DispatchResult,
  NotificationDispatcher,
} from '@pbr/relay/application/use-cases/dispatch/notification-dispatcher';
import type { HistorySync } from '@pbr/relay/application/use-cases/history-sync/history-sync';
import type { CryptoServicePort } from '@pbr/relay/domain/services/ports/crypto.port';
import type { Credentials, RawFrame, Session } from '@pbr/relay/domain/types/session';
import type { StreamSession } from '@pbr/relay/infrastructure/adapters/stream/stream-session.adapter';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';

const log = createChildLogger('relay-loop');

export interface RelayLoopDeps {
  session: StreamSession;
  dispatcher: NotificationDispatcher;
  history: HistorySync;
  crypto: CryptoServicePort;
  credentials: Credentials;
}

export interface RelayLoopStats {
  frames: number;
  rendered: number;
  duplicates: number;
  malformed: number;
  decryptionFailures: number;
  sinkFailures: number;
  reconnects: number;
}

/**
 * Single consumer of the stream. Every frame is fully dispatched before the next
 * one is read, so store updates never interleave.
 */
export class RelayLoop {
  private readonly stats: RelayLoopStats = {
    frames: 0,
    rendered: 0,
    duplicates: 0,
    malformed: 0,
    decryptionFailures: 0,
    sinkFailures: 0,
    reconnects: 0,
  };

  constructor(private readonly deps: RelayLoopDeps) {}

  /**
   * Runs until the signal aborts (resolves) or authentication fails (rejects
   * with AuthError).
   */
  async run(signal: AbortSignal): Promise<void> {
    if (!this.deps.credentials.encryptionPassword) {
      log.warn('No encryption password configured; end-to-end encrypted notifications will be dropped');
    }

    let session: Session | null = null;
    try {
      session = await this.deps.session.connect(this.deps.credentials, signal);
      await this.deps.history.prime();

      while (!signal.aborted) {
        let frame: RawFrame;
        try {
          frame = await this.deps.session.nextFrame(session, signal);
        } catch (error) {
          if (!(error instanceof TransportError)) {
            throw error;
          }
          log.warn(`Stream lost (${error.reason}): ${error.message}`);
          await this.deps.session.reconnect(session, signal);
          this.stats.reconnects++;
          await this.catchUp();
          continue;
        }

        await this.handleFrame(frame, session);
      }
    } catch (error) {
      if (error instanceof ShutdownError) {
        log.info('Relay loop stopped');
        return;
      }
      throw error;
    } finally {
      if (session) {
        this.deps.session.shutdown(session);
      }
    }
  }

  getStats(): RelayLoopStats {
    return { ...this.stats };
  }

  private async handleFrame(frame: RawFrame, session: Session): Promise<void> {
    this.stats.frames++;

    let decoded: DecodedFrame;
    try {
      decoded = decodeFrame(frame);
      if (decoded.kind === 'encrypted') {
        decoded = this.decrypt(decoded.payload, decoded.receivedAt, session);
      }
    } catch (error) {
      if (error instanceof MalformedFrameError) {
        this.stats.malformed++;
        log.warn(`Dropping malformed frame: ${error.message}`);
        return;
      }
      if (error instanceof DecryptionError) {
        this.stats.decryptionFailures++;
        log.warn(`Dropping encrypted push (${error.reason}): ${error.message}`);
        return;
      }
      throw error;
    }

    switch (decoded.kind) {
      case 'heartbeat':
        return;
      case 'ignored':
        log.debug(`Ignored frame (${decoded.reason})`);
        return;
      case 'encrypted':
        log.warn('Dropping doubly encrypted payload');
        return;
      case 'sync':
        await this.catchUp();
        return;
      case 'event':
        await this.dispatch(decoded.event);
        return;
    }
  }

  /** The ciphertext is wiped whether or not decryption succeeds. */
  private decrypt(payload: Buffer, receivedAt: number, session: Session): DecodedFrame {
    try {
      if (!session.decryptionKey) {
        throw new DecryptionError('no-key', 'Received an encrypted push but no encryption password is configured');
      }
      const plaintext = this.deps.crypto.openEnvelope(session.decryptionKey, payload);
      return decodeEphemeral(plaintext, { receivedAt, encrypted: true });
    } finally {
      payload.fill(0);
    }
  }

  private async catchUp(): Promise<void> {
    const events = await this.deps.history.fetchNew();
    for (const event of events) {
      await this.dispatch(event);
    }
  }

  private async dispatch(event: StreamEvent): Promise<DispatchResult> {
    const result = await this.deps.dispatcher.dispatch(event);
    switch (result.status) {
      case 'created':
      case 'updated':
        this.stats.rendered++;
        break;
      case 'failed':
        this.stats.sinkFailures++;
        break;
      case 'skipped':
        if (result.reason === 'duplicate') {
          this.stats.duplicates++;
        }
        break;
      case 'dismissed':
        break;
    }
    return result;
  }
}
