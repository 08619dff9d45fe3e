import { createCipheriv, pbkdf2Sync } from 'node:crypto';
import {
  AccessToken,
  AuthError,
  type ClockPort,
  DedupStore,
  ShutdownError,
  SinkUnavailableError,
  TransportError,
} from '@pbr/domain';
import { RelayLoop } from '@pbr/relay/application/orchestrator/relay-loop';
import { NotificationDispatcher } from '@pbr/relay/application/use-cases/dispatch/notification-dispatcher';
import { HistorySync } from '@pbr/relay/application/use-cases/history-sync/history-sync';
import { AesGcmCryptoService } from '@pbr/relay/domain/services/crypto.service';
import type { DeviceDirectory } from '@pbr/relay/domain/services/device-directory.service';
import type { AccountPort, ListPushesOptions, PushPage } from '@pbr/relay/domain/services/ports/account.port';
import type {
  NotificationContent,
  NotificationSinkPort,
} from '@pbr/relay/domain/services/ports/notification-sink.port';
import type { Credentials, RawFrame, Session } from '@pbr/relay/domain/types/session';
import type { StreamSession } from '@pbr/relay/infrastructure/adapters/stream/stream-session.adapter';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

const NONCE = Buffer.from('0b0a09080706050403020100', 'hex');
const crypto = new AesGcmCryptoService();

const clock: ClockPort = {
  now: () => 1_700_000_000_000,
  sleep: async () => undefined,
};

type ScriptStep = string | Error;

/** Replays scripted frames; running out of script ends the loop. */
class ScriptedSession implements StreamSession {
  readonly script: ScriptStep[] = [];
  readonly reconnect: Mock<(session: Session, signal?: AbortSignal) => Promise<void>> = vi.fn(
    async (_session: Session, _signal?: AbortSignal): Promise<void> => undefined,
  );
  shutdowns = 0;

  async connect(credentials: Credentials): Promise<Session> {
    return {
      id: 'session-1',
      generation: 1,
      state: 'connected',
      handle: null,
      lastHeartbeatAt: 0,
      backoff: { attempt: 0, nextRetryAt: null },
      credentials,
      userIden: 'user-iden',
      decryptionKey: credentials.encryptionPassword
        ? crypto.deriveKey(credentials.encryptionPassword, 'user-iden')
        : null,
    };
  }

  async nextFrame(session: Session): Promise<RawFrame> {
    const step = this.script.shift();
    if (step === undefined) {
      throw new ShutdownError();
    }
    if (step instanceof Error) {
      throw step;
    }
    return { data: step, receivedAt: 5_000, generation: session.generation };
  }

  shutdown(): void {
    this.shutdowns++;
  }
}

class RecordingSink implements NotificationSinkPort {
  readonly created: NotificationContent[] = [];
  readonly dismissed: number[] = [];
  available = true;
  private nextId = 1;

  async create(content: NotificationContent): Promise<number> {
    if (!this.available) {
      throw new SinkUnavailableError('notification server is gone');
    }
    this.created.push(content);
    return this.nextId++;
  }

  async update(id: number, content: NotificationContent): Promise<number> {
    this.created.push(content);
    return id;
  }

  async dismiss(id: number): Promise<void> {
    this.dismissed.push(id);
  }
}

const mirror = {
  type: 'mirror',
  package_name: 'com.example.chat',
  notification_id: 7,
  application_name: 'Chat',
  title: 'Alice',
  body: 'hi',
  source_device_iden: 'dev1',
};

const pushFrame = (push: object): string => JSON.stringify({ type: 'push', push });

function encryptedFrame(plaintext: object): string {
  const key = pbkdf2Sync('test-secret', 'user-iden', 30_000, 32, 'sha256');
  const cipher = createCipheriv('aes-256-gcm', key, NONCE);
  const ciphertext = Buffer.concat([cipher.update(JSON.stringify(plaintext), 'utf8'), cipher.final()]);
  const envelope = Buffer.concat([Buffer.from('1'), cipher.getAuthTag(), NONCE, ciphertext]);
  return pushFrame({ encrypted: true, ciphertext: envelope.toString('base64') });
}

describe('RelayLoop', () => {
  let listPushes: Mock<(options: ListPushesOptions) => Promise<PushPage>>;
  let sink: RecordingSink;
  let history: HistorySync;
  let dispatcher: NotificationDispatcher;

  beforeEach(() => {
    listPushes = vi.fn(async (_options: ListPushesOptions): Promise<PushPage> => ({ pushes: [], cursor: null }));
    const account: AccountPort = {
      getCurrentUser: async () => ({ iden: 'user-iden', name: null, email: null }),
      listPushes,
      listDevices: async () => [],
    };
    const devices: DeviceDirectory = { describe: async () => null, invalidate: () => undefined };

    sink = new RecordingSink();
    history = new HistorySync({ account, clock, pageSize: 50, maxPages: 2 });
    dispatcher = new NotificationDispatcher({
      sink,
      store: new DedupStore({ maxEntries: 100, retentionMs: 60_000, clock }),
      devices,
    });
  });

  function createLoop(encryptionPassword: string | null = null): { loop: RelayLoop; session: ScriptedSession } {
    const credentials: Credentials = { accessToken: AccessToken.create('test-token'), encryptionPassword };
    const session = new ScriptedSession();
    const loop = new RelayLoop({ session, dispatcher, history, crypto, credentials });
    return { loop, session };
  }

  it('renders mirrors once and dismisses them by key', async () => {
    const { loop, session } = createLoop();
    session.script.push(
      JSON.stringify({ type: 'nop' }),
      pushFrame(mirror),
      pushFrame(mirror),
      pushFrame({ type: 'dismissal', package_name: 'com.example.chat', notification_id: '7' }),
    );

    await loop.run(new AbortController().signal);

    expect(sink.created).toEqual([{ title: '[Chat] Alice', body: 'hi', icon: null, persistent: false }]);
    expect(sink.dismissed).toEqual([1]);
    expect(loop.getStats()).toMatchObject({ frames: 4, rendered: 1, duplicates: 1 });
    expect(session.shutdowns).toBe(1);
  });

  it('drops malformed frames and keeps going', async () => {
    const { loop, session } = createLoop();
    session.script.push('not json', JSON.stringify({ type: 'mystery' }), pushFrame(mirror));

    await loop.run(new AbortController().signal);

    expect(loop.getStats()).toMatchObject({ frames: 3, malformed: 2, rendered: 1 });
  });

  it('fetches history on a push tickle', async () => {
    const { loop, session } = createLoop();
    session.script.push(JSON.stringify({ type: 'tickle', subtype: 'push' }));
    listPushes.mockResolvedValueOnce({ pushes: [], cursor: null }).mockResolvedValueOnce({
      pushes: [
        {
          iden: 'p1',
          active: true,
          dismissed: false,
          modified: 1_700_000_010,
          type: 'note',
          title: 'Groceries',
          body: 'milk',
        },
      ],
      cursor: null,
    });

    await loop.run(new AbortController().signal);

    expect(listPushes).toHaveBeenLastCalledWith({ modifiedAfter: 1_700_000_000, limit: 50, cursor: undefined });
    expect(sink.created).toEqual([{ title: 'Groceries', body: 'milk' }]);
  });

  it('decrypts encrypted mirrors with the session key', async () => {
    const { loop, session } = createLoop('test-secret');
    session.script.push(encryptedFrame(mirror));

    await loop.run(new AbortController().signal);

    expect(sink.created).toEqual([{ title: '[Chat] Alice', body: 'hi', icon: null, persistent: false }]);
  });

  it('drops encrypted pushes when no password is configured', async () => {
    const { loop, session } = createLoop();
    session.script.push(encryptedFrame(mirror));

    await loop.run(new AbortController().signal);

    expect(sink.created).toEqual([]);
    expect(loop.getStats()).toMatchObject({ frames: 1, decryptionFailures: 1 });
  });

  it('drops encrypted pushes sealed with another password', async () => {
    const { loop, session } = createLoop('other-secret');
    session.script.push(encryptedFrame(mirror));

    await loop.run(new AbortController().signal);

    expect(sink.created).toEqual([]);
    expect(loop.getStats().decryptionFailures).toBe(1);
  });

  it('reconnects and catches up after the stream is lost', async () => {
    const { loop, session } = createLoop();
    session.script.push(new TransportError('timeout', 'no heartbeat'));
    listPushes.mockResolvedValueOnce({ pushes: [], cursor: null }).mockResolvedValueOnce({
      pushes: [{ iden: 'p2', modified: 1_700_000_020, type: 'note', title: 'Missed', body: 'while offline' }],
      cursor: null,
    });

    await loop.run(new AbortController().signal);

    expect(session.reconnect).toHaveBeenCalledTimes(1);
    expect(sink.created).toEqual([{ title: 'Missed', body: 'while offline' }]);
    expect(loop.getStats()).toMatchObject({ reconnects: 1, rendered: 1 });
  });

  it('counts sink failures without stopping', async () => {
    const { loop, session } = createLoop();
    sink.available = false;
    session.script.push(pushFrame(mirror));

    await loop.run(new AbortController().signal);

    expect(loop.getStats()).toMatchObject({ frames: 1, sinkFailures: 1, rendered: 0 });
  });

  it('stops with AuthError when the token is revoked during a reconnect', async () => {
    const { loop, session } = createLoop();
    session.script.push(new TransportError('disconnected', 'closed by server'));
    session.reconnect.mockRejectedValueOnce(new AuthError('HTTP 401'));

    await expect(loop.run(new AbortController().signal)).rejects.toBeInstanceOf(AuthError);
    expect(session.shutdowns).toBe(1);
  });

  it('does not read frames once the signal has aborted', async () => {
    const { loop, session } = createLoop();
    const controller = new AbortController();
    controller.abort();
    session.script.push(pushFrame(mirror));

    await loop.run(controller.signal);

    expect(sink.created).toEqual([]);
    expect(session.script).toHaveLength(1);
  });
});
