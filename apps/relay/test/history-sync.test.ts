import { AuthError, type ClockPort, NotFoundError, ServiceUnavailableError } from '@pbr/domain';
import { HistorySync } from '@pbr/relay/application/use-cases/history-sync/history-sync';
import type { AccountPort, ListPushesOptions, PushPage } from '@pbr/relay/domain/services/ports/account.port';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

const clock: ClockPort = {
  now: () => 1_700_000_100_000,
  sleep: async () => undefined,
};

const note = (iden: string, modified: number, extra: Record<string, unknown> = {}) => ({
  iden,
  active: true,
  dismissed: false,
  modified,
  type: 'note',
  title: `Note ${iden}`,
  body: 'body',
  ...extra,
});

describe('HistorySync', () => {
  let listPushes: Mock<(options: ListPushesOptions) => Promise<PushPage>>;
  let sync: HistorySync;

  beforeEach(() => {
    listPushes = vi.fn(async (_options: ListPushesOptions): Promise<PushPage> => ({ pushes: [], cursor: null }));
    const account: AccountPort = {
      getCurrentUser: async () => ({ iden: 'user-iden', name: null, email: null }),
      listPushes,
      listDevices: async () => [],
    };
    sync = new HistorySync({ account, clock, pageSize: 2, maxPages: 3 });
  });

  it('primes the cursor at the newest existing push without rendering it', async () => {
    listPushes.mockResolvedValueOnce({ pushes: [note('old', 1_700_000_000)], cursor: 'more' });

    await sync.prime();

    expect(sync.modifiedAfter).toBe(1_700_000_000);
    expect(listPushes).toHaveBeenCalledWith({ limit: 1 });
  });

  it('primes at the current time when there is no history', async () => {
    await sync.prime();
    expect(sync.modifiedAfter).toBe(1_700_000_100);
  });

  it('primes at the current time when the service is down', async () => {
    listPushes.mockRejectedValueOnce(new ServiceUnavailableError('HTTP 503'));
    await sync.prime();
    expect(sync.modifiedAfter).toBe(1_700_000_100);
  });

  it('fetches new pushes across pages, oldest first, and advances the cursor', async () => {
    await sync.prime();
    listPushes
      .mockResolvedValueOnce({ pushes: [note('c', 1_700_000_300), note('b', 1_700_000_200)], cursor: 'page-2' })
      .mockResolvedValueOnce({ pushes: [note('a', 1_700_000_150)], cursor: null });

    const events = await sync.fetchNew();

    expect(events.map((event) => event.eventId)).toEqual(['push:a', 'push:b', 'push:c']);
    expect(listPushes).toHaveBeenNthCalledWith(2, { modifiedAfter: 1_700_000_100, limit: 2, cursor: undefined });
    expect(listPushes).toHaveBeenNthCalledWith(3, { modifiedAfter: 1_700_000_100, limit: 2, cursor: 'page-2' });
    expect(sync.modifiedAfter).toBe(1_700_000_300);

    expect(await sync.fetchNew()).toEqual([]);
    expect(listPushes).toHaveBeenLastCalledWith({ modifiedAfter: 1_700_000_300, limit: 2, cursor: undefined });
  });

  it('stops after maxPages', async () => {
    await sync.prime();
    listPushes.mockResolvedValue({ pushes: [note('x', 1_700_000_200)], cursor: 'again' });

    await sync.fetchNew();

    // one priming call and three pages
    expect(listPushes).toHaveBeenCalledTimes(4);
  });

  it('maps dismissed pushes to dismissals and skips deleted and malformed ones', async () => {
    await sync.prime();
    listPushes.mockResolvedValueOnce({
      pushes: [
        note('gone', 1_700_000_400, { active: false }),
        note('seen', 1_700_000_300, { dismissed: true }),
        { iden: 'broken', modified: 1_700_000_250 },
        { iden: 'no-timestamp' },
        note('new', 1_700_000_200),
      ],
      cursor: null,
    });

    const events = await sync.fetchNew();

    expect(events.map((event) => [event.type, event.notificationKey])).toEqual([
      ['push', 'push:new'],
      ['dismiss', 'push:seen'],
    ]);
    expect(sync.modifiedAfter).toBe(1_700_000_400);
  });

  it('keeps the cursor when the service is unavailable', async () => {
    await sync.prime();
    listPushes.mockRejectedValueOnce(new ServiceUnavailableError('HTTP 502'));

    expect(await sync.fetchNew()).toEqual([]);
    expect(sync.modifiedAfter).toBe(1_700_000_100);
  });

  it('keeps the cursor when the history endpoint is missing', async () => {
    await sync.prime();
    listPushes.mockRejectedValueOnce(new NotFoundError('GET /pushes returned 404'));

    expect(await sync.fetchNew()).toEqual([]);
    expect(sync.modifiedAfter).toBe(1_700_000_100);
  });

  it('primes at the current time when the history endpoint is missing', async () => {
    listPushes.mockRejectedValueOnce(new NotFoundError('GET /pushes returned 404'));
    await sync.prime();
    expect(sync.modifiedAfter).toBe(1_700_000_100);
  });

  it('propagates authentication failures', async () => {
    await sync.prime();
    listPushes.mockRejectedValueOnce(new AuthError('HTTP 401'));

    await expect(sync.fetchNew()).rejects.toBeInstanceOf(AuthError);
  });

  it('primes instead of fetching when called first', async () => {
    listPushes.mockResolvedValueOnce({ pushes: [note('old', 1_700_000_000)], cursor: null });

    expect(await sync.fetchNew()).toEqual([]);
    expect(sync.modifiedAfter).toBe(1_700_000_000);
  });
});
