import {
  type ClockPort,
  type DismissNotificationEventData,
  MalformedFrameError,
  NotFoundError,
  type PushEventData,
  ServiceUnavailableError,
} from '@pbr/domain';
import { decodePushRecord, readModified } from '@pbr/relay/application/decoders';
import type { AccountPort, PushRecord } from '@pbr/relay/domain/services/ports/account.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';

const log = createChildLogger('history-sync');

export type HistoryEvent = PushEventData | DismissNotificationEventData;

export interface HistorySyncOptions {
  account: AccountPort;
  clock: ClockPort;
  pageSize: number;
  maxPages: number;
}

/**
 * Catches up on pushes through the history API. Stream tickles only say that
 * something changed, and pushes sent while disconnected never reach the stream.
 */
export class HistorySync {
  /** Epoch seconds of the newest push seen, as the API's `modified_after` expects. */
  private cursor: number | null = null;

  constructor(private readonly options: HistorySyncOptions) {}

  get modifiedAfter(): number | null {
    return this.cursor;
  }

  /** Positions the cursor at the newest existing push so the backlog is not rendered. */
  async prime(): Promise<void> {
    try {
      const page = await this.options.account.listPushes({ limit: 1 });
      const newest = page.pushes.length > 0 ? readModified(page.pushes[0]) : null;
      this.cursor = newest ?? this.nowSeconds();
    } catch (error) {
      if (!isHistoryUnavailable(error)) {
        throw error;
      }
      log.warn(`Could not read push history, starting from now: ${error.message}`);
      this.cursor = this.nowSeconds();
    }
    log.debug(`History cursor primed at ${this.cursor}`);
  }

  /** Pushes modified since the last call, oldest first. */
  async fetchNew(): Promise<HistoryEvent[]> {
    if (this.cursor === null) {
      await this.prime();
      return [];
    }

    const modifiedAfter = this.cursor;
    let records: PushRecord[];
    try {
      records = await this.fetchPages(modifiedAfter);
    } catch (error) {
      if (!isHistoryUnavailable(error)) {
        throw error;
      }
      log.warn(`History catch-up failed: ${error.message}`);
      return [];
    }

    let newest = modifiedAfter;
    const decoded: Array<{ modified: number; event: HistoryEvent }> = [];

    for (const record of records) {
      const modified = readModified(record);
      if (modified === null) {
        log.warn('Skipping push record without a modified timestamp');
        continue;
      }
      newest = Math.max(newest, modified);

      try {
        const event = decodePushRecord(record);
        if (event) {
          decoded.push({ modified, event });
        }
      } catch (error) {
        if (!(error instanceof MalformedFrameError)) {
          throw error;
        }
        log.warn(`Skipping push record: ${error.message}`);
      }
    }

    this.cursor = newest;
    decoded.sort((a, b) => a.modified - b.modified);

    if (decoded.length > 0) {
      log.debug(`Fetched ${decoded.length} pushes modified after ${modifiedAfter}`);
    }
    return decoded.map((entry) => entry.event);
  }

  private async fetchPages(modifiedAfter: number): Promise<PushRecord[]> {
    const records: PushRecord[] = [];
    let cursor: string | undefined;
    let pages = 0;

    do {
      const page = await this.options.account.listPushes({
        modifiedAfter,
        limit: this.options.pageSize,
        cursor,
      });
      records.push(...page.pushes);
      cursor = page.cursor ?? undefined;
      pages++;
    } while (cursor && pages < this.options.maxPages);

    if (cursor) {
      log.warn(`Push history truncated after ${pages} pages; older changes were skipped`);
    }
    return records;
  }

  private nowSeconds(): number {
    return this.options.clock.now() / 1000;
  }
}

function isHistoryUnavailable(error: unknown): error is NotFoundError | ServiceUnavailableError {
  return error instanceof NotFoundError || error instanceof ServiceUnavailableError;
}
