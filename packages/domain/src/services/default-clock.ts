import { ShutdownError } from '../errors/relay-errors';
import type { ClockPort } from '../ports/clock.port';

export class DefaultClock implements ClockPort {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ShutdownError();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new ShutdownError());
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export function createDefaultClock(): ClockPort {
  return new DefaultClock();
}
