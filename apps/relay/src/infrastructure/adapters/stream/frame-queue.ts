import { ShutdownError, TransportError } from '@pbr/domain';

interface Waiter {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

/**
 * Bounded hand-off between the socket's push callbacks and the engine's pull
 * loop. Overflowing the bound fails the connection instead of silently dropping
 * frames; the reconnect catch-up covers the gap.
 */
export class FrameQueue {
  private readonly frames: string[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;

  constructor(private readonly limit: number) {}

  get length(): number {
    return this.frames.length;
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  /** Returns false when the bound was exceeded; the queue is failed afterwards. */
  push(frame: string): boolean {
    if (this.failure) {
      return false;
    }

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.cleanup();
      waiter.resolve(frame);
      return true;
    }

    if (this.frames.length >= this.limit) {
      this.fail(new TransportError('overflow', `Frame queue exceeded ${this.limit} pending frames`));
      return false;
    }

    this.frames.push(frame);
    return true;
  }

  /**
   * Fails pending and future reads. Frames already buffered are still handed
   * out first.
   */
  fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.cleanup();
      waiter.reject(error);
    }
  }

  async next(signal?: AbortSignal): Promise<string> {
    const buffered = this.frames.shift();
    if (buffered !== undefined) {
      return buffered;
    }
    if (this.failure) {
      throw this.failure;
    }
    if (signal?.aborted) {
      throw new ShutdownError();
    }
    if (this.waiter) {
      throw new Error('FrameQueue supports a single reader');
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        reject(new ShutdownError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
    });
  }
}
