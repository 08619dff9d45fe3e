export interface ClockPort {
  now(): number;
  /** Resolves after `ms`; rejects with ShutdownError as soon as `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
