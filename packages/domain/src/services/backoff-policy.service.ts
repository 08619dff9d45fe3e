export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Share of the delay that is randomized. Kept at or below 0.5 so delays never shrink before the cap. */
  jitterRatio: number;
}

export interface BackoffState {
  /** Consecutive failed connection attempts. */
  readonly attempt: number;
  readonly nextRetryAt: number | null;
}

export interface ScheduledRetry {
  readonly state: BackoffState;
  readonly delayMs: number;
}

const MAX_EXPONENT = 30;

export const INITIAL_BACKOFF_STATE: BackoffState = { attempt: 0, nextRetryAt: null };

export class BackoffPolicy {
  private readonly options: BackoffOptions;

  constructor(
    options: BackoffOptions,
    private readonly random: () => number = Math.random,
  ) {
    if (options.baseDelayMs <= 0) {
      throw new Error('baseDelayMs must be positive');
    }
    if (options.maxDelayMs < options.baseDelayMs) {
      throw new Error('maxDelayMs must be >= baseDelayMs');
    }
    if (options.jitterRatio < 0 || options.jitterRatio > 0.5) {
      throw new Error('jitterRatio must be within [0, 0.5]');
    }
    this.options = { ...options };
  }

  /** Un-jittered delay before the given attempt (1-based), capped at maxDelayMs. */
  ceilingFor(attempt: number): number {
    const exponent = Math.min(Math.max(attempt, 1) - 1, MAX_EXPONENT);
    return Math.min(this.options.maxDelayMs, this.options.baseDelayMs * 2 ** exponent);
  }

  /**
   * Delay in [(1 - jitter) * ceiling, ceiling]. Because jitter <= 0.5 the lower
   * bound of attempt n + 1 is at least the ceiling of attempt n until the cap.
   */
  delayFor(attempt: number): number {
    const ceiling = this.ceilingFor(attempt);
    const roll = Math.min(Math.max(this.random(), 0), 1);
    const jitter = this.options.jitterRatio;
    return Math.round(ceiling * (1 - jitter) + roll * jitter * ceiling);
  }

  next(state: BackoffState, now: number): ScheduledRetry {
    const attempt = state.attempt + 1;
    const delayMs = this.delayFor(attempt);
    return {
      state: { attempt, nextRetryAt: now + delayMs },
      delayMs,
    };
  }

  reset(): BackoffState {
    return INITIAL_BACKOFF_STATE;
  }
}
