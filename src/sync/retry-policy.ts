/**
 * Bounded exponential backoff for transient CRM failures.
 *
 * Attempt n (1-based) that fails waits baseDelayMs * factor^(n-1), capped at
 * maxDelayMs, before attempt n+1. After maxAttempts the sync is dead-lettered.
 */

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly factor: number;

  constructor(options: RetryPolicyOptions) {
    if (options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.factor = options.factor ?? 2;
  }

  /** Delay after the given failed attempt (1-based) */
  delayAfter(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * this.factor ** (attempt - 1));
  }

  canRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }
}
