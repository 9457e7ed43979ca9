import { AppError } from "../infra/app-error.js";
import { systemSleep, type SleepFn } from "../infra/clock.js";
import { StoreError } from "../ports/store-error.js";

export type BackoffStrategy = "fixed" | "exponential";

export interface RetryPolicyOptions {
  maxAttempts: number;
  initialDelayMs: number;
  backoff: BackoffStrategy;
  sleep?: SleepFn;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryEvent {
  operation: string;
  attempt: number;
  delayMs: number;
  error: StoreError;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 3,
  initialDelayMs: 500,
  backoff: "exponential",
};

export function isThrottleSignal(error: unknown): error is StoreError {
  return error instanceof StoreError && error.kind === "throttled";
}

export class RetryPolicy {
  private readonly options: RetryPolicyOptions;
  private readonly sleep: SleepFn;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    this.sleep = this.options.sleep ?? systemSleep;
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new AppError(500, "invalid_runtime_config", "Retry maxAttempts must be a positive integer.");
    }
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /** Delay before the retry that follows the given 1-based failed attempt. */
  delayAfter(attempt: number): number {
    if (this.options.backoff === "fixed") {
      return this.options.initialDelayMs;
    }
    return this.options.initialDelayMs * 2 ** (attempt - 1);
  }

  async execute<TOutput>(operation: string, run: () => Promise<TOutput>): Promise<TOutput> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await run();
      } catch (error) {
        if (!isThrottleSignal(error)) {
          throw error;
        }
        if (attempt >= this.options.maxAttempts) {
          throw new AppError(
            503,
            "throttle_exhausted",
            `Store throttled '${operation}' on all ${this.options.maxAttempts} attempts.`,
          );
        }
        const delayMs = this.delayAfter(attempt);
        this.options.onRetry?.({ operation, attempt, delayMs, error });
        await this.sleep(delayMs);
      }
    }
  }
}
