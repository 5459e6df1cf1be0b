import { WatchError } from 'redis';
import type { RedisClient } from '../config/redis';
import { RateLimitConfig } from '../config';
import { RateLimitError } from '../adapters/ChannelAdapter';

/**
 * Fixed-window call budget for one (account, endpoint) pair.
 * Times are epoch milliseconds.
 */
export interface RateLimitWindow {
  callsMade: number;
  windowStart: number;
  resetTime: number;
}

export interface RateLimitTransition<T> {
  next: RateLimitWindow;
  result: T;
}

/**
 * Storage for rate-limit windows. `transact` must apply `fn` as one atomic
 * read-modify-write on the key: concurrent callers never see the same stale window.
 */
export interface RateLimitStore {
  transact<T>(
    key: string,
    fn: (current: RateLimitWindow | null) => RateLimitTransition<T>
  ): Promise<T>;
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  resetAt: Date;
  windowMinutes: number;
}

const MAX_TRANSACTION_ATTEMPTS = 10;
// Keys outlive their window a little so a late reader still sees the reset time
const KEY_GRACE_MS = 60 * 1000;

/** The window as it stands at `now`, reset when the stored one has expired */
export const currentWindow = (
  stored: RateLimitWindow | null,
  now: number,
  windowMs: number
): RateLimitWindow => {
  if (!stored || now >= stored.resetTime) {
    return { callsMade: 0, windowStart: now, resetTime: now + windowMs };
  }
  return stored;
};

export const secondsUntilReset = (window: RateLimitWindow, now: number): number =>
  Math.max(0, Math.ceil((window.resetTime - now) / 1000));

const parseWindow = (raw: Record<string, unknown>): RateLimitWindow | null => {
  const callsMade = Number(raw.callsMade);
  const windowStart = Number(raw.windowStart);
  const resetTime = Number(raw.resetTime);
  if ([callsMade, windowStart, resetTime].some((value) => !Number.isFinite(value))) {
    return null;
  }
  return { callsMade, windowStart, resetTime };
};

/**
 * Windows kept in Redis hashes, updated under WATCH/MULTI and retried when another
 * client touched the key in between.
 */
export class RedisRateLimitStore implements RateLimitStore {
  constructor(private readonly client: RedisClient) {}

  async transact<T>(
    key: string,
    fn: (current: RateLimitWindow | null) => RateLimitTransition<T>
  ): Promise<T> {
    for (let attempt = 1; attempt <= MAX_TRANSACTION_ATTEMPTS; attempt++) {
      try {
        return await this.client.executeIsolated(async (isolated) => {
          await isolated.watch(key);
          const { next, result } = fn(parseWindow(await isolated.hGetAll(key)));
          await isolated
            .multi()
            .hSet(key, {
              callsMade: next.callsMade,
              windowStart: next.windowStart,
              resetTime: next.resetTime,
            })
            .pExpireAt(key, next.resetTime + KEY_GRACE_MS)
            .exec();
          return result;
        });
      } catch (error) {
        if (!(error instanceof WatchError)) {
          throw error;
        }
        console.warn(`[rate-limit] Concurrent update on ${key}, attempt ${attempt}/${MAX_TRANSACTION_ATTEMPTS}`);
      }
    }

    throw new Error(`Rate limit window ${key} stayed contended after ${MAX_TRANSACTION_ATTEMPTS} attempts`);
  }
}

/**
 * Per-(account, endpoint) fixed-window limiter for outbound platform calls
 */
export class PlatformRateLimitService {
  private readonly windowMs: number;

  constructor(
    private readonly store: RateLimitStore,
    private readonly config: RateLimitConfig,
    private readonly now: () => Date = () => new Date()
  ) {
    this.windowMs = config.windowMinutes * 60 * 1000;
  }

  private key(accountId: string, endpoint: string): string {
    return `platform:ratelimit:${accountId}:${endpoint}`;
  }

  async canCall(accountId: string, endpoint: string): Promise<boolean> {
    const now = this.now().getTime();
    return this.store.transact(this.key(accountId, endpoint), (stored) => {
      const window = currentWindow(stored, now, this.windowMs);
      return { next: window, result: window.callsMade < this.config.callLimit };
    });
  }

  async recordCall(accountId: string, endpoint: string): Promise<void> {
    const now = this.now().getTime();
    await this.store.transact(this.key(accountId, endpoint), (stored) => {
      const window = currentWindow(stored, now, this.windowMs);
      return { next: { ...window, callsMade: window.callsMade + 1 }, result: undefined };
    });
  }

  /** 0 while budget remains, else whole seconds until the window resets */
  async waitSeconds(accountId: string, endpoint: string): Promise<number> {
    const now = this.now().getTime();
    return this.store.transact(this.key(accountId, endpoint), (stored) => {
      const window = currentWindow(stored, now, this.windowMs);
      const wait = window.callsMade < this.config.callLimit ? 0 : secondsUntilReset(window, now);
      return { next: window, result: wait };
    });
  }

  /**
   * Check and record in one transaction. Throws RateLimitError, without recording,
   * when the window is spent.
   */
  async acquire(accountId: string, endpoint: string): Promise<void> {
    const now = this.now().getTime();
    const waitSeconds = await this.store.transact<number | null>(this.key(accountId, endpoint), (stored) => {
      const window = currentWindow(stored, now, this.windowMs);
      if (window.callsMade >= this.config.callLimit) {
        return { next: window, result: secondsUntilReset(window, now) };
      }
      return { next: { ...window, callsMade: window.callsMade + 1 }, result: null };
    });

    if (waitSeconds !== null) {
      console.warn(`[rate-limit] Budget spent for ${accountId} ${endpoint}, retry in ${waitSeconds}s`);
      throw new RateLimitError(endpoint, waitSeconds, this.config.callLimit);
    }
  }

  async getStatus(accountId: string, endpoint: string): Promise<RateLimitStatus> {
    const now = this.now().getTime();
    const window = await this.store.transact(this.key(accountId, endpoint), (stored) => {
      const current = currentWindow(stored, now, this.windowMs);
      return { next: current, result: current };
    });

    return {
      limit: this.config.callLimit,
      remaining: Math.max(0, this.config.callLimit - window.callsMade),
      resetAt: new Date(window.resetTime),
      windowMinutes: this.config.windowMinutes,
    };
  }
}
