import { RateLimitError } from '../adapters/ChannelAdapter';
import { PlatformRateLimitService } from '../services/platformRateLimitService';
import { InMemoryRateLimitStore } from './helpers/fakes';

describe('PlatformRateLimitService', () => {
  let store: InMemoryRateLimitStore;
  let now: Date;
  let limiter: PlatformRateLimitService;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    store = new InMemoryRateLimitStore();
    now = new Date('2024-05-01T12:00:00.000Z');
    limiter = new PlatformRateLimitService(store, { callLimit: 3, windowMinutes: 60 }, () => now);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should allow calls until the window budget is spent', async () => {
    for (let i = 0; i < 3; i++) {
      expect(await limiter.canCall('account-1', 'send_message')).toBe(true);
      await limiter.recordCall('account-1', 'send_message');
    }

    expect(await limiter.canCall('account-1', 'send_message')).toBe(false);
  });

  it('should report the seconds left in a spent window', async () => {
    for (let i = 0; i < 3; i++) {
      await limiter.recordCall('account-1', 'send_message');
    }

    expect(await limiter.waitSeconds('account-1', 'send_message')).toBe(3600);

    now = new Date('2024-05-01T12:30:00.000Z');
    expect(await limiter.waitSeconds('account-1', 'send_message')).toBe(1800);
  });

  it('should report no wait while budget remains', async () => {
    await limiter.recordCall('account-1', 'send_message');

    expect(await limiter.waitSeconds('account-1', 'send_message')).toBe(0);
  });

  it('should start a fresh window once the old one has expired', async () => {
    for (let i = 0; i < 3; i++) {
      await limiter.recordCall('account-1', 'send_message');
    }

    now = new Date('2024-05-01T13:00:00.000Z');

    expect(await limiter.canCall('account-1', 'send_message')).toBe(true);
    const status = await limiter.getStatus('account-1', 'send_message');
    expect(status).toEqual({
      limit: 3,
      remaining: 3,
      resetAt: new Date('2024-05-01T14:00:00.000Z'),
      windowMinutes: 60,
    });
  });

  it('should keep separate budgets per account and endpoint', async () => {
    for (let i = 0; i < 3; i++) {
      await limiter.recordCall('account-1', 'send_message');
    }

    expect(await limiter.canCall('account-1', 'user_profile')).toBe(true);
    expect(await limiter.canCall('account-2', 'send_message')).toBe(true);
  });

  it('should store windows under the account and endpoint key', async () => {
    await limiter.recordCall('account-1', 'send_message');

    expect(store.windows.get('platform:ratelimit:account-1:send_message')).toEqual({
      callsMade: 1,
      windowStart: now.getTime(),
      resetTime: now.getTime() + 3600 * 1000,
    });
  });

  describe('acquire', () => {
    it('should record one call per successful acquire', async () => {
      await limiter.acquire('account-1', 'send_message');
      await limiter.acquire('account-1', 'send_message');

      const status = await limiter.getStatus('account-1', 'send_message');
      expect(status.remaining).toBe(1);
    });

    it('should throw RateLimitError without recording once the budget is spent', async () => {
      for (let i = 0; i < 3; i++) {
        await limiter.acquire('account-1', 'send_message');
      }

      const attempt = limiter.acquire('account-1', 'send_message');

      await expect(attempt).rejects.toBeInstanceOf(RateLimitError);
      await expect(attempt).rejects.toMatchObject({ retryAfter: 3600 });
      expect(store.windows.get('platform:ratelimit:account-1:send_message')?.callsMade).toBe(3);
    });

    it('should admit exactly the budget under concurrent callers', async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => limiter.acquire('account-1', 'send_message'))
      );

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(3);
      expect(results.filter((result) => result.status === 'rejected')).toHaveLength(2);
    });
  });
});
