import { SlidingWindowLimiter } from './sliding-window.limiter';

describe('SlidingWindowLimiter', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 0;
  });

  it('should reject a non-positive limit', () => {
    expect(
      () => new SlidingWindowLimiter({ perSecond: 0, perMinute: 60 }, clock),
    ).toThrow(RangeError);
  });

  it('should enforce the per-second ceiling', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 2, perMinute: 60 }, clock);

    expect(limiter.allow('a')).toBe(true);
    expect(limiter.allow('a')).toBe(true);
    expect(limiter.check('a')).toEqual({
      allowed: false,
      window: 'second',
      retryAfterMs: 1_000,
    });

    now = 1_000;
    expect(limiter.allow('a')).toBe(true);
  });

  it('should keep counting when the clock steps backwards', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 2, perMinute: 100 }, clock);

    now = 1_000;
    expect(limiter.allow('a')).toBe(true);
    now = 900;
    expect(limiter.allow('a')).toBe(true);

    now = 1_950;
    expect(limiter.check('a')).toEqual({
      allowed: false,
      window: 'second',
      retryAfterMs: 50,
    });
  });

  it('should enforce the per-minute ceiling as the window slides', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 2, perMinute: 3 }, clock);

    limiter.allow('a');
    limiter.allow('a');
    now = 1_000;
    expect(limiter.allow('a')).toBe(true);
    expect(limiter.check('a')).toEqual({
      allowed: false,
      window: 'minute',
      retryAfterMs: 59_000,
    });

    now = 60_000;
    expect(limiter.allow('a')).toBe(true);
  });

  it('should report the longer wait when both windows are full', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 1, perMinute: 2 }, clock);

    limiter.allow('a');
    now = 500;
    expect(limiter.check('a')).toEqual({
      allowed: false,
      window: 'second',
      retryAfterMs: 500,
    });

    now = 1_500;
    expect(limiter.allow('a')).toBe(true);
    now = 1_600;
    expect(limiter.check('a')).toEqual({
      allowed: false,
      window: 'minute',
      retryAfterMs: 58_400,
    });
  });

  it('should not count rejected requests', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 1, perMinute: 60 }, clock);

    limiter.allow('a');
    for (let i = 0; i < 10; i++) {
      limiter.allow('a');
    }

    now = 1_000;
    expect(limiter.allow('a')).toBe(true);
  });

  it('should keep clients independent', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 1, perMinute: 60 }, clock);

    expect(limiter.allow('a')).toBe(true);
    expect(limiter.allow('b')).toBe(true);
    expect(limiter.allow('a')).toBe(false);
  });

  it('should admit exactly the per-minute ceiling out of 200 concurrent requests', async () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 1_000, perMinute: 60 }, clock);

    const results = await Promise.all(
      Array.from({ length: 200 }, () =>
        Promise.resolve().then(() => limiter.allow('burst')),
      ),
    );

    expect(results.filter(Boolean)).toHaveLength(60);
    expect(results.filter((allowed) => !allowed)).toHaveLength(140);
  });

  it('should forget a client once its window has aged out', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 10, perMinute: 60 }, clock);

    limiter.allow('a');
    expect(limiter.has('a')).toBe(true);

    now = 60_000;
    limiter.allow('b');

    expect(limiter.has('a')).toBe(false);
    expect(limiter.size).toBe(1);
  });

  it('should keep a client with recent requests', () => {
    const limiter = new SlidingWindowLimiter({ perSecond: 10, perMinute: 60 }, clock);

    limiter.allow('a');
    now = 30_000;
    limiter.allow('b');

    expect(limiter.has('a')).toBe(true);
    expect(limiter.size).toBe(2);
  });
});
