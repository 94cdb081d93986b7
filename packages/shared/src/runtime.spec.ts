import { sleep } from './runtime';

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    const started = Date.now();
    await sleep(20);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it('should resolve as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);

    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
