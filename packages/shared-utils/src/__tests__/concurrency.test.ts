import { describe, it, expect } from 'vitest';
import { createConcurrencyLimiter } from '../concurrency.js';

function deferred<T>() {
  let resolve: (v: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('createConcurrencyLimiter', () => {
  it('슬롯 수를 넘지 않아야 함', async () => {
    const limiter = createConcurrencyLimiter(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    let maxActive = 0;

    const results = gates.map((g, i) =>
      limiter.run(async () => {
        maxActive = Math.max(maxActive, limiter.active());
        await g.promise;
        return i;
      }),
    );

    // 마이크로태스크 진행
    await Promise.resolve();
    expect(limiter.active()).toBe(2);
    expect(limiter.pending()).toBe(1);

    gates[0].resolve(0);
    gates[1].resolve(1);
    gates[2].resolve(2);

    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2]);
    expect(maxActive).toBeLessThanOrEqual(2);
    expect(limiter.active()).toBe(0);
  });

  it('실패한 작업도 슬롯을 반환해야 함', async () => {
    const limiter = createConcurrencyLimiter(1);

    await expect(
      limiter.run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(limiter.run(async () => 'ok')).resolves.toBe('ok');
    expect(limiter.active()).toBe(0);
  });

  it('잘못된 슬롯 수는 에러를 던져야 함', () => {
    expect(() => createConcurrencyLimiter(0)).toThrow('maxConcurrent must be a positive integer');
  });
});
