/**
 * 동시 실행 제한기 (고정 슬롯 + FIFO 대기열)
 * - 최대 maxConcurrent개의 작업만 동시에 실행된다.
 * - 작업이 실패해도 슬롯은 반환되고 다음 대기 작업이 시작된다.
 */
export type ConcurrencyLimiter = {
  readonly maxConcurrent: number;
  run<T>(fn: () => Promise<T>): Promise<T>;
  active(): number;
  pending(): number;
};

export function createConcurrencyLimiter(maxConcurrent: number): ConcurrencyLimiter {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0) {
    throw new Error(`maxConcurrent must be a positive integer, got: ${maxConcurrent}`);
  }

  let running = 0;
  const queue: Array<() => void> = [];

  function release() {
    running--;
    const next = queue.shift();
    if (next) next();
  }

  async function acquire(): Promise<void> {
    if (running < maxConcurrent) {
      running++;
      return;
    }
    await new Promise<void>((resolve) => {
      queue.push(() => {
        running++;
        resolve();
      });
    });
  }

  return {
    maxConcurrent,
    async run<T>(fn: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await fn();
      } finally {
        release();
      }
    },
    active: () => running,
    pending: () => queue.length,
  };
}
