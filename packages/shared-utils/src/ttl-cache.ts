import { DateTime } from 'luxon';

type CacheEntry<T> = {
  value: T;
  fetchedAt: number;
  expiresAt: number;
};

export type TtlCacheOptions = {
  ttlMs: number;
  /** 밀리초 단위 현재 시각 (테스트 주입용) */
  now?: () => number;
};

/**
 * TTL 캐시 + single-flight 갱신
 *
 * - TTL 내 조회는 같은 객체를 그대로 반환한다.
 * - 만료된 키를 여러 호출자가 동시에 갱신하려 하면 loader는 한 번만 실행되고
 *   나머지는 같은 Promise를 기다린다.
 * - loader가 실패하면 기존 엔트리는 건드리지 않고 모든 대기자에게 에러를 전달한다.
 */
export class TtlCache<T> {
  private readonly cache = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: TtlCacheOptions) {
    if (!Number.isFinite(opts.ttlMs) || opts.ttlMs <= 0) {
      throw new Error(`ttlMs must be positive, got: ${opts.ttlMs}`);
    }
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? (() => DateTime.now().toMillis());
  }

  get(key: string): T | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) return null;
    return entry.value;
  }

  set(key: string, value: T): void {
    const now = this.now();
    this.cache.set(key, { value, fetchedAt: now, expiresAt: now + this.ttlMs });
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /** 마지막 저장 시각 (ms). 엔트리가 없으면 null */
  fetchedAt(key: string): number | null {
    return this.cache.get(key)?.fetchedAt ?? null;
  }

  async getOrRefresh(
    key: string,
    loader: () => Promise<T>,
    opts?: { force?: boolean },
  ): Promise<T> {
    if (!opts?.force) {
      const hit = this.get(key);
      if (hit !== null) return hit;
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const p = (async () => {
      try {
        const value = await loader();
        this.set(key, value);
        return value;
      } finally {
        this.inFlight.delete(key);
      }
    })();

    this.inFlight.set(key, p);
    return p;
  }
}
