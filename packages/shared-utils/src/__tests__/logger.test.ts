import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.LOG_LEVEL;
  });

  it('INFO 로그를 JSON 한 줄로 출력해야 함', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('test-service');

    logger.info('조회 완료', { count: 3 });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry.level).toBe('INFO');
    expect(entry.service).toBe('test-service');
    expect(entry.message).toBe('조회 완료');
    expect(entry.data).toEqual({ count: 3 });
  });

  it('error는 Error 객체를 message/stack으로 직렬화해야 함', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('test-service');

    logger.error('실패', new Error('boom'));

    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry.data.message).toBe('boom');
    expect(typeof entry.data.stack).toBe('string');
  });

  it('LOG_LEVEL보다 낮은 로그는 출력하지 않아야 함', () => {
    process.env.LOG_LEVEL = 'WARN';
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('test-service');

    logger.info('숨김');
    logger.warn('표시');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
