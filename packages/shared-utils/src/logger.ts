import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (normalized === 'DEBUG' || normalized === 'INFO' || normalized === 'WARN' || normalized === 'ERROR') {
    return normalized;
  }
  return 'INFO';
}

export class Logger {
  constructor(
    private serviceName: string,
    private minLevel?: LogLevel,
  ) {}

  private enabled(level: LogLevel): boolean {
    // LOG_LEVEL은 호출 시점에 읽는다 (테스트/런타임 중 변경 허용)
    const threshold = this.minLevel ?? parseLogLevel(process.env.LOG_LEVEL);
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.enabled(level)) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    this.log('ERROR', message, toErrorData(error));
  }
}

/**
 * 로그 data 필드용 에러 직렬화
 * - Error 인스턴스는 JSON.stringify 시 빈 객체가 되므로 message/stack만 추린다.
 */
export function toErrorData(error: unknown): unknown {
  return error instanceof Error ? { message: error.message, stack: error.stack } : error;
}

export function createLogger(serviceName: string, minLevel?: LogLevel): Logger {
  return new Logger(serviceName, minLevel);
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
