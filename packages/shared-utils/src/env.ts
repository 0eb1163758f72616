/**
 * 환경변수 읽기
 * - .env 파일 로딩은 env-loader가 한다. 여기서는 process.env만 본다.
 * - 공백뿐인 값은 설정되지 않은 것으로 본다.
 */
export function env(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

export function envNumber(key: string): number | undefined;
export function envNumber(key: string, defaultValue: number): number;
export function envNumber(key: string, defaultValue?: number): number | undefined {
  const raw = env(key);
  if (raw === undefined) return defaultValue;

  const num = Number(raw);
  if (!Number.isFinite(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${raw}`);
  }
  return num;
}

export function mustPositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got: ${value}`);
  }
  return value;
}

export function mustRange(name: string, value: number, min: number, max: number): number {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`${name} must be between ${min} and ${max}, got: ${value}`);
  }
  return value;
}
