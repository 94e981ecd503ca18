export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const MAX_DIGIT = 9;

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  const error = typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
  throw error;
}

export function ensureDigit(value: number): Digit {
  if (!isDigit(value)) {
    throw new Error(`Not a digit 1-9: ${String(value)}`);
  }
  return value;
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}

export function isDigit(value: number): value is Digit {
  return Number.isInteger(value) && value >= 1 && value <= MAX_DIGIT;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
