/**
 * Durations are integer microseconds: the journal's timestamps have
 * microsecond precision and stay well inside Number.MAX_SAFE_INTEGER.
 */

export const MICROS_PER_SECOND = 1_000_000;
export const MICROS_PER_DAY = 86_400 * MICROS_PER_SECOND;

function assertMicros(value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Duration must be a whole number of microseconds, got ${value}`);
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a duration as `H:MM:SS[.ffffff]`, prefixed with `N day(s), ` when it
 * spans whole days. Negative durations borrow from the day count, so
 * -1 second renders as `-1 day, 23:59:59`.
 */
export function formatDuration(micros: number): string {
  assertMicros(micros);

  const days = Math.floor(micros / MICROS_PER_DAY);
  const withinDay = micros - days * MICROS_PER_DAY;
  const fraction = withinDay % MICROS_PER_SECOND;
  const seconds = (withinDay - fraction) / MICROS_PER_SECOND;

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  let clock = `${hours}:${pad(minutes, 2)}:${pad(seconds % 60, 2)}`;
  if (fraction !== 0) {
    clock += `.${pad(fraction, 6)}`;
  }

  if (days !== 0) {
    return `${days} day${Math.abs(days) === 1 ? '' : 's'}, ${clock}`;
  }
  return clock;
}

/**
 * Integer division rounding to the nearest whole number, ties to even
 */
export function divideRounded(dividend: number, divisor: number): number {
  assertMicros(dividend);
  if (!Number.isSafeInteger(divisor) || divisor <= 0) {
    throw new RangeError(`Divisor must be a positive integer, got ${divisor}`);
  }

  const quotient = Math.floor(dividend / divisor);
  const remainder = dividend - quotient * divisor;
  const twice = remainder * 2;

  if (twice > divisor || (twice === divisor && quotient % 2 !== 0)) {
    return quotient + 1;
  }
  return quotient;
}
