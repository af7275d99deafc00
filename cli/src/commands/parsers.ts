import { InvalidArgumentError } from 'commander';

/** Commander parser: positive integer. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

/** Commander parser: positive number (fractions allowed). */
export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return n;
}

/** Commander parser: JPEG quality 1–100. */
export function parseQuality(value: string): number {
  const n = parsePositiveInt(value);
  if (n > 100) {
    throw new InvalidArgumentError('Must be between 1 and 100.');
  }
  return n;
}

/** Commander parser: ratio in (0, 1]. */
export function parseRatio(value: string): number {
  const n = parsePositiveNumber(value);
  if (n > 1) {
    throw new InvalidArgumentError('Must be greater than 0 and at most 1.');
  }
  return n;
}
