import { InvalidArgumentError } from 'commander';

/**
 * Commander option parser for base-10 integers.
 */
export function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}
