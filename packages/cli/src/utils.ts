import { InvalidArgumentError } from 'commander';

/**
 * Clean a path typed or pasted by the user: surrounding whitespace, then
 * double quotes, then single quotes (as shells and file managers add them).
 */
export function normalizeInputPath(raw: string): string {
  return raw.trim().replace(/^"+|"+$/g, '').replace(/^'+|'+$/g, '');
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a non-negative integer');
  return Number.parseInt(value, 10);
}
