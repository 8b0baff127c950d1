import { createHash } from 'node:crypto';

/**
 * Build a fixed-length cache key from call arguments. Positional arguments
 * keep their order; named arguments are sorted by name so that
 * `{ a, b }` and `{ b, a }` produce the same key. MD5 is used for its
 * length, not for collision resistance.
 */
export function makeCacheKey(
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>> = {},
): string {
  const parts = args.map(stringifyPart);

  for (const name of Object.keys(named).sort()) {
    parts.push(`${name}=${stringifyPart(named[name])}`);
  }

  return createHash('md5').update(parts.join('|'), 'utf8').digest('hex');
}

function stringifyPart(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
