import { UsageError } from '@synthloop/shared';

/** A fixed set of named string fields */
export type Fields<K extends string> = Readonly<Record<K, string>>;

export function hasStringFields<K extends string>(
  value: Readonly<Record<string, unknown>>,
  keys: readonly K[],
): value is Readonly<Record<string, unknown>> & Fields<K> {
  return keys.every((key) => typeof value[key] === 'string');
}

export function missingFields(
  value: Readonly<Record<string, unknown>>,
  keys: readonly string[],
): string[] {
  return keys.filter((key) => typeof value[key] !== 'string');
}

/**
 * Copies exactly `keys` out of `source`.
 */
export function pickFields<K extends string>(source: Fields<K>, keys: readonly K[]): Fields<K> {
  const picked: Record<string, unknown> = {};
  for (const key of keys) {
    picked[key] = source[key];
  }
  if (!hasStringFields(picked, keys)) {
    throw new UsageError(`Missing fields: ${missingFields(picked, keys).join(', ')}`);
  }
  return picked;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
