import { isRecord } from './typeGuards';

/**
 * Keys whose values are provider defined and passed through untouched.
 */
const OPAQUE_KEYS = new Set(['action', 'payload']);

const PROVIDER_DATA_KEYS = new Set(['providerData', 'provider_data']);

export function snakeToCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, char: string) =>
    char.toUpperCase(),
  );
}

/**
 * Brings a protocol item into its portable wire shape: camelCase keys, no provider side-channel
 * data.
 */
export function normalizeWireValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalizeWireValue);
  }
  if (!isRecord(value)) {
    return value;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (PROVIDER_DATA_KEYS.has(key)) {
      continue;
    }
    const camelKey = snakeToCamel(key);
    normalized[camelKey] = OPAQUE_KEYS.has(camelKey)
      ? child
      : normalizeWireValue(child);
  }
  return normalized;
}
