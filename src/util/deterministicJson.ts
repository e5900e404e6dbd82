import { formatValue } from '../convert/convert';

/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order
 * - Renders bigints through formatValue (JSON has no bigint)
 *
 * Output ends with a newline so files written from it diff cleanly.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  return JSON.stringify(sortKeysDeep(value), null, space) + '\n';
}

function sortKeysDeep(v: unknown): unknown {
  if (typeof v === 'bigint') return formatValue(v);
  if (v === null || typeof v !== 'object') return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);

  // fromEntries defines own properties, so a "__proto__" key stays a key.
  return Object.fromEntries(Object.keys(v).sort().map((k) => [k, sortKeysDeep(Reflect.get(v, k))]));
}
