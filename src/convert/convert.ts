import { ConversionError } from '../errors/argParseErrors';
import type { ValueType } from './valueTypes';

/**
 * Converts raw argument text into the type described by `type`.
 * Throws ConversionError when the text is outside the type's grammar.
 */
export function convert<T>(raw: string, type: ValueType<T>, optionName?: string): T {
  const outcome = type.convert(raw);
  if (!outcome.ok) throw new ConversionError(raw, type.name, optionName, outcome.reason);
  return outcome.value;
}

/** Text form of a converted value, for diagnostics and JSON output only. */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'bigint') return `${value.toString()}n`;
  if (value === undefined) return '(unset)';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}
