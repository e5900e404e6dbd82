export type ConversionOutcome<T> = { ok: true; value: T } | { ok: false; reason?: string };

/**
 * Type tag for a valued option: a name used in diagnostics plus the textual grammar
 * that turns a raw argument into `T`.
 */
export type ValueType<T> = {
  readonly name: string;
  convert(raw: string): ConversionOutcome<T>;
};

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+(\.\d+)?|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_WORDS = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_WORDS = new Set(['0', 'false', 'no', 'n', 'off']);

function accept<T>(value: T): ConversionOutcome<T> {
  return { ok: true, value };
}

function reject(reason?: string): { ok: false; reason?: string } {
  return { ok: false, reason };
}

const stringType: ValueType<string> = {
  name: 'string',
  convert: (raw) => accept(raw),
};

const integerType: ValueType<number> = {
  name: 'integer',
  convert(raw) {
    if (!INTEGER_RE.test(raw)) return reject('expected a decimal integer');
    const n = Number(raw);
    if (!Number.isSafeInteger(n)) return reject('integer out of range');
    return accept(n);
  },
};

const numberType: ValueType<number> = {
  name: 'number',
  convert(raw) {
    if (!FLOAT_RE.test(raw)) return reject('expected a decimal number');
    const n = Number(raw);
    if (!Number.isFinite(n)) return reject('number out of range');
    return accept(n);
  },
};

const bigintType: ValueType<bigint> = {
  name: 'bigint',
  convert(raw) {
    if (!INTEGER_RE.test(raw)) return reject('expected a decimal integer');
    return accept(BigInt(raw.startsWith('+') ? raw.slice(1) : raw));
  },
};

const booleanType: ValueType<boolean> = {
  name: 'boolean',
  convert(raw) {
    const s = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(s)) return accept(true);
    if (FALSE_WORDS.has(s)) return accept(false);
    return reject('expected one of true|false|yes|no|on|off|1|0');
  },
};

/** Built-in type tags. */
export const types = {
  string: stringType,
  integer: integerType,
  number: numberType,
  bigint: bigintType,
  boolean: booleanType,
} as const;

/** A string option restricted to the listed choices, typed as their literal union. */
export function oneOf<const C extends readonly [string, ...string[]]>(...choices: C): ValueType<C[number]> {
  return {
    name: choices.join('|'),
    convert(raw) {
      const hit = choices.find((c) => c === raw);
      return hit === undefined ? reject(`expected one of ${choices.join('|')}`) : accept(hit);
    },
  };
}

/**
 * Wraps a plain parsing function. Throwing from `parse` rejects the raw text; the thrown
 * message becomes the conversion failure reason.
 */
export function customType<T>(name: string, parse: (raw: string) => T): ValueType<T> {
  return {
    name,
    convert(raw) {
      try {
        return accept(parse(raw));
      } catch (e: unknown) {
        return reject(e instanceof Error ? e.message : String(e));
      }
    },
  };
}
