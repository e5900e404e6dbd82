import { DuplicateOptionError, MissingRequiredOptionError } from '../errors/argParseErrors';
import type { AnyOption, OptionDeclaration } from '../options/optionDeclaration';

export type OptionValue<D> = D extends OptionDeclaration<infer T, string> ? T : never;
export type OptionName<D> = D extends OptionDeclaration<unknown, infer N> ? N : never;

/** Tuple of value types, in declaration order. */
export type OptionValues<Ds extends readonly AnyOption[]> = { -readonly [K in keyof Ds]: OptionValue<Ds[K]> };

/** Record of value types keyed by option name. */
export type NamedOptionValues<Ds extends readonly AnyOption[]> = {
  [D in Ds[number] as OptionName<D>]: OptionValue<D>;
};

function isValuesOf<Ds extends readonly AnyOption[]>(
  decls: readonly AnyOption[],
  values: unknown,
): values is OptionValues<Ds> {
  return Array.isArray(values) && values.length === decls.length;
}

function isNamedValuesOf<Ds extends readonly AnyOption[]>(
  decls: readonly AnyOption[],
  named: unknown,
): named is NamedOptionValues<Ds> {
  return (
    typeof named === 'object' &&
    named !== null &&
    Object.keys(named).length === decls.length &&
    decls.every((d) => Object.hasOwn(named, d.name))
  );
}

function firstRepeatedName(decls: readonly AnyOption[]): string | undefined {
  const seen = new Set<string>();
  for (const d of decls) {
    if (seen.has(d.name)) return d.name;
    seen.add(d.name);
  }
  return undefined;
}

/**
 * Reads every declaration's final value. The first valued option (in declaration order)
 * that never received a value fails with MissingRequiredOptionError. `Ds` is the declared
 * tuple the result is typed by; `decls` must hold the same declarations in the same order.
 *
 * Two declarations sharing a name would collapse into one key of `named`; that fails with
 * DuplicateOptionError.
 */
export function extractValues<Ds extends readonly AnyOption[] = readonly AnyOption[]>(
  decls: readonly AnyOption[],
): { values: OptionValues<Ds>; named: NamedOptionValues<Ds> } {
  for (const d of decls) {
    if (d.requiresValue() && !d.isSet()) throw new MissingRequiredOptionError(d.name);
  }

  const values: unknown = decls.map((d) => d.value());
  const named: unknown = Object.fromEntries(decls.map((d) => [d.name, d.value()]));
  if (!isValuesOf<Ds>(decls, values) || !isNamedValuesOf<Ds>(decls, named)) {
    throw new DuplicateOptionError(firstRepeatedName(decls) ?? '', 'name');
  }
  return { values, named };
}
