import {
  ArgParseError,
  EmptyInputError,
  MissingValueError,
  UnexpectedValueError,
} from '../errors/argParseErrors';
import type { AnyOption } from '../options/optionDeclaration';
import { OptionRegistry } from '../registry/optionRegistry';
import { classifyToken } from './classifyToken';
import { extractValues, type NamedOptionValues, type OptionValues } from './extractValues';

export type ParserSettings = {
  /**
   * Fail `--flag=value` with UnexpectedValueError instead of triggering the flag
   * and discarding the value. Default false.
   */
  rejectFlagValues?: boolean;
};

export type ParseResult<Ds extends readonly AnyOption[]> = {
  programName: string;
  values: OptionValues<Ds>;
  named: NamedOptionValues<Ds>;
  remainingArguments: string[];
};

export type ParseOutcome<Ds extends readonly AnyOption[]> =
  | { ok: true; result: ParseResult<Ds> }
  | { ok: false; error: ArgParseError };

/**
 * Parses argument vectors against a fixed declaration list. The first element of every
 * vector is the program name. Declarations are mutated in place during `parse` and are
 * cleared at the start of each pass.
 *
 * The list is copied into the registry on construction; later changes to the caller's
 * array do not reach the parser.
 */
export class ArgumentParser<const Ds extends readonly AnyOption[]> {
  readonly registry: OptionRegistry;
  private readonly rejectFlagValues: boolean;

  constructor(declarations: Ds, settings: ParserSettings = {}) {
    this.registry = new OptionRegistry(declarations);
    this.rejectFlagValues = settings.rejectFlagValues ?? false;
  }

  parse(argv: readonly string[]): ParseResult<Ds> {
    if (argv.length === 0) throw new EmptyInputError();
    for (const d of this.registry.declarations) d.reset();

    const [programName, ...rest] = argv;
    const remainingArguments: string[] = [];

    for (let i = 0; i < rest.length; i++) {
      const token = rest[i];
      const t = classifyToken(token);

      if (t.kind === 'positional') {
        remainingArguments.push(t.value);
        continue;
      }

      if (t.kind === 'longInline') {
        const decl = this.registry.resolveLong(t.key, token);
        if (decl.requiresValue()) decl.acceptValue(t.value);
        else if (this.rejectFlagValues) throw new UnexpectedValueError(decl.name, token);
        else decl.trigger();
        continue;
      }

      const decl = t.kind === 'long' ? this.registry.resolveLong(t.key, token) : this.registry.resolveShort(t.alias, token);
      if (!decl.requiresValue()) {
        decl.trigger();
        continue;
      }
      if (i + 1 >= rest.length) throw new MissingValueError(decl.name, token);
      decl.acceptValue(rest[++i]);
    }

    const { values, named } = extractValues<Ds>(this.registry.declarations);
    return { programName, values, named, remainingArguments };
  }

  /** Like `parse`, but returns parse failures instead of throwing them. */
  tryParse(argv: readonly string[]): ParseOutcome<Ds> {
    try {
      return { ok: true, result: this.parse(argv) };
    } catch (e: unknown) {
      if (e instanceof ArgParseError) return { ok: false, error: e };
      throw e;
    }
  }
}

export function makeParser<const Ds extends readonly AnyOption[]>(...declarations: Ds): ArgumentParser<Ds> {
  return new ArgumentParser(declarations);
}
