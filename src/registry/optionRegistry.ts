import { DuplicateOptionError, UnknownOptionError } from '../errors/argParseErrors';
import type { AnyOption } from '../options/optionDeclaration';

export type OptionDescription = {
  name: string;
  alias?: string;
  help: string;
  type: string;
  requiresValue: boolean;
};

/**
 * Long-name and short-alias lookup tables over a fixed declaration list.
 * Both maps hold the caller's declaration instances, never copies.
 */
export class OptionRegistry {
  private readonly byLongName = new Map<string, AnyOption>();
  private readonly byShortAlias = new Map<string, AnyOption>();
  readonly declarations: readonly AnyOption[];

  constructor(declarations: readonly AnyOption[]) {
    for (const decl of declarations) {
      if (this.byLongName.has(decl.name)) throw new DuplicateOptionError(decl.name, 'name');
      if (decl.shortAlias !== undefined && this.byShortAlias.has(decl.shortAlias)) {
        throw new DuplicateOptionError(decl.shortAlias, 'alias');
      }
      this.byLongName.set(decl.name, decl);
      if (decl.shortAlias !== undefined) this.byShortAlias.set(decl.shortAlias, decl);
    }
    this.declarations = [...declarations];
  }

  /** `token` is the raw argument, reported back in UnknownOptionError. */
  resolveLong(name: string, token = `--${name}`): AnyOption {
    const decl = this.byLongName.get(name);
    if (!decl) throw new UnknownOptionError(name, token);
    return decl;
  }

  resolveShort(alias: string, token = `-${alias}`): AnyOption {
    const decl = this.byShortAlias.get(alias);
    if (!decl) throw new UnknownOptionError(alias, token);
    return decl;
  }

  /** Declaration-ordered listing for usage renderers. */
  describe(): OptionDescription[] {
    return this.declarations.map((d) => ({
      name: d.name,
      ...(d.shortAlias !== undefined ? { alias: d.shortAlias } : {}),
      help: d.helpText,
      type: d.typeName,
      requiresValue: d.requiresValue(),
    }));
  }
}
