import { convert } from '../convert/convert';
import type { ValueType } from '../convert/valueTypes';
import { InvalidOptionError, MissingRequiredOptionError } from '../errors/argParseErrors';

export type OptionSettings = {
  /** Single-character short alias, used as `-c`. */
  alias?: string;
  help?: string;
};

/**
 * One declared option. The parser only talks to the capability set
 * (`requiresValue`, `acceptValue`, `trigger`); typed access goes through `value()`.
 */
export abstract class OptionDeclaration<T = unknown, N extends string = string> {
  readonly shortAlias: string | undefined;
  readonly helpText: string;

  protected constructor(
    readonly name: N,
    settings: OptionSettings,
  ) {
    if (name.length === 0) throw new InvalidOptionError(name, 'name must not be empty');
    if (name.startsWith('-')) throw new InvalidOptionError(name, 'name must not start with "-"');
    if (name.includes('=')) throw new InvalidOptionError(name, 'name must not contain "="');
    const alias = settings.alias;
    if (alias !== undefined && (alias.length !== 1 || alias === '-')) {
      throw new InvalidOptionError(name, `short alias must be a single character other than "-", got '${alias}'`);
    }
    this.shortAlias = alias;
    this.helpText = settings.help ?? '';
  }

  /** Name of the value type, for usage listings. */
  abstract readonly typeName: string;

  abstract requiresValue(): boolean;
  abstract acceptValue(raw: string): void;
  abstract trigger(): void;
  abstract isSet(): boolean;
  abstract value(): T;
  /** Clears parse state before a new pass. */
  abstract reset(): void;
}

export type AnyOption = OptionDeclaration<unknown, string>;

export class ValuedOption<T, N extends string = string> extends OptionDeclaration<T, N> {
  private slot: { value: T } | undefined;

  constructor(
    name: N,
    readonly type: ValueType<T>,
    settings: OptionSettings = {},
  ) {
    super(name, settings);
  }

  get typeName(): string {
    return this.type.name;
  }

  requiresValue(): boolean {
    return true;
  }

  /** Last write wins. */
  acceptValue(raw: string): void {
    this.slot = { value: convert(raw, this.type, this.name) };
  }

  trigger(): void {
    throw new InvalidOptionError(this.name, 'requires a value and cannot be used as a flag');
  }

  isSet(): boolean {
    return this.slot !== undefined;
  }

  value(): T {
    if (!this.slot) throw new MissingRequiredOptionError(this.name);
    return this.slot.value;
  }

  reset(): void {
    this.slot = undefined;
  }
}

export class FlagOption<N extends string = string> extends OptionDeclaration<boolean, N> {
  readonly typeName = 'flag';
  private triggered = false;

  constructor(name: N, settings: OptionSettings = {}) {
    super(name, settings);
  }

  requiresValue(): boolean {
    return false;
  }

  acceptValue(raw: string): void {
    throw new InvalidOptionError(this.name, `is a flag and does not take a value ('${raw}')`);
  }

  trigger(): void {
    this.triggered = true;
  }

  isSet(): boolean {
    return this.triggered;
  }

  value(): boolean {
    return this.triggered;
  }

  reset(): void {
    this.triggered = false;
  }
}

function toSettings(settings: OptionSettings | string | undefined): OptionSettings {
  if (settings === undefined) return {};
  return typeof settings === 'string' ? { help: settings } : settings;
}

/** Declares a valued option. A string in place of settings is the help text. */
export function option<const N extends string, T>(
  name: N,
  type: ValueType<T>,
  settings?: OptionSettings | string,
): ValuedOption<T, N> {
  return new ValuedOption(name, type, toSettings(settings));
}

/** Declares a boolean flag; presence sets it. */
export function flag<const N extends string>(name: N, settings?: OptionSettings | string): FlagOption<N> {
  return new FlagOption(name, toSettings(settings));
}
