export type ArgParseErrorCode =
  | 'EMPTY_INPUT'
  | 'UNKNOWN_OPTION'
  | 'DUPLICATE_OPTION'
  | 'MISSING_VALUE'
  | 'CONVERSION_FAILED'
  | 'MISSING_REQUIRED_OPTION'
  | 'INVALID_OPTION'
  | 'UNEXPECTED_VALUE'
  | 'INVALID_DECLARATION_FILE';

/**
 * Base class for every failure raised while declaring options or parsing an argument vector.
 * Nothing in the library prints or exits; callers decide how to present these.
 */
export abstract class ArgParseError extends Error {
  abstract readonly code: ArgParseErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export function isArgParseError(e: unknown): e is ArgParseError {
  return e instanceof ArgParseError;
}

export class EmptyInputError extends ArgParseError {
  readonly code = 'EMPTY_INPUT';

  constructor() {
    super('argument vector must contain at least the program name');
  }
}

/** `option` is the name or alias as written, without dashes; `token` is the raw argument. */
export class UnknownOptionError extends ArgParseError {
  readonly code = 'UNKNOWN_OPTION';

  constructor(
    readonly option: string,
    readonly token: string,
  ) {
    super(`unknown option: ${token}`);
  }
}

export class DuplicateOptionError extends ArgParseError {
  readonly code = 'DUPLICATE_OPTION';

  constructor(
    readonly key: string,
    readonly keyKind: 'name' | 'alias',
  ) {
    super(keyKind === 'name' ? `duplicate option name: --${key}` : `duplicate short alias: -${key}`);
  }
}

export class MissingValueError extends ArgParseError {
  readonly code = 'MISSING_VALUE';

  constructor(
    readonly option: string,
    readonly token: string,
  ) {
    super(`missing value for ${token}`);
  }
}

export class ConversionError extends ArgParseError {
  readonly code = 'CONVERSION_FAILED';

  constructor(
    readonly raw: string,
    readonly typeName: string,
    readonly option?: string,
    readonly reason?: string,
  ) {
    const target = option ? ` for --${option}` : '';
    const why = reason ? `: ${reason}` : '';
    super(`cannot convert '${raw}' to ${typeName}${target}${why}`);
  }
}

export class MissingRequiredOptionError extends ArgParseError {
  readonly code = 'MISSING_REQUIRED_OPTION';

  constructor(readonly option: string) {
    super(`missing required option: --${option}`);
  }
}

export class InvalidOptionError extends ArgParseError {
  readonly code = 'INVALID_OPTION';

  constructor(
    readonly option: string,
    detail: string,
  ) {
    super(`invalid option '${option}': ${detail}`);
  }
}

/** Raised for `--flag=value` when the parser is configured to reject values on flags. */
export class UnexpectedValueError extends ArgParseError {
  readonly code = 'UNEXPECTED_VALUE';

  constructor(
    readonly option: string,
    readonly token: string,
  ) {
    super(`option --${option} does not take a value: ${token}`);
  }
}

export class DeclarationFileError extends ArgParseError {
  readonly code = 'INVALID_DECLARATION_FILE';

  constructor(
    readonly file: string,
    readonly problems: string[],
  ) {
    super(`invalid declaration file ${file}: ${problems.join('; ')}`);
  }
}
