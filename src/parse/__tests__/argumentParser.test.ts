import { ArgumentParser, makeParser } from '../argumentParser';
import { flag, option, type AnyOption } from '../../options/optionDeclaration';
import { oneOf, types } from '../../convert/valueTypes';
import {
  ConversionError,
  DuplicateOptionError,
  EmptyInputError,
  MissingRequiredOptionError,
  MissingValueError,
  UnexpectedValueError,
  UnknownOptionError,
} from '../../errors/argParseErrors';

function countParser() {
  return makeParser(option('count', types.integer, { alias: 'n', help: 'How many' }));
}

describe('ArgumentParser', () => {
  it('reads an inline long value', () => {
    const result = countParser().parse(['prog', '--count=3']);
    expect(result.programName).toBe('prog');
    expect(result.values).toEqual([3]);
    expect(result.named.count).toBe(3);
    expect(result.remainingArguments).toEqual([]);
  });

  it('triggers flags and keeps positionals', () => {
    const result = makeParser(flag('verbose')).parse(['prog', '--verbose', 'file.txt']);
    expect(result.named.verbose).toBe(true);
    expect(result.remainingArguments).toEqual(['file.txt']);
  });

  it('reports untriggered flags as false', () => {
    const result = makeParser(flag('verbose')).parse(['prog']);
    expect(result.values).toEqual([false]);
  });

  it('treats a short alias like the long name', () => {
    const viaShort = countParser().parse(['prog', '-n', '7']);
    const viaLong = countParser().parse(['prog', '--count=7']);
    expect(viaShort).toEqual(viaLong);
    expect(viaShort.named.count).toBe(7);
  });

  it('consumes the following token for --name value', () => {
    const result = countParser().parse(['prog', 'a', '--count', '4', 'b']);
    expect(result.named.count).toBe(4);
    expect(result.remainingArguments).toEqual(['a', 'b']);
  });

  it('lets the last occurrence win', () => {
    expect(countParser().parse(['prog', '--count=1', '--count=2']).named.count).toBe(2);
    expect(countParser().parse(['prog', '-n', '5', '--count', '6', '-n', '8']).named.count).toBe(8);
  });

  it('consumes a dash-prefixed token as a value', () => {
    const result = countParser().parse(['prog', '-n', '-5']);
    expect(result.named.count).toBe(-5);
  });

  it('classifies a standalone negative number as a short option', () => {
    expect(() => countParser().parse(['prog', '--count=1', '-5'])).toThrow('unknown option: -5');
  });

  it('never classifies the program name', () => {
    const result = makeParser(flag('verbose')).parse(['--verbose']);
    expect(result.programName).toBe('--verbose');
    expect(result.named.verbose).toBe(false);
  });

  it('keeps positionals in input order, including "-" and empty strings', () => {
    const result = makeParser(flag('x', { alias: 'x' })).parse(['prog', 'c', '-', '', 'a', '-x', 'b']);
    expect(result.remainingArguments).toEqual(['c', '-', '', 'a', 'b']);
    expect(result.named.x).toBe(true);
  });

  it('fails when a valued option ends the input', () => {
    expect(() => countParser().parse(['prog', '--count'])).toThrow(MissingValueError);
    expect(() => countParser().parse(['prog', '-n'])).toThrow('missing value for -n');
  });

  it('fails when a valued option is never supplied', () => {
    expect(() => countParser().parse(['prog'])).toThrow(MissingRequiredOptionError);
    expect(() => countParser().parse(['prog', 'file'])).toThrow('missing required option: --count');
  });

  it('names the first missing option in declaration order', () => {
    const parser = makeParser(option('b', types.string), flag('f'), option('a', types.string));
    expect(() => parser.parse(['prog'])).toThrow('missing required option: --b');
    expect(() => parser.parse(['prog', '--b=x'])).toThrow('missing required option: --a');
  });

  it('fails on unknown long options with the option name', () => {
    let caught: unknown;
    try {
      makeParser(flag('verbose')).parse(['prog', '--bogus']);
    } catch (e: unknown) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnknownOptionError);
    expect(caught).toMatchObject({ option: 'bogus', token: '--bogus' });
  });

  it('fails on unknown inline and short options', () => {
    expect(() => countParser().parse(['prog', '--size=3'])).toThrow('unknown option: --size=3');
    expect(() => countParser().parse(['prog', '-q'])).toThrow('unknown option: -q');
    expect(() => countParser().parse(['prog', '--'])).toThrow(UnknownOptionError);
  });

  it('fails on empty input', () => {
    expect(() => countParser().parse([])).toThrow(EmptyInputError);
  });

  it('surfaces conversion failures', () => {
    expect(() => countParser().parse(['prog', '--count=three'])).toThrow(ConversionError);
    expect(() => countParser().parse(['prog', '-n', '1.5'])).toThrow("cannot convert '1.5' to integer for --count");
  });

  it('rejects duplicate declarations at construction', () => {
    expect(() => makeParser(flag('x', { alias: 'a' }), flag('y', { alias: 'a' }))).toThrow(DuplicateOptionError);
  });

  it('ignores declarations pushed onto the caller array after construction', () => {
    const decls: AnyOption[] = [flag('verbose')];
    const parser = new ArgumentParser(decls);
    decls.push(option('count', types.integer));

    expect(parser.parse(['prog', '--verbose']).values).toEqual([true]);
    expect(parser.parse(['prog']).named).toEqual({ verbose: false });
    expect(() => parser.parse(['prog', '--count=1'])).toThrow(UnknownOptionError);
  });

  describe('inline value on a flag', () => {
    it('triggers the flag and drops the value by default', () => {
      const result = makeParser(flag('verbose')).parse(['prog', '--verbose=no', 'x']);
      expect(result.named.verbose).toBe(true);
      expect(result.remainingArguments).toEqual(['x']);
    });

    it('fails when rejectFlagValues is set', () => {
      const parser = new ArgumentParser([flag('verbose')], { rejectFlagValues: true });
      expect(() => parser.parse(['prog', '--verbose=no'])).toThrow(UnexpectedValueError);
      expect(() => parser.parse(['prog', '--verbose=no'])).toThrow('option --verbose does not take a value: --verbose=no');
      expect(parser.parse(['prog', '--verbose']).named.verbose).toBe(true);
    });
  });

  it('extracts a typed tuple and record across mixed declarations', () => {
    const parser = makeParser(
      option('count', types.integer, { alias: 'n' }),
      option('ratio', types.number),
      option('mode', oneOf('fast', 'safe')),
      option('id', types.bigint),
      flag('verbose', { alias: 'v' }),
      option('name', types.string),
    );
    const result = parser.parse(['tool', '-v', '--ratio', '0.25', 'in.txt', '--mode=safe', '--id=99', '-n', '2', '--name', 'x']);

    const [count, ratio, mode, id, verbose, name] = result.values;
    const typed: [number, number, 'fast' | 'safe', bigint, boolean, string] = [count, ratio, mode, id, verbose, name];
    expect(typed).toEqual([2, 0.25, 'safe', 99n, true, 'x']);
    expect(result.named).toEqual({ count: 2, ratio: 0.25, mode: 'safe', id: 99n, verbose: true, name: 'x' });
    expect(result.remainingArguments).toEqual(['in.txt']);
  });

  it('gives identical results for the same input on fresh parsers', () => {
    const argv = ['prog', '--count=9', 'rest', '-n', '10'];
    expect(countParser().parse(argv)).toEqual(countParser().parse(argv));
  });

  it('does not carry state from one parse to the next', () => {
    const parser = makeParser(option('count', types.integer), flag('verbose'));
    expect(parser.parse(['prog', '--count=1', '--verbose']).values).toEqual([1, true]);
    expect(() => parser.parse(['prog'])).toThrow(MissingRequiredOptionError);
    expect(parser.parse(['prog', '--count=2']).values).toEqual([2, false]);
  });

  describe('tryParse', () => {
    it('wraps success', () => {
      const outcome = countParser().tryParse(['prog', '-n', '1']);
      expect(outcome.ok).toBe(true);
      if (outcome.ok) expect(outcome.result.named.count).toBe(1);
    });

    it('returns the parse failure instead of throwing', () => {
      const outcome = countParser().tryParse(['prog', '--bogus']);
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(UnknownOptionError);
        expect(outcome.error.code).toBe('UNKNOWN_OPTION');
      }
    });
  });
});
