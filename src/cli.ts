#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { VERSION } from './index';
import { formatValue } from './convert/convert';
import { loadDeclarationFile } from './declarations/loadDeclarations';
import { isArgParseError } from './errors/argParseErrors';
import type { AnyOption } from './options/optionDeclaration';
import { serializeParseResult, writeJsonFile } from './output/writeResultJson';
import { ArgumentParser } from './parse/argumentParser';
import { stableStringify } from './util/deterministicJson';
import { createLogger, type Logger } from './util/logger';

/** Exit codes: 0 ok, 1 unusable declaration file, 2 argument vector rejected. */
export const EXIT_OK = 0;
export const EXIT_BAD_DECLARATIONS = 1;
export const EXIT_PARSE_FAILED = 2;

export type ParseCommandOptions = {
  declarations: string;
  /** Program name followed by its arguments. */
  argv: string[];
  out?: string;
  rejectFlagValues: boolean;
  verbose: boolean;
};

export type DescribeCommandOptions = {
  declarations: string;
  out?: string;
  verbose: boolean;
};

async function emit(json: string, out: string | undefined, log: Logger): Promise<void> {
  if (out) {
    await writeJsonFile(out, json);
    log.info(`Wrote: ${out}`);
  } else {
    process.stdout.write(json);
  }
}

/**
 * Loads the declaration file and builds a parser over it. Schema violations, bad names
 * and name/alias collisions all count as an unusable declaration file.
 */
async function buildParser(
  file: string,
  rejectFlagValues: boolean,
  log: Logger,
): Promise<ArgumentParser<AnyOption[]> | undefined> {
  try {
    const decls = await loadDeclarationFile(file);
    log.info(`Loaded ${decls.length} option declaration(s) from ${file}`);
    return new ArgumentParser(decls, { rejectFlagValues });
  } catch (e: unknown) {
    if (!isArgParseError(e)) throw e;
    log.error(`${e.code}: ${e.message}`);
    return undefined;
  }
}

export async function runParse(opts: ParseCommandOptions): Promise<number> {
  const log = createLogger(opts.verbose);
  const parser = await buildParser(opts.declarations, opts.rejectFlagValues, log);
  if (!parser) return EXIT_BAD_DECLARATIONS;

  const outcome = parser.tryParse(opts.argv);
  if (!outcome.ok) {
    log.error(`${outcome.error.code}: ${outcome.error.message}`);
    return EXIT_PARSE_FAILED;
  }

  const { result } = outcome;
  for (const d of parser.registry.declarations) {
    log.info(`--${d.name} = ${formatValue(d.value())}`);
  }
  log.info(`${result.remainingArguments.length} remaining argument(s)`);

  await emit(serializeParseResult(result), opts.out, log);
  return EXIT_OK;
}

export async function runDescribe(opts: DescribeCommandOptions): Promise<number> {
  const log = createLogger(opts.verbose);
  const parser = await buildParser(opts.declarations, false, log);
  if (!parser) return EXIT_BAD_DECLARATIONS;

  await emit(stableStringify({ options: parser.registry.describe() }), opts.out, log);
  return EXIT_OK;
}

function optionalPath(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() !== '' ? v : undefined;
}

export async function main(argv: string[]): Promise<number> {
  let exitCode = EXIT_OK;
  const program = new Command();

  program
    .name('typed-argparse')
    .description('Parse argument vectors against JSON option declarations and print the typed values')
    .version(VERSION)
    .exitOverride();

  program
    .command('parse')
    .description('Parse the operands after "--" (program name first) and print the result JSON')
    .requiredOption('-d, --declarations <file>', 'JSON option declaration file')
    .option('--out <file>', 'Write the result JSON to a file instead of stdout', '')
    .option('--reject-flag-values', 'Fail on --flag=value instead of discarding the value', false)
    .option('-v, --verbose', 'Verbose logging', false)
    .argument('[argv...]', 'Program name followed by its arguments')
    .action(async (operands: string[], raw: Record<string, unknown>) => {
      exitCode = await runParse({
        declarations: String(raw.declarations),
        argv: operands,
        out: optionalPath(raw.out),
        rejectFlagValues: raw.rejectFlagValues === true,
        verbose: raw.verbose === true,
      });
    });

  program
    .command('describe')
    .description('Print the declared options as JSON')
    .requiredOption('-d, --declarations <file>', 'JSON option declaration file')
    .option('--out <file>', 'Write the listing to a file instead of stdout', '')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: Record<string, unknown>) => {
      exitCode = await runDescribe({
        declarations: String(raw.declarations),
        out: optionalPath(raw.out),
        verbose: raw.verbose === true,
      });
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    if (e instanceof CommanderError) return e.exitCode;
    createLogger(false).error('typed-argparse failed', e);
    return EXIT_PARSE_FAILED;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
