import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import type { AnyOption } from '../options/optionDeclaration';
import type { ParseResult } from '../parse/argumentParser';
import { stableStringify } from '../util/deterministicJson';

/**
 * Serialize a parse result to deterministic JSON. Option values are keyed by name;
 * the positional tuple is left out since it repeats the same values.
 */
export function serializeParseResult(result: ParseResult<readonly AnyOption[]>): string {
  return stableStringify({
    programName: result.programName,
    values: result.named,
    remainingArguments: result.remainingArguments,
  });
}

export async function writeJsonFile(filePath: string, json: string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, json, 'utf8');
}
