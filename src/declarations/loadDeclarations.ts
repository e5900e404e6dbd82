import { promises as fs } from 'node:fs';
import Ajv2020 from 'ajv/dist/2020';

import { oneOf, types, type ValueType } from '../convert/valueTypes';
import { DeclarationFileError } from '../errors/argParseErrors';
import { flag, option, type AnyOption, type OptionSettings } from '../options/optionDeclaration';
import declarationSchema from '../schema/declarations-schema-v1.json';

export type DeclaredValueType = 'string' | 'integer' | 'number' | 'bigint' | 'boolean' | 'choice' | 'flag';

export type DeclarationEntry = {
  name: string;
  alias?: string;
  help?: string;
  type: DeclaredValueType;
  /** Required when `type` is `choice`. */
  choices?: string[];
};

export type DeclarationFile = {
  options: DeclarationEntry[];
};

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateDeclarationFile = ajv.compile<DeclarationFile>(declarationSchema);

function valueTypeFor(entry: DeclarationEntry): ValueType<unknown> | undefined {
  switch (entry.type) {
    case 'string':
    case 'integer':
    case 'number':
    case 'bigint':
    case 'boolean':
      return types[entry.type];
    case 'choice': {
      const [first, ...more] = entry.choices ?? [];
      return first === undefined ? undefined : oneOf(first, ...more);
    }
    case 'flag':
      return undefined;
  }
}

function toDeclaration(entry: DeclarationEntry, file: string): AnyOption {
  const settings: OptionSettings = { alias: entry.alias, help: entry.help };
  if (entry.type === 'flag') return flag(entry.name, settings);
  const type = valueTypeFor(entry);
  if (!type) throw new DeclarationFileError(file, [`option '${entry.name}': choice type needs at least one choice`]);
  return option(entry.name, type, settings);
}

/**
 * Validates parsed JSON against declarations-schema-v1.json and builds the declarations in file order.
 * `file` only labels errors.
 */
export function parseDeclarationFile(json: unknown, file = '<inline>'): AnyOption[] {
  if (!validateDeclarationFile(json)) {
    const problems = (validateDeclarationFile.errors ?? []).map(
      (e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`,
    );
    throw new DeclarationFileError(file, problems);
  }
  return json.options.map((entry) => toDeclaration(entry, file));
}

export async function loadDeclarationFile(filePath: string): Promise<AnyOption[]> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (e: unknown) {
    throw new DeclarationFileError(filePath, [e instanceof Error ? e.message : String(e)]);
  }
  return parseDeclarationFile(json, filePath);
}
