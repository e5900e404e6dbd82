export type ClassifiedToken =
  | { kind: 'longInline'; key: string; value: string }
  | { kind: 'long'; key: string }
  | { kind: 'short'; alias: string }
  | { kind: 'positional'; value: string };

/**
 * Classifies one argument (never the program name). Rules apply in order:
 * `--key=value`, `--key`, `-c` (any token of two or more characters starting with `-`),
 * everything else positional. Characters after the alias of a short option are ignored.
 */
export function classifyToken(token: string): ClassifiedToken {
  if (token.startsWith('--')) {
    const eq = token.indexOf('=', 2);
    if (eq >= 0) return { kind: 'longInline', key: token.slice(2, eq), value: token.slice(eq + 1) };
    return { kind: 'long', key: token.slice(2) };
  }
  if (token.startsWith('-') && token.length >= 2) return { kind: 'short', alias: token[1] };
  return { kind: 'positional', value: token };
}
