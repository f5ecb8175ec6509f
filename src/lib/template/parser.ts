// Path: src/lib/template/parser.ts
// Template line parsing functions

import type { ParsedLine } from './types.js';

/**
 * Whether a value expression should be executed rather than copied.
 * Plain string-prefix match: `kubectl` also matches `kubectlx`.
 */
export function isCommandExpression(expression: string, prefixes: readonly string[]): boolean {
  return prefixes.some(prefix => prefix !== '' && expression.startsWith(prefix));
}

/**
 * Parse one template line
 * Formats:
 *   KEY=value                -> literal entry
 *   KEY=kubectl get ...      -> command entry (when `kubectl` is a prefix)
 *   KEY=a=b                  -> value is `a=b`, split happens at the first `=`
 *   # comment / blank line   -> skipped
 *
 * Surrounding whitespace (and a trailing `\r`) is stripped before parsing.
 */
export function parseTemplateLine(
  line: string,
  lineNumber: number,
  prefixes: readonly string[]
): ParsedLine {
  const trimmed = line.trim();

  if (!trimmed || trimmed.startsWith('#')) {
    return { kind: 'skip', lineNumber };
  }

  const eqIndex = trimmed.indexOf('=');
  if (eqIndex === -1) {
    return { kind: 'malformed', lineNumber, line: trimmed, reason: 'missing "="' };
  }

  const key = trimmed.substring(0, eqIndex);
  if (!key) {
    return { kind: 'malformed', lineNumber, line: trimmed, reason: 'empty key' };
  }

  const expression = trimmed.substring(eqIndex + 1);

  return {
    kind: 'entry',
    entry: {
      key,
      expression,
      lineNumber,
      isCommand: isCommandExpression(expression, prefixes),
    },
  };
}
