// Path: src/lib/inspect.ts
// Template inspection without running anything

import type { ResolverConfig } from './config/index.js';
import { readTemplateEntries, type ParsedLine, type TemplateEntry } from './template/index.js';
import { whichSafe } from '../utils/shell.js';

export interface MalformedLine {
  lineNumber: number;
  line: string;
  reason: string;
}

export interface TemplatePlan {
  template: string;
  entries: TemplateEntry[];
  malformed: MalformedLine[];
  /** Keys that appear more than once; each occurrence is still written */
  duplicateKeys: string[];
}

/**
 * Collect parsed lines into a plan
 */
export async function collectPlan(
  template: string,
  lines: AsyncIterable<ParsedLine> | Iterable<ParsedLine>
): Promise<TemplatePlan> {
  const entries: TemplateEntry[] = [];
  const malformed: MalformedLine[] = [];
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for await (const parsed of lines) {
    if (parsed.kind === 'entry') {
      if (seen.has(parsed.entry.key)) duplicates.add(parsed.entry.key);
      seen.add(parsed.entry.key);
      entries.push(parsed.entry);
    } else if (parsed.kind === 'malformed') {
      malformed.push({ lineNumber: parsed.lineNumber, line: parsed.line, reason: parsed.reason });
    }
  }

  return { template, entries, malformed, duplicateKeys: [...duplicates] };
}

/**
 * Parse the configured template and report what a run would do
 */
export function planTemplate(config: ResolverConfig): Promise<TemplatePlan> {
  return collectPlan(config.template, readTemplateEntries(config.template, config.commandPrefixes));
}

export interface PrefixCheck {
  prefix: string;
  /** First word of the prefix, looked up on PATH */
  binary: string;
  path: string | null;
}

/**
 * Look up the binary behind every command prefix
 */
export function checkCommandPrefixes(
  prefixes: readonly string[],
  which: (name: string) => string | null = whichSafe
): PrefixCheck[] {
  return prefixes.map(prefix => {
    const binary = prefix.trim().split(/\s+/)[0] ?? prefix;
    return { prefix, binary, path: which(binary) };
  });
}
