// Path: src/lib/env-output.ts
// Serializing resolved entries and writing the output file

import fs from 'node:fs';
import { outputLogger as log } from './logger.js';
import { appendInOneWrite, writeAtomic } from '../utils/file.js';
import { ResolverError } from '../utils/error.js';

/**
 * Where a resolved value came from
 */
export type ResolvedSource = 'literal' | 'command' | 'fallback';

/**
 * One `KEY=VALUE` line of the output
 */
export interface ResolvedEntry {
  key: string;
  value: string;
  source: ResolvedSource;
  lineNumber: number;
}

/**
 * How the output file is written: replace it, or append to what is there
 */
export type OutputMode = 'replace' | 'append';

/**
 * Serialize entries as `KEY=VALUE` lines.
 * Values are written verbatim, without quoting, and duplicate keys are kept.
 */
export function serializeEntries(entries: readonly Pick<ResolvedEntry, 'key' | 'value'>[]): string {
  if (entries.length === 0) return '';
  return entries.map(({ key, value }) => `${key}=${value}`).join('\n') + '\n';
}

export function markerExists(markerPath: string): boolean {
  return fs.existsSync(markerPath);
}

/**
 * Write all entries to the output file in one operation.
 *
 * @throws ResolverError OUTPUT_WRITE_FAILED
 */
export function writeEnvOutput(
  outputPath: string,
  entries: readonly ResolvedEntry[],
  mode: OutputMode
): void {
  const content = serializeEntries(entries);

  log.debug({ outputPath, mode, count: entries.length }, 'Writing output file');

  try {
    if (mode === 'replace') {
      writeAtomic(outputPath, content);
    } else {
      appendInOneWrite(outputPath, content);
    }
  } catch (err) {
    log.error({ err, outputPath }, 'Failed to write output file');
    throw new ResolverError(`Failed to write ${outputPath}`, 'OUTPUT_WRITE_FAILED', {
      cause: err instanceof Error ? err : undefined,
      metadata: { outputPath, mode },
    });
  }

  log.info({ outputPath, mode, count: entries.length }, 'Output file written');
}
