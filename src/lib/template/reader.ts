// Path: src/lib/template/reader.ts
// Lazy template reading

import fs from 'node:fs';
import readline from 'node:readline';
import { templateLogger as log } from '../logger.js';
import { ResolverError, getErrnoCode } from '../../utils/error.js';
import { parseTemplateLine } from './parser.js';
import type { ParsedLine } from './types.js';

/**
 * Fail early with a coded error when the template cannot be opened.
 * The stream itself would only report this on first read.
 */
function assertReadable(templatePath: string): void {
  try {
    fs.accessSync(templatePath, fs.constants.R_OK);
  } catch (err) {
    if (getErrnoCode(err) === 'ENOENT') {
      throw new ResolverError(`Template not found: ${templatePath}`, 'TEMPLATE_NOT_FOUND', {
        metadata: { templatePath },
      });
    }
    throw new ResolverError(`Template is not readable: ${templatePath}`, 'TEMPLATE_UNREADABLE', {
      cause: err instanceof Error ? err : undefined,
      metadata: { templatePath },
    });
  }

  if (fs.statSync(templatePath).isDirectory()) {
    throw new ResolverError(`Template is a directory: ${templatePath}`, 'TEMPLATE_UNREADABLE', {
      metadata: { templatePath },
    });
  }
}

/**
 * Read the template one line at a time.
 * The sequence is finite and single-use; iterate it again and you get nothing.
 */
export async function* readTemplateLines(templatePath: string): AsyncGenerator<string> {
  assertReadable(templatePath);

  log.debug({ templatePath }, 'Reading template');

  const stream = fs.createReadStream(templatePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      yield line;
    }
  } catch (err) {
    throw new ResolverError(`Failed to read template: ${templatePath}`, 'TEMPLATE_UNREADABLE', {
      cause: err instanceof Error ? err : undefined,
      metadata: { templatePath },
    });
  } finally {
    lines.close();
    stream.destroy();
  }
}

/**
 * Parse every line of a line source, numbering from 1.
 */
export async function* parseTemplateLines(
  source: AsyncIterable<string> | Iterable<string>,
  prefixes: readonly string[]
): AsyncGenerator<ParsedLine> {
  let lineNumber = 0;
  for await (const line of source) {
    lineNumber++;
    yield parseTemplateLine(line, lineNumber, prefixes);
  }
}

/**
 * Convenience: lazy parsed lines straight from a template file.
 */
export function readTemplateEntries(
  templatePath: string,
  prefixes: readonly string[]
): AsyncGenerator<ParsedLine> {
  return parseTemplateLines(readTemplateLines(templatePath), prefixes);
}
