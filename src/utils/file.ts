// Path: src/utils/file.ts
// Atomic file write utilities - prevent partial writes and ensure data integrity

import fs from 'node:fs';
import path from 'node:path';
import { getErrnoCode } from './error.js';

export interface AtomicWriteOptions {
  /**
   * Permissions for a newly created file (octal number, e.g., 0o600).
   * An existing file keeps its current mode.
   * Defaults to 0o600.
   */
  mode?: number;

  /**
   * Create parent directories if they don't exist.
   * Defaults to true.
   */
  createDirs?: boolean;
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o600,
  createDirs: true,
};

/**
 * Mode of an existing file, or undefined when it does not exist.
 */
function existingMode(filePath: string): number | undefined {
  try {
    return fs.statSync(filePath).mode & 0o777;
  } catch (err) {
    if (getErrnoCode(err) === 'ENOENT') return undefined;
    throw err;
  }
}

/**
 * Write content to a file atomically.
 *
 * Uses temp file + rename pattern to ensure the file is either
 * fully written or not modified at all.
 */
export function writeAtomic(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const dir = path.dirname(filePath);
  const tempPath = `${filePath}.tmp.${process.pid}`;

  if (opts.createDirs && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o750 });
  }

  const mode = existingMode(filePath) ?? opts.mode;

  try {
    fs.writeFileSync(tempPath, content, { mode });
    // writeFileSync only applies mode on creation
    fs.chmodSync(tempPath, mode);
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch {
      // Ignore cleanup errors
    }
    throw err;
  }
}

/**
 * Append content to a file in a single write, creating it if needed.
 * If the existing file does not end with a newline, one is inserted first
 * so the appended block starts on its own line.
 */
export function appendInOneWrite(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const dir = path.dirname(filePath);

  if (opts.createDirs && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o750 });
  }

  let separator = '';
  if (content !== '' && existingMode(filePath) !== undefined) {
    const current = fs.readFileSync(filePath, 'utf-8');
    if (current !== '' && !current.endsWith('\n')) {
      separator = '\n';
    }
  }

  fs.appendFileSync(filePath, separator + content, { mode: opts.mode });
}
