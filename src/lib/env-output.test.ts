// Path: src/lib/env-output.test.ts
// Tests for output serialization and writing

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { markerExists, serializeEntries, writeEnvOutput, type ResolvedEntry } from './env-output.js';

function entry(key: string, value: string, lineNumber = 1): ResolvedEntry {
  return { key, value, source: 'literal', lineNumber };
}

describe('serializeEntries', () => {
  it('should write one KEY=VALUE line per entry with a trailing newline', () => {
    expect(serializeEntries([entry('A', '1'), entry('B', '2')])).toBe('A=1\nB=2\n');
  });

  it('should write values verbatim without quoting', () => {
    expect(serializeEntries([entry('MSG', 'hello "world" $HOME')])).toBe('MSG=hello "world" $HOME\n');
  });

  it('should write empty values as KEY=', () => {
    expect(serializeEntries([entry('EMPTY', '')])).toBe('EMPTY=\n');
  });

  it('should return an empty string for no entries', () => {
    expect(serializeEntries([])).toBe('');
  });
});

describe('writeEnvOutput', () => {
  let tmpDir: string;
  let output: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-resolver-output-'));
    output = path.join(tmpDir, '.env');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should create a new file with owner-only permissions', () => {
    writeEnvOutput(output, [entry('A', '1')], 'replace');

    expect(fs.readFileSync(output, 'utf-8')).toBe('A=1\n');
    expect(fs.statSync(output).mode & 0o777).toBe(0o600);
  });

  it('should keep the mode of an existing file when replacing', () => {
    fs.writeFileSync(output, 'OLD=1\n', { mode: 0o644 });
    fs.chmodSync(output, 0o644);

    writeEnvOutput(output, [entry('A', '1')], 'replace');

    expect(fs.readFileSync(output, 'utf-8')).toBe('A=1\n');
    expect(fs.statSync(output).mode & 0o777).toBe(0o644);
  });

  it('should not leave a temp file behind', () => {
    writeEnvOutput(output, [entry('A', '1')], 'replace');

    expect(fs.readdirSync(tmpDir)).toEqual(['.env']);
  });

  it('should create missing parent directories', () => {
    const nested = path.join(tmpDir, 'config', 'app', '.env');

    writeEnvOutput(nested, [entry('A', '1')], 'replace');

    expect(fs.readFileSync(nested, 'utf-8')).toBe('A=1\n');
  });

  it('should append after existing content', () => {
    fs.writeFileSync(output, 'OLD=1\n');

    writeEnvOutput(output, [entry('A', '1')], 'append');

    expect(fs.readFileSync(output, 'utf-8')).toBe('OLD=1\nA=1\n');
  });

  it('should start appended entries on a new line', () => {
    fs.writeFileSync(output, 'OLD=1');

    writeEnvOutput(output, [entry('A', '1')], 'append');

    expect(fs.readFileSync(output, 'utf-8')).toBe('OLD=1\nA=1\n');
  });

  it('should leave the file unchanged when appending nothing', () => {
    fs.writeFileSync(output, 'OLD=1');

    writeEnvOutput(output, [], 'append');

    expect(fs.readFileSync(output, 'utf-8')).toBe('OLD=1');
  });

  it('should fail with OUTPUT_WRITE_FAILED when the output is a directory', () => {
    fs.mkdirSync(output);

    let thrown: unknown;
    try {
      writeEnvOutput(output, [entry('A', '1')], 'replace');
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toMatchObject({ code: 'OUTPUT_WRITE_FAILED', message: `Failed to write ${output}` });
    expect(fs.statSync(output).isDirectory()).toBe(true);
  });
});

describe('markerExists', () => {
  it('should report whether the marker file is present', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-resolver-output-'));
    try {
      const marker = path.join(tmpDir, 'env.js');
      expect(markerExists(marker)).toBe(false);
      fs.writeFileSync(marker, '');
      expect(markerExists(marker)).toBe(true);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
