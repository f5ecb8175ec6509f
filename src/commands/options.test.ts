// Path: src/commands/options.test.ts
// Tests for shared command options and fatal error handling

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { failCommand, loadCommandConfig, toConfigInput } from './options.js';
import { ResolverError } from '../utils/error.js';

describe('toConfigInput', () => {
  it('should leave prefixes unset when no -p flag was given', () => {
    expect(toConfigInput({ prefix: [] }).commandPrefixes).toBeUndefined();
  });

  it('should replace the prefix list with the -p flags', () => {
    expect(toConfigInput({ prefix: ['gcloud'] }).commandPrefixes).toEqual(['gcloud']);
    expect(toConfigInput({ prefix: ['kubectl', 'gcloud'] }).commandPrefixes).toEqual(['kubectl', 'gcloud']);
  });

  it('should map flags onto config fields', () => {
    expect(toConfigInput({
      template: 'tpl.env',
      output: 'out.env',
      marker: 'marker.js',
      onFailure: 'skip',
      timeout: '5000',
      mode: 'append',
      shell: '/bin/bash',
    })).toEqual({
      template: 'tpl.env',
      output: 'out.env',
      marker: 'marker.js',
      commandPrefixes: undefined,
      onCommandFailure: 'skip',
      commandTimeoutMs: '5000',
      writeMode: 'append',
      shell: '/bin/bash',
    });
  });
});

describe('loadCommandConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-resolver-cmd-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should apply flags over the defaults', () => {
    const config = loadCommandConfig({ root: tmpDir, prefix: ['gcloud'], timeout: '5000' });

    expect(config.commandPrefixes).toEqual(['gcloud']);
    expect(config.commandTimeoutMs).toBe(5000);
    expect(config.template).toBe(path.join(tmpDir, '.env.example'));
  });

  it('should reject a zero timeout with INVALID_CONFIG', () => {
    try {
      loadCommandConfig({ root: tmpDir, timeout: '0' });
      expect.fail('expected loadCommandConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ResolverError);
      expect(err).toMatchObject({ code: 'INVALID_CONFIG' });
    }
  });
});

describe('failCommand', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the message with its code and exit 1', () => {
    const err = new ResolverError('Template not found: /tmp/.env.example', 'TEMPLATE_NOT_FOUND');

    expect(() => failCommand('Generation failed:', err)).toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][1])).toContain('Template not found: /tmp/.env.example');
    expect(String(errorSpy.mock.calls[0][1])).toContain('[TEMPLATE_NOT_FOUND]');
  });

  it('should print captured stderr of a failed command', () => {
    const err = new ResolverError('Command failed (exit code 1): kubectl get x', 'COMMAND_FAILED', {
      metadata: { command: 'kubectl get x', exitCode: 1, stderr: 'not found' },
    });

    expect(() => failCommand('Generation failed:', err)).toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(String(errorSpy.mock.calls[1][0])).toContain('not found');
  });

  it('should exit 1 for errors without a code', () => {
    expect(() => failCommand('Configuration error:', new Error('boom'))).toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(errorSpy.mock.calls[0][1]).toBe('boom');
  });
});
