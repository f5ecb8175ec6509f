// Path: src/lib/validation.test.ts
// Unit tests for config validation

import { describe, it, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { assertValidConfig, formatValidationResult, validateConfig } from './validation.js';
import type { ResolverConfig } from './config/index.js';

describe('validateConfig', () => {
  const rootDir = os.tmpdir();
  const validConfig: ResolverConfig = {
    rootDir,
    template: path.join(rootDir, '.env.example'),
    output: path.join(rootDir, '.env'),
    marker: path.join(rootDir, 'public', 'env.js'),
    commandPrefixes: ['kubectl', 'aws'],
    onCommandFailure: 'abort',
    commandTimeoutMs: 30000,
    writeMode: 'auto',
    shell: '/bin/sh',
  };

  it('should pass for valid configuration', () => {
    const result = validateConfig(validConfig);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  it('should fail when there are no command prefixes', () => {
    const result = validateConfig({ ...validConfig, commandPrefixes: [] });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { field: 'commandPrefixes', message: 'At least one command prefix is required' },
    ]);
  });

  it('should fail for a zero, negative or fractional timeout', () => {
    for (const commandTimeoutMs of [0, -1, 1.5]) {
      const result = validateConfig({ ...validConfig, commandTimeoutMs });
      expect(result.valid).toBe(false);
      expect(result.errors.some(e => e.field === 'commandTimeoutMs')).toBe(true);
    }
  });

  it('should fail when output and template are the same file', () => {
    const result = validateConfig({ ...validConfig, output: validConfig.template });
    expect(result.valid).toBe(false);
    expect(result.errors.some(e => e.field === 'output')).toBe(true);
  });

  it('should fail when the shell is empty', () => {
    const result = validateConfig({ ...validConfig, shell: '' });
    expect(result.valid).toBe(false);
    expect(result.errors.some(e => e.field === 'shell')).toBe(true);
  });

  it('should warn about a prefix containing whitespace', () => {
    const result = validateConfig({ ...validConfig, commandPrefixes: ['aws ssm'] });
    expect(result.valid).toBe(true);
    expect(result.warnings.map(w => w.message)).toEqual(['Prefix "aws ssm" contains whitespace']);
  });

  it('should warn when the marker is the output file in auto mode', () => {
    const result = validateConfig({ ...validConfig, marker: validConfig.output });
    expect(result.valid).toBe(true);
    expect(result.warnings.some(w => w.field === 'marker')).toBe(true);
  });

  it('should warn when the output directory cannot be created in one step', () => {
    const output = path.join(rootDir, 'does-not-exist-a', 'does-not-exist-b', '.env');
    const result = validateConfig({ ...validConfig, output });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      {
        field: 'output',
        message: `Parent directory does not exist: ${path.join(rootDir, 'does-not-exist-a')}`,
        suggestion: `Ensure directory exists: mkdir -p ${path.dirname(output)}`,
      },
    ]);
  });
});

describe('assertValidConfig', () => {
  const config: ResolverConfig = {
    rootDir: '/srv/app',
    template: '/srv/app/.env.example',
    output: '/srv/app/.env',
    marker: '/srv/app/public/env.js',
    commandPrefixes: [],
    onCommandFailure: 'abort',
    commandTimeoutMs: 30000,
    writeMode: 'replace',
    shell: '/bin/sh',
  };

  it('should throw INVALID_CONFIG listing the errors', () => {
    expect(() => assertValidConfig(config)).toThrow(
      'Invalid configuration: commandPrefixes: At least one command prefix is required'
    );
  });

  it('should return the result for a valid config', () => {
    const result = assertValidConfig({ ...config, rootDir: os.tmpdir(), output: path.join(os.tmpdir(), '.env'), commandPrefixes: ['aws'] });
    expect(result.valid).toBe(true);
  });
});

describe('formatValidationResult', () => {
  it('should format a valid result', () => {
    expect(formatValidationResult({ valid: true, errors: [], warnings: [] })).toBe('✓ Configuration is valid');
  });

  it('should format errors and warnings', () => {
    const output = formatValidationResult({
      valid: false,
      errors: [{ field: 'commandTimeoutMs', message: 'Command timeout must be positive', value: 0 }],
      warnings: [{ field: 'commandPrefixes', message: 'Prefix "a b" contains whitespace', suggestion: 'Use one word' }],
    });

    expect(output).toBe([
      'Errors:',
      '  ✗ commandTimeoutMs: Command timeout must be positive',
      '    Value: 0',
      '',
      'Warnings:',
      '  ⚠ commandPrefixes: Prefix "a b" contains whitespace',
      '    Suggestion: Use one word',
    ].join('\n'));
  });

  it('should note warnings on a valid result', () => {
    const output = formatValidationResult({
      valid: true,
      errors: [],
      warnings: [{ field: 'marker', message: 'Marker file is the output file' }],
    });

    expect(output).toBe('Warnings:\n  ⚠ marker: Marker file is the output file\n\n✓ Configuration is valid (with warnings)');
  });
});
