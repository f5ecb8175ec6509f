// Path: src/lib/validation.ts
// Configuration validation for env-resolver

import fs from 'node:fs';
import path from 'node:path';
import type { ResolverConfig } from './config/index.js';
import { configLogger as log } from './logger.js';
import { ResolverError } from '../utils/error.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

/**
 * Check if the output directory exists or can be created
 */
function isValidOutputPath(filePath: string): { valid: boolean; reason?: string } {
  const dir = path.dirname(filePath);

  if (fs.existsSync(dir)) {
    return { valid: true };
  }

  // One level of mkdir is OK
  const parentDir = path.dirname(dir);
  if (fs.existsSync(parentDir)) {
    return { valid: true };
  }

  return {
    valid: false,
    reason: `Parent directory does not exist: ${parentDir}`,
  };
}

/**
 * Validate a loaded configuration
 */
export function validateConfig(config: ResolverConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Command prefixes
  if (config.commandPrefixes.length === 0) {
    errors.push({
      field: 'commandPrefixes',
      message: 'At least one command prefix is required',
    });
  }
  for (const prefix of config.commandPrefixes) {
    if (/\s/.test(prefix)) {
      warnings.push({
        field: 'commandPrefixes',
        message: `Prefix "${prefix}" contains whitespace`,
        suggestion: 'Prefixes usually name a single binary, e.g. "kubectl"',
      });
    }
  }

  // Timeout
  if (!Number.isInteger(config.commandTimeoutMs) || config.commandTimeoutMs <= 0) {
    errors.push({
      field: 'commandTimeoutMs',
      message: 'Command timeout must be a positive whole number of milliseconds',
      value: config.commandTimeoutMs,
    });
  }

  // Files
  if (config.template === config.output) {
    errors.push({
      field: 'output',
      message: 'Output file must differ from the template',
      value: config.output,
    });
  }

  if (config.marker === config.output && config.writeMode === 'auto') {
    warnings.push({
      field: 'marker',
      message: 'Marker file is the output file; every run after the first replaces it',
      suggestion: 'Use writeMode "replace" instead',
    });
  }

  const outputCheck = isValidOutputPath(config.output);
  if (!outputCheck.valid) {
    warnings.push({
      field: 'output',
      message: outputCheck.reason ?? 'Output directory may not exist',
      suggestion: `Ensure directory exists: mkdir -p ${path.dirname(config.output)}`,
    });
  }

  // Shell
  if (!config.shell) {
    errors.push({ field: 'shell', message: 'Shell is required' });
  }

  const result = {
    valid: errors.length === 0,
    errors,
    warnings,
  };

  if (errors.length > 0) {
    log.error({ errors }, 'Configuration validation failed');
  }
  if (warnings.length > 0) {
    log.warn({ warnings }, 'Configuration has warnings');
  }

  return result;
}

/**
 * Throw INVALID_CONFIG when validation fails; return the result otherwise
 */
export function assertValidConfig(config: ResolverConfig): ValidationResult {
  const result = validateConfig(config);
  if (!result.valid) {
    const summary = result.errors.map(e => `${e.field}: ${e.message}`).join('; ');
    throw new ResolverError(`Invalid configuration: ${summary}`, 'INVALID_CONFIG', {
      metadata: { errors: result.errors },
    });
  }
  return result;
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}
