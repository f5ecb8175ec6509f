// Path: src/lib/config/loader.ts
// Configuration loading and merging

import fs from 'node:fs';
import path from 'node:path';
import { configLogger as log } from '../logger.js';
import { ResolverError, extractErrorMessage } from '../../utils/error.js';
import {
  COMMAND_FAILURE_POLICIES,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  WRITE_MODES,
  type CommandFailurePolicy,
  type RawConfigInput,
  type ResolverConfig,
  type WriteMode,
} from './types.js';

export interface LoadConfigOptions {
  /** Project directory (default: ENV_RESOLVER_ROOT or the current directory) */
  rootDir?: string;
  /** Explicit config file; it must exist when given */
  configPath?: string;
  /** Values from command-line flags, applied last */
  overrides?: RawConfigInput;
  /** Environment to read ENV_RESOLVER_* from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

type ConfigValues = Partial<Omit<ResolverConfig, 'rootDir'>>;

function invalid(message: string, metadata?: Record<string, unknown>): ResolverError {
  return new ResolverError(message, 'INVALID_CONFIG', { metadata });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCommandFailurePolicy(value: string): value is CommandFailurePolicy {
  return COMMAND_FAILURE_POLICIES.some(policy => policy === value);
}

function isWriteMode(value: string): value is WriteMode {
  return WRITE_MODES.some(mode => mode === value);
}

/**
 * Split a comma-separated prefix list, dropping blanks
 */
export function parsePrefixList(value: string): string[] {
  return value
    .split(',')
    .map(prefix => prefix.trim())
    .filter(prefix => prefix !== '');
}

/**
 * Turn raw string/number input into typed config values.
 * Unknown enum values and non-numeric timeouts are rejected here; range
 * checks happen in validateConfig().
 *
 * @param source - Where the values came from, used in error messages
 */
export function normalizeConfigInput(raw: RawConfigInput, source: string): ConfigValues {
  const values: ConfigValues = {};

  if (raw.template !== undefined) values.template = raw.template;
  if (raw.output !== undefined) values.output = raw.output;
  if (raw.marker !== undefined) values.marker = raw.marker;
  if (raw.shell !== undefined) values.shell = raw.shell;

  if (raw.commandPrefixes !== undefined) {
    values.commandPrefixes = typeof raw.commandPrefixes === 'string'
      ? parsePrefixList(raw.commandPrefixes)
      : raw.commandPrefixes.map(prefix => prefix.trim()).filter(prefix => prefix !== '');
  }

  if (raw.onCommandFailure !== undefined) {
    if (!isCommandFailurePolicy(raw.onCommandFailure)) {
      throw invalid(
        `Invalid onCommandFailure "${raw.onCommandFailure}" in ${source}. Expected: ${COMMAND_FAILURE_POLICIES.join(', ')}`,
        { source }
      );
    }
    values.onCommandFailure = raw.onCommandFailure;
  }

  if (raw.writeMode !== undefined) {
    if (!isWriteMode(raw.writeMode)) {
      throw invalid(
        `Invalid writeMode "${raw.writeMode}" in ${source}. Expected: ${WRITE_MODES.join(', ')}`,
        { source }
      );
    }
    values.writeMode = raw.writeMode;
  }

  if (raw.commandTimeoutMs !== undefined) {
    const timeout = typeof raw.commandTimeoutMs === 'number'
      ? raw.commandTimeoutMs
      : Number(raw.commandTimeoutMs.trim());
    if (Number.isNaN(timeout) || (typeof raw.commandTimeoutMs === 'string' && raw.commandTimeoutMs.trim() === '')) {
      throw invalid(`Invalid commandTimeoutMs "${raw.commandTimeoutMs}" in ${source}. Expected a number`, { source });
    }
    values.commandTimeoutMs = timeout;
  }

  return values;
}

function optionalString(record: Record<string, unknown>, field: string, source: string): string | undefined {
  const value = record[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`"${field}" must be a string in ${source}`, { source, field });
  }
  return value;
}

/**
 * Check field types of a parsed JSON config file.
 */
export function parseConfigFileContent(content: string, source: string): RawConfigInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw invalid(`Config file ${source} is not valid JSON: ${extractErrorMessage(err)}`, { source });
  }

  if (!isRecord(parsed)) {
    throw invalid(`Config file ${source} must contain a JSON object`, { source });
  }

  const raw: RawConfigInput = {
    template: optionalString(parsed, 'template', source),
    output: optionalString(parsed, 'output', source),
    marker: optionalString(parsed, 'marker', source),
    onCommandFailure: optionalString(parsed, 'onCommandFailure', source),
    writeMode: optionalString(parsed, 'writeMode', source),
    shell: optionalString(parsed, 'shell', source),
  };

  const prefixes = parsed.commandPrefixes;
  if (prefixes !== undefined) {
    if (!Array.isArray(prefixes) || !prefixes.every((p): p is string => typeof p === 'string')) {
      throw invalid(`"commandPrefixes" must be an array of strings in ${source}`, { source });
    }
    raw.commandPrefixes = prefixes;
  }

  const timeout = parsed.commandTimeoutMs;
  if (timeout !== undefined) {
    if (typeof timeout !== 'number') {
      throw invalid(`"commandTimeoutMs" must be a number in ${source}`, { source });
    }
    raw.commandTimeoutMs = timeout;
  }

  return raw;
}

/**
 * Read the JSON config file.
 * The default file is optional; an explicitly named one must exist.
 */
function readConfigFile(filePath: string, explicit: boolean): RawConfigInput {
  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw invalid(`Config file not found: ${filePath}`, { path: filePath });
    }
    return {};
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  log.debug({ path: filePath }, 'Loaded config file');
  return parseConfigFileContent(content, filePath);
}

/**
 * Collect ENV_RESOLVER_* overrides
 *
 * Environment variables:
 * - ENV_RESOLVER_TEMPLATE: Template file
 * - ENV_RESOLVER_OUTPUT: Output file
 * - ENV_RESOLVER_MARKER: Marker file
 * - ENV_RESOLVER_PREFIXES: Comma-separated command prefixes
 * - ENV_RESOLVER_ON_FAILURE: abort, empty or skip
 * - ENV_RESOLVER_TIMEOUT_MS: Per-command timeout
 * - ENV_RESOLVER_WRITE_MODE: auto, replace or append
 * - ENV_RESOLVER_SHELL: Shell used to run commands
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): RawConfigInput {
  const raw: RawConfigInput = {};
  if (env.ENV_RESOLVER_TEMPLATE) raw.template = env.ENV_RESOLVER_TEMPLATE;
  if (env.ENV_RESOLVER_OUTPUT) raw.output = env.ENV_RESOLVER_OUTPUT;
  if (env.ENV_RESOLVER_MARKER) raw.marker = env.ENV_RESOLVER_MARKER;
  if (env.ENV_RESOLVER_PREFIXES) raw.commandPrefixes = env.ENV_RESOLVER_PREFIXES;
  if (env.ENV_RESOLVER_ON_FAILURE) raw.onCommandFailure = env.ENV_RESOLVER_ON_FAILURE;
  if (env.ENV_RESOLVER_TIMEOUT_MS) raw.commandTimeoutMs = env.ENV_RESOLVER_TIMEOUT_MS;
  if (env.ENV_RESOLVER_WRITE_MODE) raw.writeMode = env.ENV_RESOLVER_WRITE_MODE;
  if (env.ENV_RESOLVER_SHELL) raw.shell = env.ENV_RESOLVER_SHELL;
  return raw;
}

/**
 * Load configuration: defaults < config file < environment < flags.
 * Relative file paths are resolved against rootDir.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolverConfig {
  const env = options.env ?? process.env;
  const rootDir = path.resolve(options.rootDir ?? env.ENV_RESOLVER_ROOT ?? process.cwd());

  const configPath = options.configPath
    ? path.resolve(rootDir, options.configPath)
    : path.join(rootDir, CONFIG_FILE_NAME);

  const merged: Omit<ResolverConfig, 'rootDir'> = {
    ...DEFAULT_CONFIG,
    ...normalizeConfigInput(readConfigFile(configPath, options.configPath !== undefined), configPath),
    ...normalizeConfigInput(readEnvOverrides(env), 'environment'),
    ...normalizeConfigInput(options.overrides ?? {}, 'command-line options'),
  };

  const config: ResolverConfig = {
    ...merged,
    rootDir,
    template: path.resolve(rootDir, merged.template),
    output: path.resolve(rootDir, merged.output),
    marker: path.resolve(rootDir, merged.marker),
  };

  log.debug({
    rootDir,
    template: config.template,
    output: config.output,
    marker: config.marker,
    commandPrefixes: config.commandPrefixes,
    onCommandFailure: config.onCommandFailure,
    writeMode: config.writeMode,
  }, 'Configuration loaded');

  return config;
}
