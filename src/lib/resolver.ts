// Path: src/lib/resolver.ts
// Resolve template entries into output entries and write the result

import { resolverLogger as log } from './logger.js';
import type { CommandFailurePolicy, ResolverConfig, WriteMode } from './config/index.js';
import { readTemplateEntries, type ParsedLine, type TemplateEntry } from './template/index.js';
import {
  markerExists,
  serializeEntries,
  writeEnvOutput,
  type OutputMode,
  type ResolvedEntry,
} from './env-output.js';
import { runShellCommand, type CommandRunner, type ShellCommandOptions } from '../utils/shell.js';
import { extractErrorMessage, wrapError } from '../utils/error.js';

export interface ResolveWarning {
  lineNumber: number;
  key?: string;
  message: string;
}

export interface ResolutionResult {
  /** Resolved entries in template order */
  entries: ResolvedEntry[];
  warnings: ResolveWarning[];
}

/**
 * Progress callbacks, called around each command execution
 */
export interface ResolveHooks {
  onCommandStart?: (entry: TemplateEntry) => void;
  onCommandSuccess?: (entry: TemplateEntry) => void;
  onCommandFailure?: (entry: TemplateEntry, error: Error, policy: CommandFailurePolicy) => void;
}

export interface ResolveEntriesOptions {
  onCommandFailure: CommandFailurePolicy;
  /** Options passed to the runner for every command */
  commandOptions: ShellCommandOptions;
  /** Defaults to runShellCommand */
  runner?: CommandRunner;
  hooks?: ResolveHooks;
}

/**
 * Resolve parsed template lines in order.
 *
 * Entries are accumulated in memory; nothing is written here. A failing
 * command under the `abort` policy rejects with the runner's error.
 */
export async function resolveEntries(
  lines: AsyncIterable<ParsedLine> | Iterable<ParsedLine>,
  options: ResolveEntriesOptions
): Promise<ResolutionResult> {
  const runner = options.runner ?? runShellCommand;
  const hooks = options.hooks ?? {};
  const entries: ResolvedEntry[] = [];
  const warnings: ResolveWarning[] = [];

  for await (const parsed of lines) {
    if (parsed.kind === 'skip') continue;

    if (parsed.kind === 'malformed') {
      log.warn({ lineNumber: parsed.lineNumber, reason: parsed.reason }, 'Skipping malformed template line');
      warnings.push({
        lineNumber: parsed.lineNumber,
        message: `Skipped malformed line (${parsed.reason}): ${parsed.line}`,
      });
      continue;
    }

    const { entry } = parsed;

    if (!entry.isCommand) {
      entries.push({ key: entry.key, value: entry.expression, source: 'literal', lineNumber: entry.lineNumber });
      continue;
    }

    log.debug({ key: entry.key, lineNumber: entry.lineNumber }, 'Resolving command value');
    hooks.onCommandStart?.(entry);

    let value: string;
    try {
      value = runner(entry.expression, options.commandOptions);
    } catch (err) {
      const error = wrapError(err, 'COMMAND_FAILED', { key: entry.key, lineNumber: entry.lineNumber });
      hooks.onCommandFailure?.(entry, error, options.onCommandFailure);

      if (options.onCommandFailure === 'abort') {
        log.error({ key: entry.key, lineNumber: entry.lineNumber, code: error.code }, 'Command failed, aborting');
        throw error;
      }

      const message = `${entry.key}: ${extractErrorMessage(error)}`;
      warnings.push({ lineNumber: entry.lineNumber, key: entry.key, message });

      if (options.onCommandFailure === 'empty') {
        log.warn({ key: entry.key, lineNumber: entry.lineNumber, code: error.code }, 'Command failed, writing empty value');
        entries.push({ key: entry.key, value: '', source: 'fallback', lineNumber: entry.lineNumber });
      } else {
        log.warn({ key: entry.key, lineNumber: entry.lineNumber, code: error.code }, 'Command failed, skipping entry');
      }
      continue;
    }

    hooks.onCommandSuccess?.(entry);
    if (value.includes('\n')) {
      log.warn({ key: entry.key, lineNumber: entry.lineNumber }, 'Command output spans several lines');
      warnings.push({
        lineNumber: entry.lineNumber,
        key: entry.key,
        message: `${entry.key}: command output spans several lines; written as is`,
      });
    }
    entries.push({ key: entry.key, value, source: 'command', lineNumber: entry.lineNumber });
  }

  return { entries, warnings };
}

/**
 * Pick replace or append for a write mode.
 * `auto` replaces when the marker file exists.
 */
export function decideOutputMode(writeMode: WriteMode, markerPath: string): OutputMode {
  if (writeMode === 'replace' || writeMode === 'append') {
    return writeMode;
  }
  return markerExists(markerPath) ? 'replace' : 'append';
}

export interface ResolveEnvironmentOptions {
  runner?: CommandRunner;
  hooks?: ResolveHooks;
  /** Resolve without writing the output file */
  dryRun?: boolean;
}

export interface ResolveSummary extends ResolutionResult {
  outputPath: string;
  mode: OutputMode;
  /** Serialized output, as written (or as it would be written on a dry run) */
  content: string;
  written: boolean;
}

/**
 * Generate the output file from the template.
 *
 * The output is written once, after every entry has resolved, so a run that
 * fails leaves the previous output untouched.
 */
export async function resolveEnvironment(
  config: ResolverConfig,
  options: ResolveEnvironmentOptions = {}
): Promise<ResolveSummary> {
  const mode = decideOutputMode(config.writeMode, config.marker);

  log.info({
    template: config.template,
    output: config.output,
    mode,
    dryRun: options.dryRun ?? false,
  }, 'Generating env file');

  const result = await resolveEntries(readTemplateEntries(config.template, config.commandPrefixes), {
    onCommandFailure: config.onCommandFailure,
    commandOptions: {
      cwd: config.rootDir,
      timeoutMs: config.commandTimeoutMs,
      shell: config.shell,
    },
    runner: options.runner,
    hooks: options.hooks,
  });

  const content = serializeEntries(result.entries);

  if (!options.dryRun) {
    writeEnvOutput(config.output, result.entries, mode);
  }

  log.info({
    output: config.output,
    count: result.entries.length,
    warnings: result.warnings.length,
    written: !options.dryRun,
  }, 'Env file generation complete');

  return {
    ...result,
    outputPath: config.output,
    mode,
    content,
    written: !options.dryRun,
  };
}
