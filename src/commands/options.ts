// Path: src/commands/options.ts
// Shared command-line options and config loading for commands

import { Option, type Command } from 'commander';
import chalk from 'chalk';
import {
  COMMAND_FAILURE_POLICIES,
  WRITE_MODES,
  loadConfig,
  type RawConfigInput,
  type ResolverConfig,
} from '../lib/config/index.js';
import { assertValidConfig } from '../lib/validation.js';
import { extractErrorMessage, isResolverError } from '../utils/error.js';
import type { ConfigCommandOptions } from './types.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Register the options shared by generate, plan and check
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option('--root <dir>', 'Project directory (default: current directory)')
    .option('-c, --config <path>', 'JSON config file (default: env-resolver.config.json in the project)')
    .option('-t, --template <path>', 'Template file (default: .env.example)')
    .option('-o, --output <path>', 'Output file (default: .env)')
    .option('-m, --marker <path>', 'Marker file that makes auto mode replace the output (default: public/env.js)')
    .option('-p, --prefix <name>', 'Command prefix, repeatable; replaces the configured list', collect, [])
    .addOption(new Option('--on-failure <policy>', 'What to do when a command fails').choices([...COMMAND_FAILURE_POLICIES]))
    .option('--timeout <ms>', 'Per-command timeout in milliseconds')
    .addOption(new Option('--mode <mode>', 'Write mode').choices([...WRITE_MODES]))
    .option('--shell <path>', 'Shell used to run commands (default: /bin/sh)');
}

/**
 * Map parsed flags onto raw config input
 */
export function toConfigInput(options: ConfigCommandOptions): RawConfigInput {
  return {
    template: options.template,
    output: options.output,
    marker: options.marker,
    commandPrefixes: options.prefix && options.prefix.length > 0 ? options.prefix : undefined,
    onCommandFailure: options.onFailure,
    commandTimeoutMs: options.timeout,
    writeMode: options.mode,
    shell: options.shell,
  };
}

/**
 * Load and validate configuration for a command.
 * Prints validation warnings to stderr.
 */
export function loadCommandConfig(options: ConfigCommandOptions): ResolverConfig {
  const config = loadConfig({
    rootDir: options.root,
    configPath: options.config,
    overrides: toConfigInput(options),
  });

  const validation = assertValidConfig(config);
  for (const warning of validation.warnings) {
    console.error(chalk.yellow('⚠') + ` ${warning.field}: ${warning.message}`);
  }

  return config;
}

/**
 * Print a fatal error and exit 1
 */
export function failCommand(prefix: string, err: unknown): never {
  const code = isResolverError(err) ? chalk.gray(` [${err.code}]`) : '';
  console.error(chalk.red(prefix), extractErrorMessage(err) + code);
  if (isResolverError(err) && typeof err.metadata?.stderr === 'string' && err.metadata.stderr !== '') {
    console.error(chalk.gray(err.metadata.stderr));
  }
  process.exit(1);
}
