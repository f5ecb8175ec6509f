// Path: src/commands/generate.ts
// Generate the .env file from the template

import type { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { resolveEnvironment, type ResolveHooks, type ResolveSummary } from '../lib/resolver.js';
import type { ResolverConfig } from '../lib/config/index.js';
import { addConfigOptions, failCommand, loadCommandConfig } from './options.js';
import type { GenerateCommandOptions } from './types.js';

/**
 * One spinner per command; stays silent for literal values
 */
function createSpinnerHooks(enabled: boolean): ResolveHooks {
  let spinner: Ora | null = null;

  if (!enabled) return {};

  return {
    onCommandStart: (entry) => {
      spinner = ora(`Resolving ${entry.key}...`).start();
    },
    onCommandSuccess: (entry) => {
      spinner?.succeed(`${entry.key}: resolved`);
      spinner = null;
    },
    onCommandFailure: (entry, error, policy) => {
      const suffix = policy === 'abort' ? '' : chalk.gray(policy === 'empty' ? ' (written empty)' : ' (skipped)');
      spinner?.fail(`${entry.key}: ${error.message}${suffix}`);
      spinner = null;
    },
  };
}

export function registerGenerateCommand(program: Command): void {
  const command = program
    .command('generate', { isDefault: true })
    .description('Generate the .env file from the template, running kubectl/aws values')
    .option('--stdout', 'Print the resolved entries instead of writing the output file');

  addConfigOptions(command)
    .addHelpText('after', `
Value expressions starting with a command prefix (kubectl, aws by default)
are run through the shell and replaced by their trimmed output. Everything
else is copied as is.

Write modes:
  auto      Replace the output when the marker file exists, append otherwise
  replace   Always replace the output
  append    Always append to the output

Examples:
  # Generate .env from .env.example
  env-resolver generate

  # Write empty values instead of aborting when a command fails
  env-resolver generate --on-failure empty

  # Also run gcloud values, and print the result
  env-resolver generate -p kubectl -p aws -p gcloud --stdout
`)
    .action(async (options: GenerateCommandOptions) => {
      let config: ResolverConfig;
      try {
        config = loadCommandConfig(options);
      } catch (err) {
        failCommand('Configuration error:', err);
      }

      let summary: ResolveSummary;
      try {
        summary = await resolveEnvironment(config, {
          dryRun: options.stdout === true,
          hooks: createSpinnerHooks(!options.stdout && process.stderr.isTTY === true),
        });
      } catch (err) {
        failCommand('Failed to generate env file:', err);
      }

      for (const warning of summary.warnings) {
        console.error(chalk.yellow('⚠') + ` line ${warning.lineNumber}: ${warning.message}`);
      }

      if (options.stdout) {
        process.stdout.write(summary.content);
        return;
      }

      const commandCount = summary.entries.filter(e => e.source === 'command').length;
      const verb = summary.mode === 'replace' ? 'written to' : 'appended to';
      console.log(chalk.green('✓') + ` ${summary.entries.length} entries ${verb} ${summary.outputPath}`);
      if (commandCount > 0) {
        console.log(`    ${chalk.gray('→')} ${commandCount} resolved from commands`);
      }
    });
}
