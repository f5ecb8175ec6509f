// Path: src/commands/check.ts
// Validate configuration and verify the tools behind the command prefixes are installed

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type ResolverConfig } from '../lib/config/index.js';
import { checkCommandPrefixes } from '../lib/inspect.js';
import { formatValidationResult, validateConfig } from '../lib/validation.js';
import { addConfigOptions, failCommand, toConfigInput } from './options.js';
import type { CheckCommandOptions } from './types.js';

export function registerCheckCommand(program: Command): void {
  const command = program
    .command('check')
    .description('Validate configuration and check every command prefix resolves to a binary on PATH')
    .option('--json', 'Output as JSON');

  addConfigOptions(command)
    .action((options: CheckCommandOptions) => {
      let config: ResolverConfig;
      try {
        config = loadConfig({
          rootDir: options.root,
          configPath: options.config,
          overrides: toConfigInput(options),
        });
      } catch (err) {
        failCommand('Configuration error:', err);
      }

      const validation = validateConfig(config);
      const checks = checkCommandPrefixes(config.commandPrefixes);
      const missing = checks.filter(c => c.path === null);
      const ok = validation.valid && missing.length === 0;

      if (options.json) {
        console.log(JSON.stringify({ ok, validation, checks }, null, 2));
      } else {
        console.log();
        console.log(formatValidationResult(validation));
        console.log();
        console.log(chalk.bold('Command prefixes:'));
        for (const check of checks) {
          if (check.path) {
            console.log(`  ${chalk.green('✓')} ${check.prefix} ${chalk.gray(`→ ${check.path}`)}`);
          } else {
            console.log(`  ${chalk.red('✗')} ${check.prefix} ${chalk.gray(`(${check.binary} not found on PATH)`)}`);
          }
        }
        console.log();
      }

      if (!ok) {
        process.exit(1);
      }
    });
}
