// Path: src/commands/plan.ts
// Show what generate would do, without running any command

import type { Command } from 'commander';
import chalk from 'chalk';
import { planTemplate, type TemplatePlan } from '../lib/inspect.js';
import type { ResolverConfig } from '../lib/config/index.js';
import { decideOutputMode } from '../lib/resolver.js';
import { addConfigOptions, failCommand, loadCommandConfig } from './options.js';
import type { PlanCommandOptions } from './types.js';

export function registerPlanCommand(program: Command): void {
  const command = program
    .command('plan')
    .description('List template entries and which ones would run a command')
    .option('--json', 'Output as JSON');

  addConfigOptions(command)
    .action(async (options: PlanCommandOptions) => {
      let config: ResolverConfig;
      try {
        config = loadCommandConfig(options);
      } catch (err) {
        failCommand('Configuration error:', err);
      }

      let plan: TemplatePlan;
      try {
        plan = await planTemplate(config);
      } catch (err) {
        failCommand('Failed to read template:', err);
      }

      const mode = decideOutputMode(config.writeMode, config.marker);

      if (options.json) {
        console.log(JSON.stringify({ ...plan, output: config.output, mode }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.bold(`Plan for ${plan.template}`));
      console.log();

      for (const entry of plan.entries) {
        const kind = entry.isCommand ? chalk.cyan('command') : chalk.gray('literal');
        const shown = entry.isCommand ? entry.expression : chalk.gray('(copied as is)');
        console.log(`  ${String(entry.lineNumber).padStart(4)}  ${kind}  ${entry.key}  ${shown}`);
      }

      for (const line of plan.malformed) {
        console.log(`  ${String(line.lineNumber).padStart(4)}  ${chalk.yellow('skipped')}  ${line.line} ${chalk.gray(`(${line.reason})`)}`);
      }

      const commandCount = plan.entries.filter(e => e.isCommand).length;
      console.log();
      console.log(chalk.bold('Summary:'));
      console.log(`  ${plan.entries.length} entries, ${commandCount} from commands`);
      if (plan.duplicateKeys.length > 0) {
        console.log(`  ${chalk.yellow('⚠')} duplicate keys: ${plan.duplicateKeys.join(', ')}`);
      }
      console.log(`  output: ${config.output} (${mode === 'replace' ? 'replace' : 'append'})`);
      console.log();
    });
}
