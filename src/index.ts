#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerGenerateCommand } from './commands/generate.js';
import { registerPlanCommand } from './commands/plan.js';
import { registerCheckCommand } from './commands/check.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/../package.json and dist/../package.json both work
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('env-resolver')
  .description('Generate a .env file from .env.example, resolving kubectl/aws values')
  .version(version);

// Register commands
registerGenerateCommand(program);
registerPlanCommand(program);
registerCheckCommand(program);

// Parse arguments
await program.parseAsync();
