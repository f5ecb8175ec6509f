// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options every command shares for locating and configuring the project
 */
export interface ConfigCommandOptions {
  root?: string;
  config?: string;
  template?: string;
  output?: string;
  marker?: string;
  prefix?: string[];
  onFailure?: string;
  timeout?: string;
  mode?: string;
  shell?: string;
}

/**
 * Options for the 'generate' command
 */
export interface GenerateCommandOptions extends ConfigCommandOptions {
  stdout?: boolean;
}

/**
 * Options for the 'plan' command
 */
export interface PlanCommandOptions extends ConfigCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'check' command
 */
export interface CheckCommandOptions extends ConfigCommandOptions {
  json?: boolean;
}
