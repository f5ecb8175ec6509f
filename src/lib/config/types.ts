// Path: src/lib/config/types.ts
// Configuration type definitions

export const COMMAND_FAILURE_POLICIES = ['abort', 'empty', 'skip'] as const;
export const WRITE_MODES = ['auto', 'replace', 'append'] as const;

/**
 * What happens to an entry whose command fails or times out
 * - abort: stop the run, leave the output file untouched
 * - empty: write `KEY=` and warn
 * - skip: drop the entry and warn
 */
export type CommandFailurePolicy = (typeof COMMAND_FAILURE_POLICIES)[number];

/**
 * How the output file is written
 * - auto: replace when the marker file exists, append otherwise
 * - replace: always replace
 * - append: always append
 */
export type WriteMode = (typeof WRITE_MODES)[number];

/**
 * Resolver configuration. Paths are absolute once loaded.
 */
export interface ResolverConfig {
  /** Project directory; relative paths and commands resolve against it */
  rootDir: string;
  /** Template file (default: .env.example) */
  template: string;
  /** Output file (default: .env) */
  output: string;
  /** Marker file whose presence makes `auto` mode replace the output (default: public/env.js) */
  marker: string;
  /** Value expressions starting with one of these are executed (default: kubectl, aws) */
  commandPrefixes: string[];
  onCommandFailure: CommandFailurePolicy;
  /** Per-command timeout in milliseconds (default: 30000) */
  commandTimeoutMs: number;
  writeMode: WriteMode;
  /** Shell used to run value expressions (default: /bin/sh) */
  shell: string;
}

/**
 * Configuration input before validation, as it comes from the config file,
 * environment variables or command-line flags.
 */
export interface RawConfigInput {
  template?: string;
  output?: string;
  marker?: string;
  commandPrefixes?: string[] | string;
  onCommandFailure?: string;
  commandTimeoutMs?: number | string;
  writeMode?: string;
  shell?: string;
}

export const CONFIG_FILE_NAME = 'env-resolver.config.json';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<ResolverConfig, 'rootDir'> = {
  template: '.env.example',
  output: '.env',
  marker: 'public/env.js',
  commandPrefixes: ['kubectl', 'aws'],
  onCommandFailure: 'abort',
  commandTimeoutMs: 30000,
  writeMode: 'auto',
  shell: '/bin/sh',
};
