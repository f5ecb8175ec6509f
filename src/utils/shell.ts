// Path: src/utils/shell.ts
// Shell execution utilities for value expressions

import { execFileSync, execSync } from 'node:child_process';
import { commandLogger as log } from '../lib/logger.js';
import { ResolverError } from './error.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 30000;
export const DEFAULT_SHELL = '/bin/sh';

// Exit status the POSIX shell reports for a binary it cannot find
const SHELL_NOT_FOUND_STATUS = 127;

export interface ShellCommandOptions {
  /** Working directory for the command */
  cwd?: string;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
  /** Shell used to interpret the command line */
  shell?: string;
  /** Environment for the command (default: current process environment) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs a single value expression. Injected into the resolver so tests can fake it.
 */
export type CommandRunner = (command: string, options: ShellCommandOptions) => string;

interface ExecSyncFailure extends Error {
  status?: number | null;
  signal?: NodeJS.Signals | null;
  code?: string;
  stderr?: string | Buffer;
}

function isExecSyncFailure(err: unknown): err is ExecSyncFailure {
  return err instanceof Error;
}

function stderrText(stderr: string | Buffer | undefined): string {
  if (stderr === undefined) return '';
  return (typeof stderr === 'string' ? stderr : stderr.toString('utf-8')).trim();
}

/**
 * Run a command line through the shell and return its trimmed standard output.
 *
 * The command is executed as written, with the current process's privileges.
 * Commands run synchronously; the caller gets control back only after the
 * command exits or is killed by the timeout.
 *
 * @throws ResolverError COMMAND_TIMEOUT when the timeout elapses,
 *   COMMAND_FAILED on a non-zero exit or a missing binary
 */
export function runShellCommand(command: string, options: ShellCommandOptions = {}): string {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const shell = options.shell ?? DEFAULT_SHELL;

  log.debug({ command, cwd: options.cwd, timeoutMs }, 'Executing command');

  try {
    const stdout = execSync(command, {
      encoding: 'utf-8',
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell,
      timeout: timeoutMs,
      killSignal: 'SIGKILL',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout.trim();
  } catch (err) {
    if (!isExecSyncFailure(err)) {
      throw new ResolverError(`Command failed: ${command}`, 'COMMAND_FAILED', {
        metadata: { command },
      });
    }

    const stderr = stderrText(err.stderr);
    const exitCode = typeof err.status === 'number' ? err.status : null;

    if (err.code === 'ETIMEDOUT') {
      log.warn({ command, timeoutMs }, 'Command timed out');
      throw new ResolverError(`Command timed out after ${timeoutMs}ms: ${command}`, 'COMMAND_TIMEOUT', {
        cause: err,
        metadata: { command, timeoutMs },
      });
    }

    const reason = exitCode === SHELL_NOT_FOUND_STATUS
      ? 'command not found'
      : exitCode !== null
        ? `exit code ${exitCode}`
        : err.signal
          ? `killed by ${err.signal}`
          : err.message;

    log.warn({ command, exitCode, stderr }, 'Command failed');
    throw new ResolverError(`Command failed (${reason}): ${command}`, 'COMMAND_FAILED', {
      cause: err,
      metadata: { command, exitCode, stderr },
    });
  }
}

/**
 * Safely find the path to a command.
 * Prevents command injection by not using string interpolation in a shell.
 *
 * @param commandName - Command name to find
 * @returns Path to command or null if not found
 */
export function whichSafe(commandName: string): string | null {
  try {
    const result = execFileSync('which', [commandName], { encoding: 'utf-8', stdio: 'pipe' });
    return result.trim() || null;
  } catch {
    return null;
  }
}
