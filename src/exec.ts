/**
 * External command execution
 *
 * Native cleanup commands, Docker queries and `diskutil` all go through a
 * CommandRunner so that callers get a structured outcome instead of an
 * exception, and tests can substitute a fake.
 */

import { exec, execFile, type ExecFileException } from 'child_process';

export interface CommandOutcome {
  /** Process exit code; -1 when the process never ran or was killed */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;

  /** Spawn failure (ENOENT for a missing binary, ...) */
  error?: string;
}

export interface CommandOptions {
  /** Kill the command after this many milliseconds */
  timeoutMs: number;
}

export interface CommandRunner {
  /**
   * Run a binary with an argument vector. Arguments are never interpreted
   * by a shell.
   */
  run(file: string, args: readonly string[], options: CommandOptions): Promise<CommandOutcome>;

  /**
   * Run a trusted command line through the shell. Only used for cleanup
   * commands that come from the bundled category table.
   */
  runShell(command: string, options: CommandOptions): Promise<CommandOutcome>;
}

const MAX_BUFFER = 10 * 1024 * 1024;

function toOutcome(error: ExecFileException | null, stdout: string, stderr: string): CommandOutcome {
  if (!error) {
    return { exitCode: 0, stdout, stderr, timedOut: false };
  }

  // Killed by the timeout: node sends SIGTERM and sets `killed`
  if (error.killed === true && error.signal) {
    return { exitCode: -1, stdout, stderr, timedOut: true };
  }

  if (typeof error.code === 'number') {
    return { exitCode: error.code, stdout, stderr, timedOut: false };
  }

  return { exitCode: -1, stdout, stderr, timedOut: false, error: error.message };
}

/**
 * CommandRunner backed by child_process.
 */
export function createCommandRunner(): CommandRunner {
  return {
    run(file, args, options) {
      return new Promise(resolve => {
        execFile(
          file,
          [...args],
          { timeout: options.timeoutMs, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
          (error, stdout, stderr) => {
            resolve(toOutcome(error, stdout, stderr));
          }
        );
      });
    },

    runShell(command, options) {
      return new Promise(resolve => {
        exec(
          command,
          { timeout: options.timeoutMs, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
          (error, stdout, stderr) => {
            resolve(toOutcome(error, stdout, stderr));
          }
        );
      });
    },
  };
}

/**
 * Message describing a failed outcome, for a result's `error` field.
 */
export function describeFailure(outcome: CommandOutcome, timeoutMs: number): string {
  if (outcome.timedOut) {
    return `Command timed out after ${Math.round(timeoutMs / 1000)} seconds`;
  }
  if (outcome.error) {
    return outcome.error;
  }
  return outcome.stderr.trim() || 'Command failed';
}
