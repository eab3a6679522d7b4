/**
 * Terminal logging for the CLI
 *
 * Core modules return results instead of printing; only the CLI talks to
 * the terminal, through these helpers.
 */

import pc from 'picocolors';

let verbose = Boolean(process.env.DISKWARD_DEBUG);

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export const logger = {
  info(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(pc.green(message));
  },

  warn(message: string): void {
    console.warn(pc.yellow(message));
  },

  error(message: string): void {
    console.error(pc.red(`Error: ${message}`));
  },

  debug(message: string): void {
    if (verbose) {
      console.error(pc.gray(`[debug] ${message}`));
    }
  },
};
