/**
 * Output sink shared by CLI commands, so tests can capture what a command
 * prints and the exit code it sets.
 */

import type { Command } from 'commander';
import { ConsoleTransport, type Transport } from '../logging/logger.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  /** Log transports for loggers the commands create. */
  transports(): Transport[];
}

export const processIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  transports: () => [new ConsoleTransport()],
};

/** The global `--config` option as seen from a subcommand. */
export function configPathOf(command: Command): string | undefined {
  const value: unknown = command.optsWithGlobals()['config'];
  return typeof value === 'string' ? value : undefined;
}
