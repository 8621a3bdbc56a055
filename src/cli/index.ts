import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { isThemewrightError } from '../errors.js';
import { registerConfigCommand } from './config.js';
import { processIO, type CliIO } from './io.js';
import { registerTemplateCommands } from './templates.js';

export const VERSION = '0.3.0';
const NAME = 'themewright';

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command(NAME)
    .description('Resolve theme templates across override roots')
    .version(VERSION)
    .option('-c, --config <path>', 'config file (default: ./themewright.config.json5)')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  registerTemplateCommands(program, io);
  registerConfigCommand(program, io);
  return program;
}

/**
 * Parse `argv` and run the matching command. Usage errors and known
 * failures (bad config) are reported on the error sink with a non-zero exit
 * code; anything else propagates.
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<void> {
  try {
    await createProgram(io).parseAsync([...argv]);
  } catch (err: unknown) {
    // Commander has already printed help, version or its own usage error.
    if (err instanceof CommanderError) {
      io.setExitCode(err.exitCode);
      return;
    }
    if (!isThemewrightError(err)) throw err;
    io.err(chalk.red(`${NAME}: ${err.message}`));
    io.setExitCode(1);
  }
}
