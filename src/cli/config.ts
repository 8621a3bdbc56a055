/**
 * Configuration commands
 *
 *   config show      - print the effective configuration
 *   config validate  - check the config file and report problems
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config/loader.js';
import { isThemewrightError } from '../errors.js';
import { configPathOf, type CliIO } from './io.js';

export function registerConfigCommand(program: Command, io: CliIO): void {
  const config = program.command('config').description('Inspect themewright configuration');

  config
    .command('show')
    .description('Print the effective configuration as JSON')
    .action((_options: unknown, command: Command) => {
      const { source, ...effective } = loadConfig({ path: configPathOf(command) });
      io.out(JSON.stringify({ source: source ?? null, ...effective }, null, 2));
    });

  config
    .command('validate')
    .description('Validate the configuration file')
    .action((_options: unknown, command: Command) => {
      try {
        const loaded = loadConfig({ path: configPathOf(command) });
        io.out(`${chalk.green('✓')} ${loaded.source ?? 'defaults'} is valid`);
      } catch (err: unknown) {
        if (!isThemewrightError(err)) throw err;
        io.err(`${chalk.red('✗')} ${err.message}`);
        io.setExitCode(1);
      }
    });
}
