/**
 * Template commands
 *
 *   candidates <type>  - list the candidate templates for a descriptor
 *   resolve <type>     - resolve a descriptor against the configured roots
 */

import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import { createLogger, createResolver } from '../config/factory.js';
import { loadConfig, type ResolvedConfig } from '../config/loader.js';
import { isTemplateNotFound } from '../errors.js';
import { LOG_LEVELS, type Logger } from '../logging/logger.js';
import { formatTemplate } from '../templates/resolver.js';
import type { ContentDescriptor } from '../templates/types.js';
import { configPathOf, type CliIO } from './io.js';

interface DescriptorOptions {
  typeSlug?: string;
  pathSlug?: string;
  depth?: number;
  json?: boolean;
}

export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('depth must be a non-negative integer');
  }
  return depth;
}

export function toDescriptor(type: string, options: DescriptorOptions): ContentDescriptor {
  return {
    type,
    typeSlug: options.typeSlug,
    pathSlug: options.pathSlug,
    depth: options.depth,
  };
}

/**
 * Commands print their own results and misses, so component logs below
 * `error` would repeat them.
 */
export function commandLogger(config: ResolvedConfig, io: CliIO): Logger {
  const log = createLogger(config, io.transports());
  if (LOG_LEVELS.indexOf(log.getLevel()) < LOG_LEVELS.indexOf('error')) log.setLevel('error');
  return log;
}

function descriptorOptions(command: Command): Command {
  return command
    .option('-t, --type-slug <slug>', 'content sub-type, e.g. a post type')
    .option('-p, --path-slug <slug>', 'slug of the item being rendered')
    .option('-d, --depth <n>', 'hierarchy depth', parseDepth)
    .option('--json', 'print JSON');
}

export function registerTemplateCommands(program: Command, io: CliIO): void {
  descriptorOptions(
    program.command('candidates <type>').description('List candidate templates, most specific first')
  ).action((type: string, options: DescriptorOptions, command: Command) => {
    const config = loadConfig({ path: configPathOf(command) });
    const resolver = createResolver(config, { logger: commandLogger(config, io) });
    const candidates = resolver.candidates(toDescriptor(type, options));

    if (options.json) {
      io.out(JSON.stringify(candidates));
      return;
    }
    candidates.forEach((name, i) => io.out(`${chalk.dim(String(i + 1).padStart(2))}  ${name}`));
  });

  descriptorOptions(
    program.command('resolve <type>').description('Resolve the template for a descriptor')
  ).action(async (type: string, options: DescriptorOptions, command: Command) => {
    const config = loadConfig({ path: configPathOf(command) });
    const resolver = createResolver(config, { logger: commandLogger(config, io) });

    try {
      const template = await resolver.resolve(toDescriptor(type, options));
      if (options.json) {
        io.out(JSON.stringify(template));
      } else {
        io.out(formatTemplate(template) + (template.isFallback ? chalk.yellow(' (fallback)') : ''));
      }
    } catch (err: unknown) {
      if (!isTemplateNotFound(err)) throw err;
      io.err(chalk.red(err.message));
      io.setExitCode(1);
    }
  });
}
