/**
 * Builds the logger and resolver described by a ResolvedConfig.
 */

import { ConsoleTransport, JsonTransport, Logger, type Transport } from '../logging/logger.js';
import { TemplateResolver } from '../templates/resolver.js';
import { FileSystemTemplateSource } from '../templates/sources.js';
import type { TemplateSource } from '../templates/types.js';
import type { ResolvedConfig } from './loader.js';

export function createLogger(config: ResolvedConfig, transports?: Transport[]): Logger {
  const sinks = [...(transports ?? [new ConsoleTransport()])];
  if (config.logging.file) {
    sinks.push(new JsonTransport({ filePath: config.logging.file }));
  }
  return new Logger({ level: config.logging.level, transports: sinks });
}

export function createResolver(
  config: ResolvedConfig,
  options: { source?: TemplateSource; logger?: Logger } = {}
): TemplateResolver {
  return new TemplateResolver({
    roots: config.roots,
    source: options.source ?? new FileSystemTemplateSource(),
    rules: config.rules,
    fallback: config.fallback,
    cache: config.cache,
    logger: options.logger?.child('templates'),
  });
}
