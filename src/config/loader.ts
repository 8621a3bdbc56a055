/**
 * Configuration loader - reads and parses themewright.config.json5
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import JSON5 from 'json5';
import { ConfigError } from '../errors.js';
import { DEFAULT_RULES, mergeRules } from '../templates/rules.js';
import type { RuleTable } from '../templates/types.js';
import { validateConfig, type ThemewrightConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'themewright.config.json5';

/** Effective configuration: rules merged over the defaults, roots absolute. */
export interface ResolvedConfig extends Omit<ThemewrightConfig, 'rules'> {
  rules: RuleTable;
  /** File the configuration was read from, if any. */
  source?: string;
}

export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_, key: string) => env[key] ?? '');
}

function substituteDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteDeep(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = substituteDeep(val, env);
    }
    return result;
  }
  return obj;
}

export function parseConfigContent(content: string, source = '<inline>'): unknown {
  try {
    return JSON5.parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${source}: ${reason}`, { source });
  }
}

/**
 * Validate raw configuration data and produce the effective configuration.
 *
 * @param baseDir - Directory relative roots and the log file resolve against.
 * @throws ConfigError when validation fails.
 */
export function resolveConfig(
  data: unknown,
  options: { baseDir?: string; source?: string; env?: NodeJS.ProcessEnv } = {}
): ResolvedConfig {
  const substituted = substituteDeep(data ?? {}, options.env ?? process.env);
  const result = validateConfig(substituted);
  if (!result.success) {
    throw new ConfigError(`Invalid config${options.source ? ` in ${options.source}` : ''}: ${result.error}`, {
      source: options.source,
    });
  }

  const baseDir = options.baseDir ?? process.cwd();
  const absolute = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));
  const config = result.data;
  return {
    ...config,
    roots: config.roots.map(absolute),
    logging: config.logging.file === undefined ? config.logging : { ...config.logging, file: absolute(config.logging.file) },
    rules: mergeRules(DEFAULT_RULES, config.rules),
    source: options.source,
  };
}

/**
 * Load configuration from `path` (default: ./themewright.config.json5).
 * A missing file yields the defaults.
 */
export function loadConfig(options: { path?: string; env?: NodeJS.ProcessEnv } = {}): ResolvedConfig {
  const configPath = resolve(options.path ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    if (options.path) {
      throw new ConfigError(`Config file not found: ${configPath}`, { source: configPath });
    }
    return resolveConfig({}, { env: options.env });
  }

  const content = readFileSync(configPath, 'utf-8');
  return resolveConfig(parseConfigContent(content, configPath), {
    baseDir: dirname(configPath),
    source: configPath,
    env: options.env,
  });
}
