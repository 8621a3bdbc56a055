/**
 * themewright
 *
 * A priority-ordered hook registry and a template resolver with override
 * roots, plus the Theme class that composes them.
 */

export * from './hooks/index.js';
export * from './templates/index.js';
export * from './errors.js';

export { Theme, defaultBodyClasses } from './theme/theme.js';
export type { ThemeOptions } from './theme/theme.js';
export { AssetQueue } from './theme/assets.js';
export type { Asset, AssetKind, EnqueueOptions } from './theme/assets.js';
export { WidgetAreaRegistry } from './theme/widgets.js';
export type { WidgetArea } from './theme/widgets.js';

export { loadConfig, resolveConfig, parseConfigContent, substituteEnvVars, DEFAULT_CONFIG_FILE } from './config/loader.js';
export type { ResolvedConfig } from './config/loader.js';
export { validateConfig, themewrightConfigSchema } from './config/schema.js';
export type { ThemewrightConfig } from './config/schema.js';
export { createLogger, createResolver } from './config/factory.js';

export { Logger, ConsoleTransport, JsonTransport, logger, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { LogEntry, LogLevel, Transport, LoggerOptions } from './logging/logger.js';
