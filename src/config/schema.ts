/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import { DEFAULT_FALLBACK, ruleTableSchema } from '../templates/rules.js';

const logLevelSchema = z.enum(LOG_LEVELS);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  /** Append JSON-lines log entries to this file as well. */
  file: z.string().optional(),
});

export const themewrightConfigSchema = z
  .object({
    roots: z.array(z.string().min(1)).default([]),
    fallback: z.string().min(1).default(DEFAULT_FALLBACK),
    cache: z.boolean().default(false),
    rules: ruleTableSchema.optional(),
    logging: loggingConfigSchema.default({}),
  })
  .strict();

export type ThemewrightConfig = z.infer<typeof themewrightConfigSchema>;

export function validateConfig(data: unknown): { success: true; data: ThemewrightConfig } | { success: false; error: string } {
  const result = themewrightConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const error = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { success: false, error };
}
