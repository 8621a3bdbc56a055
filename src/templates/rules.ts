/**
 * Specificity rule table
 *
 * Turns a ContentDescriptor into its ordered candidate list. Patterns are
 * validated once when the table is compiled; expansion is then a plain walk
 * over the compiled entries.
 */

import { z } from 'zod';
import { ConfigError, InvalidDescriptorError } from '../errors.js';
import type { ContentDescriptor, RulePattern, RuleTable } from './types.js';

export const DEFAULT_FALLBACK = 'index.html';

export const WILDCARD_TYPE = '*';

export const DEFAULT_RULES: RuleTable = {
  single: ['single-{type_slug}-{path_slug}.html', 'single-{type_slug}.html', 'single.html', 'singular.html'],
  page: [
    'page-{path_slug}.html',
    'page-{type_slug}.html',
    { pattern: 'page-child.html', minDepth: 1 },
    'page.html',
    'singular.html',
  ],
  attachment: ['attachment-{type_slug}.html', 'attachment.html', 'single.html', 'singular.html'],
  archive: ['archive-{type_slug}.html', 'archive.html'],
  category: ['category-{path_slug}.html', 'category.html', 'archive.html'],
  tag: ['tag-{path_slug}.html', 'tag.html', 'archive.html'],
  taxonomy: ['taxonomy-{type_slug}-{path_slug}.html', 'taxonomy-{type_slug}.html', 'taxonomy.html', 'archive.html'],
  author: ['author-{path_slug}.html', 'author.html', 'archive.html'],
  date: ['date.html', 'archive.html'],
  search: ['search.html'],
  '404': ['404.html'],
  home: ['home.html'],
  'front-page': ['front-page.html', 'home.html'],
};

type Token = 'type' | 'type_slug' | 'path_slug';

const TOKEN_PATTERN = /\{([^{}]*)\}/g;

const KNOWN_TOKENS: readonly string[] = ['type', 'type_slug', 'path_slug'];

function isToken(name: string): name is Token {
  return KNOWN_TOKENS.includes(name);
}

function unknownTokens(pattern: string): string[] {
  return Array.from(pattern.matchAll(TOKEN_PATTERN), (m) => m[1] ?? '').filter((name) => !isToken(name));
}

const depthSchema = z.number().int().nonnegative();

const patternTextSchema = z
  .string()
  .min(1, 'pattern must not be empty')
  .refine((p) => unknownTokens(p).length === 0, (p) => ({
    message: `unknown token(s) ${unknownTokens(p).map((t) => `{${t}}`).join(', ')} in "${p}"`,
  }));

export const rulePatternSchema = z.union([
  patternTextSchema,
  z
    .object({
      pattern: patternTextSchema,
      minDepth: depthSchema.optional(),
      maxDepth: depthSchema.optional(),
    })
    .strict()
    .refine((r) => r.minDepth === undefined || r.maxDepth === undefined || r.minDepth <= r.maxDepth, {
      message: 'minDepth must not exceed maxDepth',
    }),
]);

export const ruleTableSchema = z.record(z.string().min(1), z.array(rulePatternSchema));

interface CompiledRule {
  pattern: string;
  minDepth: number;
  maxDepth: number;
}

export type CompiledRuleTable = ReadonlyMap<string, readonly CompiledRule[]>;

function compileRule(rule: RulePattern): CompiledRule {
  if (typeof rule === 'string') {
    return { pattern: rule, minDepth: 0, maxDepth: Number.POSITIVE_INFINITY };
  }
  return {
    pattern: rule.pattern,
    minDepth: rule.minDepth ?? 0,
    maxDepth: rule.maxDepth ?? Number.POSITIVE_INFINITY,
  };
}

/**
 * Validate and compile a rule table.
 *
 * @throws ConfigError listing every invalid pattern.
 */
export function compileRules(table: RuleTable): CompiledRuleTable {
  const result = ruleTableSchema.safeParse(table);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid template rules: ${issues.join('; ')}`, { issues });
  }

  const compiled = new Map<string, CompiledRule[]>();
  for (const [type, rules] of Object.entries(result.data)) {
    compiled.set(type, rules.map(compileRule));
  }
  return compiled;
}

/** Per-type merge: a type present in `overrides` replaces the base entry. */
export function mergeRules(base: RuleTable, overrides: RuleTable = {}): RuleTable {
  return { ...base, ...overrides };
}

/**
 * Slugs become part of a template identifier, so anything that could step
 * outside a root is rejected.
 */
export function isSafeSlug(value: string | undefined): value is string {
  if (value === undefined || value.length === 0) return false;
  if (value === '.' || value === '..') return false;
  return !/[/\\\0]/.test(value);
}

function tokenValue(token: Token, descriptor: ContentDescriptor): string | undefined {
  switch (token) {
    case 'type':
      return descriptor.type;
    case 'type_slug':
      return descriptor.typeSlug;
    case 'path_slug':
      return descriptor.pathSlug;
  }
}

/**
 * Substitute descriptor fields into a pattern. Returns undefined when a token
 * has no usable value, in which case the pattern is skipped.
 */
export function expandPattern(pattern: string, descriptor: ContentDescriptor): string | undefined {
  let missing = false;
  const expanded = pattern.replace(TOKEN_PATTERN, (match, name: string) => {
    const value = isToken(name) ? tokenValue(name, descriptor) : undefined;
    if (!isSafeSlug(value)) {
      missing = true;
      return match;
    }
    return value;
  });
  return missing ? undefined : expanded;
}

/**
 * Ordered, de-duplicated candidate list for a descriptor, most specific
 * first, ending with the fallback.
 *
 * @throws InvalidDescriptorError when `depth` is not a non-negative integer.
 */
export function buildCandidates(
  rules: CompiledRuleTable,
  descriptor: ContentDescriptor,
  fallback: string
): string[] {
  const depth = descriptor.depth ?? 0;
  if (!Number.isSafeInteger(depth) || depth < 0) {
    throw new InvalidDescriptorError(`depth must be a non-negative integer, got ${depth}`, {
      type: descriptor.type,
      depth,
    });
  }
  const entries = rules.get(descriptor.type) ?? rules.get(WILDCARD_TYPE) ?? [];
  const seen = new Set<string>();
  const candidates: string[] = [];

  for (const rule of entries) {
    if (depth < rule.minDepth || depth > rule.maxDepth) continue;
    const name = expandPattern(rule.pattern, descriptor);
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    candidates.push(name);
  }

  if (!seen.has(fallback)) candidates.push(fallback);
  return candidates;
}
