/**
 * Template Resolver
 *
 * Maps a ContentDescriptor to the most specific template that exists in any
 * override root.
 *
 * Search order: candidates outer, roots inner. The most specific candidate is
 * looked for in every root before the next candidate is tried, so
 * `parent/single-post.html` wins over `child/single.html`.
 *
 * Usage:
 *   const resolver = new TemplateResolver({
 *     roots: ['themes/child', 'themes/parent'],
 *     source: new FileSystemTemplateSource(),
 *   });
 *   const template = await resolver.resolve({ type: 'single', typeSlug: 'post' });
 */

import { TemplateNotFoundError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import {
  DEFAULT_FALLBACK,
  DEFAULT_RULES,
  buildCandidates,
  compileRules,
  type CompiledRuleTable,
} from './rules.js';
import type { ContentDescriptor, ResolvedTemplate, RuleTable, TemplateSource } from './types.js';

export interface TemplateResolverOptions {
  /** Override roots, highest priority first. */
  roots: readonly string[];
  source: TemplateSource;
  /** Specificity rules; defaults to DEFAULT_RULES. */
  rules?: RuleTable;
  /** Template used when no candidate exists. Default 'index.html'. */
  fallback?: string;
  /** Cache existence checks until the roots change. Default false. */
  cache?: boolean;
  logger?: Logger;
}

export class TemplateResolver {
  private roots: string[];
  private readonly source: TemplateSource;
  private readonly rules: CompiledRuleTable;
  private readonly fallback: string;
  private readonly cache?: Map<string, Promise<boolean>>;
  private readonly log: Logger;

  /**
   * @throws ConfigError when the rule table contains an invalid pattern.
   */
  constructor(options: TemplateResolverOptions) {
    this.roots = [...options.roots];
    this.source = options.source;
    this.rules = compileRules(options.rules ?? DEFAULT_RULES);
    this.fallback = options.fallback ?? DEFAULT_FALLBACK;
    this.cache = options.cache ? new Map() : undefined;
    this.log = options.logger ?? rootLogger.child('templates');
  }

  getRoots(): string[] {
    return [...this.roots];
  }

  /** Replace the override roots. Cached existence checks are discarded. */
  setRoots(roots: readonly string[]): void {
    this.roots = [...roots];
    this.clearCache();
  }

  clearCache(): void {
    this.cache?.clear();
  }

  getFallback(): string {
    return this.fallback;
  }

  candidates(descriptor: ContentDescriptor): string[] {
    return buildCandidates(this.rules, descriptor, this.fallback);
  }

  /**
   * @throws TemplateNotFoundError when neither a candidate nor the fallback
   *   exists in any root.
   */
  async resolve(descriptor: ContentDescriptor): Promise<ResolvedTemplate> {
    return this.resolveFrom(this.candidates(descriptor));
  }

  /**
   * Resolve an explicit candidate list (e.g. one rewritten by a
   * `template_candidates` filter). The fallback is still tried last.
   */
  async resolveFrom(candidates: readonly string[]): Promise<ResolvedTemplate> {
    const roots = [...this.roots];

    for (const name of candidates) {
      const root = await this.findRoot(roots, name);
      if (root !== undefined) {
        const template = { root, name, isFallback: name === this.fallback };
        this.log.debug('template resolved', { ...template });
        return template;
      }
    }

    if (!candidates.includes(this.fallback)) {
      const root = await this.findRoot(roots, this.fallback);
      if (root !== undefined) {
        this.log.debug('template resolved to fallback', { root, name: this.fallback });
        return { root, name: this.fallback, isFallback: true };
      }
    }

    this.log.warn('no template found', { candidates: [...candidates], roots });
    throw new TemplateNotFoundError(candidates, roots);
  }

  private async findRoot(roots: readonly string[], name: string): Promise<string | undefined> {
    for (const root of roots) {
      if (await this.exists(root, name)) return root;
    }
    return undefined;
  }

  private exists(root: string, name: string): Promise<boolean> {
    if (!this.cache) return Promise.resolve(this.source.exists(root, name));

    const key = `${root}\0${name}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const cache = this.cache;
    const check = Promise.resolve(this.source.exists(root, name));
    cache.set(key, check);
    // Failed checks are not remembered; the caller still sees the rejection.
    void check.catch(() => {
      cache.delete(key);
    });
    return check;
  }
}

/** `root/name`, for display. */
export function formatTemplate(template: ResolvedTemplate): string {
  return `${template.root.replace(/[/\\]+$/, '')}/${template.name}`;
}
