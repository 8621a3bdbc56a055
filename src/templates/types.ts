/**
 * Template Resolver - Type Definitions
 */

/**
 * What is being rendered. Created by the caller per request and never
 * mutated by the resolver.
 */
export interface ContentDescriptor {
  /** Content-type category: 'single', 'page', 'archive', 'category', ... */
  readonly type: string;
  /** Sub-type, e.g. the post type of a single item or a taxonomy name. */
  readonly typeSlug?: string;
  /** Slug of the item itself, e.g. 'hello-world'. */
  readonly pathSlug?: string;
  /** Hierarchy depth; 0 for top-level items. */
  readonly depth?: number;
}

/** A template-name pattern over `{type}`, `{type_slug}` and `{path_slug}`. */
export type RulePattern =
  | string
  | {
      pattern: string;
      /** Only applies when descriptor depth >= minDepth. */
      minDepth?: number;
      /** Only applies when descriptor depth <= maxDepth. */
      maxDepth?: number;
    };

/**
 * Ordered patterns per content type, most specific first. The `'*'` entry
 * applies to types without one of their own.
 */
export type RuleTable = Record<string, readonly RulePattern[]>;

export interface ResolvedTemplate {
  /** Override root the template was found in. */
  root: string;
  /** Template identifier within the root. */
  name: string;
  /** True when the configured fallback template was used. */
  isFallback: boolean;
}

/**
 * Existence check injected into the resolver, so resolution is independent of
 * where templates are stored.
 */
export interface TemplateSource {
  exists(root: string, name: string): boolean | Promise<boolean>;
}
