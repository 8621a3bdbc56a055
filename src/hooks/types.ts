/**
 * Hook Registry - Type Definitions
 *
 * Known lifecycle hooks are declared in `ThemeActions` / `ThemeFilters` so
 * their callbacks are type-checked. Any other string is a free-form
 * extension point whose arguments are `unknown`.
 */

import type { ContentDescriptor, ResolvedTemplate } from '../templates/types.js';
import type { AssetQueue } from '../theme/assets.js';
import type { WidgetAreaRegistry } from '../theme/widgets.js';

export interface ThemeInfo {
  name: string;
  version?: string;
  /** Parent theme name for child themes. */
  parent?: string;
}

/** Action hooks fired by the theme lifecycle, with their argument tuples. */
export interface ThemeActions {
  after_setup: [theme: ThemeInfo];
  init: [];
  register_widgets: [areas: WidgetAreaRegistry];
  enqueue_assets: [queue: AssetQueue];
  before_template_render: [template: ResolvedTemplate, descriptor: ContentDescriptor];
}

/** Filter hooks: the first tuple element is the value being filtered. */
export interface ThemeFilters {
  template_candidates: [candidates: string[], descriptor: ContentDescriptor];
  template_include: [template: ResolvedTemplate, descriptor: ContentDescriptor];
  body_class: [classes: string[], descriptor: ContentDescriptor];
}

export type ActionName = keyof ThemeActions;
export type FilterName = keyof ThemeFilters;

/** Arguments an action callback receives; `unknown[]` for free-form names. */
export type ActionArgs<K extends string> = K extends ActionName ? ThemeActions[K] : unknown[];

/** Value type of a filter; `unknown` for free-form names. */
export type FilterValue<K extends string> = K extends FilterName ? ThemeFilters[K][0] : unknown;

/** Extra arguments passed alongside a filter value. */
export type FilterArgs<K extends string> = K extends FilterName
  ? ThemeFilters[K] extends [unknown, ...infer Rest extends unknown[]]
    ? Rest
    : never
  : unknown[];

export type ActionCallback<K extends string> = (...args: ActionArgs<K>) => void | Promise<void>;

/**
 * Filters must return the same semantic type they receive. Callbacks may
 * declare fewer parameters than the hook passes.
 */
export type FilterCallback<K extends string> = (
  value: FilterValue<K>,
  ...args: FilterArgs<K>
) => FilterValue<K>;

export type AsyncFilterCallback<K extends string> = (
  value: FilterValue<K>,
  ...args: FilterArgs<K>
) => FilterValue<K> | Promise<FilterValue<K>>;

/**
 * Storage type for any registered callback. Declared through a method so its
 * parameters compare bivariantly and every typed callback fits one table,
 * stored as-is so unregister can match by identity.
 */
export type HookCallback = {
  bivarianceHack(...args: unknown[]): unknown;
}['bivarianceHack'];

/** A registration as stored by the registry. */
export interface HookRegistration {
  readonly id: string;
  readonly hookName: string;
  /** Lower runs first. */
  readonly priority: number;
  /** How many arguments the callback receives (filter value included). */
  readonly acceptedArgs: number;
  /** Registration order; ties on priority run in ascending sequence. */
  readonly sequence: number;
  readonly callback: HookCallback;
}

export interface AsyncDispatchOptions {
  /** Per-callback timeout in milliseconds. No timeout when omitted. */
  timeoutMs?: number;
}

export const DEFAULT_PRIORITY = 10;
export const DEFAULT_ACCEPTED_ARGS = 1;

/** Lifecycle actions in the order Theme.setup() fires them. */
export const SETUP_ACTIONS = ['after_setup', 'init', 'register_widgets', 'enqueue_assets'] as const;
