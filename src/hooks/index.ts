/**
 * Hook Registry
 *
 * Priority-ordered actions and filters for theme lifecycle extension points.
 *
 *   import { HookRegistry } from './hooks/index.js';
 *
 *   const hooks = new HookRegistry();
 *   hooks.addAction('init', () => { ... });
 *   hooks.addFilter('body_class', (classes) => [...classes, 'wide'], 20);
 *
 *   hooks.dispatchAction('init');
 *   const classes = hooks.applyFilter('body_class', ['page'], descriptor);
 */

export { HookRegistry } from './registry.js';
export type { HookRegistryOptions } from './registry.js';
export { DEFAULT_ACCEPTED_ARGS, DEFAULT_PRIORITY, SETUP_ACTIONS } from './types.js';

export type {
  ActionArgs,
  ActionCallback,
  ActionName,
  AsyncDispatchOptions,
  AsyncFilterCallback,
  FilterArgs,
  FilterCallback,
  FilterName,
  FilterValue,
  HookCallback,
  HookRegistration,
  ThemeActions,
  ThemeFilters,
  ThemeInfo,
} from './types.js';
