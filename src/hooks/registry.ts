/**
 * Hook Registry
 *
 * Priority-ordered store of action and filter callbacks. Callbacks run in
 * ascending priority; equal priorities run in registration order. Actions
 * discard return values, filters thread a value through every callback.
 *
 * Usage:
 *   const hooks = new HookRegistry();
 *   hooks.addAction('init', () => { ... });
 *   hooks.addFilter('body_class', (classes) => [...classes, 'dark'], 20);
 *   hooks.dispatchAction('init');
 *   const classes = hooks.applyFilter('body_class', ['single'], descriptor);
 *   hooks.freeze();
 *
 * Failure semantics: a callback that throws halts the dispatch and the error
 * reaches the caller wrapped in CallbackFailureError. Callbacks that already
 * ran are not undone.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  CallbackFailureError,
  HookTimeoutError,
  InvalidRegistrationError,
  RegistryFrozenError,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import {
  DEFAULT_ACCEPTED_ARGS,
  DEFAULT_PRIORITY,
  type ActionArgs,
  type ActionCallback,
  type AsyncDispatchOptions,
  type AsyncFilterCallback,
  type FilterArgs,
  type FilterCallback,
  type FilterName,
  type FilterValue,
  type HookCallback,
  type HookRegistration,
} from './types.js';

const registrationSchema = z.object({
  hookName: z.string().min(1, 'hook name must be a non-empty string'),
  priority: z.number().int('priority must be an integer').safe('priority must be a safe integer'),
  acceptedArgs: z
    .number()
    .int('acceptedArgs must be an integer')
    .nonnegative('acceptedArgs must not be negative')
    .safe('acceptedArgs must be a safe integer'),
});

export interface HookRegistryOptions {
  logger?: Logger;
}

export class HookRegistry {
  private hooks = new Map<string, HookRegistration[]>();
  private sequence = 0;
  private frozen = false;
  private readonly stack: string[] = [];
  private readonly actionCounts = new Map<string, number>();
  private readonly log: Logger;

  constructor(options: HookRegistryOptions = {}) {
    this.log = options.logger ?? rootLogger.child('hooks');
  }

  // ── Registration ───────────────────────────────────────────────────────

  /**
   * Add a callback to a hook.
   *
   * @param acceptedArgs - How many dispatch arguments the callback receives.
   *   For filters the value being filtered counts as the first one.
   * @returns The registration id, usable with `removeById()`.
   * @throws InvalidRegistrationError when any argument is malformed.
   */
  register(
    hookName: string,
    callback: HookCallback,
    priority: number = DEFAULT_PRIORITY,
    acceptedArgs: number = DEFAULT_ACCEPTED_ARGS
  ): string {
    this.assertMutable('register');

    if (typeof callback !== 'function') {
      throw new InvalidRegistrationError('callback must be a function', { hookName });
    }
    const parsed = registrationSchema.safeParse({ hookName, priority, acceptedArgs });
    if (!parsed.success) {
      throw new InvalidRegistrationError(
        parsed.error.issues.map((issue) => issue.message).join('; '),
        { hookName, priority, acceptedArgs }
      );
    }

    const entry: HookRegistration = {
      id: randomUUID(),
      hookName,
      priority,
      acceptedArgs,
      sequence: this.sequence++,
      callback,
    };

    const list = this.hooks.get(hookName) ?? [];
    list.push(entry);
    list.sort(compareRegistrations);
    this.hooks.set(hookName, list);

    this.log.debug(`registered ${hookName}`, { id: entry.id, priority, acceptedArgs });
    return entry.id;
  }

  addAction<K extends string>(
    hookName: K,
    callback: ActionCallback<K>,
    priority: number = DEFAULT_PRIORITY,
    acceptedArgs: number = DEFAULT_ACCEPTED_ARGS
  ): string {
    return this.register(hookName, callback, priority, acceptedArgs);
  }

  addFilter<K extends string>(
    hookName: K,
    callback: FilterCallback<K> | AsyncFilterCallback<K>,
    priority: number = DEFAULT_PRIORITY,
    acceptedArgs: number = DEFAULT_ACCEPTED_ARGS
  ): string {
    return this.register(hookName, callback, priority, acceptedArgs);
  }

  /**
   * Remove the earliest registration matching name, priority and callback
   * identity.
   *
   * @returns false when nothing matched; the registry is then unchanged.
   */
  unregister(hookName: string, callback: HookCallback, priority: number = DEFAULT_PRIORITY): boolean {
    this.assertMutable('unregister');

    const list = this.hooks.get(hookName);
    if (!list) return false;

    const index = list.findIndex((h) => h.callback === callback && h.priority === priority);
    if (index === -1) return false;

    const [removed] = list.splice(index, 1);
    if (list.length === 0) this.hooks.delete(hookName);
    this.log.debug(`unregistered ${hookName}`, { id: removed?.id, priority });
    return true;
  }

  removeById(id: string): boolean {
    this.assertMutable('removeById');

    for (const [hookName, list] of this.hooks) {
      const index = list.findIndex((h) => h.id === id);
      if (index === -1) continue;
      list.splice(index, 1);
      if (list.length === 0) this.hooks.delete(hookName);
      return true;
    }
    return false;
  }

  /**
   * Remove every callback on a hook, or only those at `priority`.
   *
   * @returns The number of registrations removed.
   */
  removeAll(hookName: string, priority?: number): number {
    this.assertMutable('removeAll');

    const list = this.hooks.get(hookName);
    if (!list) return 0;

    const kept = priority === undefined ? [] : list.filter((h) => h.priority !== priority);
    const removed = list.length - kept.length;
    if (kept.length === 0) {
      this.hooks.delete(hookName);
    } else {
      this.hooks.set(hookName, kept);
    }
    return removed;
  }

  // ── Dispatch ───────────────────────────────────────────────────────────

  /** Run every callback on `hookName`. Unknown hooks are a no-op. */
  dispatchAction<K extends string>(hookName: K, ...args: ActionArgs<K>): void {
    this.countAction(hookName);
    this.stack.push(hookName);
    try {
      for (const entry of this.snapshot(hookName)) {
        this.invoke(entry, args);
      }
    } finally {
      this.stack.pop();
    }
  }

  /**
   * Thread `value` through every callback on `hookName` and return the
   * result. With no callbacks the input is returned unchanged.
   */
  applyFilter<K extends FilterName>(hookName: K, value: FilterValue<K>, ...args: FilterArgs<K>): FilterValue<K>;
  applyFilter(hookName: string, value: unknown, ...args: unknown[]): unknown;
  applyFilter(hookName: string, value: unknown, ...args: unknown[]): unknown {
    let current = value;
    this.stack.push(hookName);
    try {
      for (const entry of this.snapshot(hookName)) {
        current = this.invoke(entry, [current, ...args]);
      }
    } finally {
      this.stack.pop();
    }
    return current;
  }

  async dispatchActionAsync<K extends string>(
    hookName: K,
    args: ActionArgs<K>,
    options: AsyncDispatchOptions = {}
  ): Promise<void> {
    this.countAction(hookName);
    this.stack.push(hookName);
    try {
      for (const entry of this.snapshot(hookName)) {
        await this.invokeAsync(entry, args, options.timeoutMs);
      }
    } finally {
      this.stack.pop();
    }
  }

  applyFilterAsync<K extends FilterName>(
    hookName: K,
    value: FilterValue<K>,
    args: FilterArgs<K>,
    options?: AsyncDispatchOptions
  ): Promise<FilterValue<K>>;
  applyFilterAsync(
    hookName: string,
    value: unknown,
    args: readonly unknown[],
    options?: AsyncDispatchOptions
  ): Promise<unknown>;
  async applyFilterAsync(
    hookName: string,
    value: unknown,
    args: readonly unknown[],
    options: AsyncDispatchOptions = {}
  ): Promise<unknown> {
    let current = value;
    this.stack.push(hookName);
    try {
      for (const entry of this.snapshot(hookName)) {
        current = await this.invokeAsync(entry, [current, ...args], options.timeoutMs);
      }
    } finally {
      this.stack.pop();
    }
    return current;
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────

  /** Make the registry dispatch-only. There is no unfreeze. */
  freeze(): void {
    this.frozen = true;
    this.log.debug('registry frozen', { hooks: this.hooks.size, callbacks: this.size });
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  clear(): void {
    this.assertMutable('clear');
    this.hooks.clear();
    this.actionCounts.clear();
  }

  // ── Introspection ──────────────────────────────────────────────────────

  /**
   * Whether `hookName` has any callback, or the given callback at any
   * priority.
   */
  hasHook(hookName: string, callback?: HookCallback): boolean {
    const list = this.hooks.get(hookName);
    if (!list) return false;
    return callback === undefined ? list.length > 0 : list.some((h) => h.callback === callback);
  }

  /**
   * Registrations on `hookName` in dispatch order. Entries are copies;
   * changing them does not affect dispatch.
   */
  getCallbacks(hookName: string): HookRegistration[] {
    return this.snapshot(hookName).map((entry) => ({ ...entry }));
  }

  hookNames(): string[] {
    return Array.from(this.hooks.keys());
  }

  /** Total registrations across all hooks. */
  get size(): number {
    let total = 0;
    for (const list of this.hooks.values()) total += list.length;
    return total;
  }

  /** Innermost hook currently being dispatched. */
  currentHook(): string | undefined {
    return this.stack[this.stack.length - 1];
  }

  /** Whether `hookName` (or, without a name, any hook) is mid-dispatch. */
  isDispatching(hookName?: string): boolean {
    return hookName === undefined ? this.stack.length > 0 : this.stack.includes(hookName);
  }

  /** How many times the action has been dispatched. */
  didAction(hookName: string): number {
    return this.actionCounts.get(hookName) ?? 0;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private assertMutable(operation: string): void {
    if (this.frozen) throw new RegistryFrozenError(operation);
  }

  private snapshot(hookName: string): HookRegistration[] {
    return [...(this.hooks.get(hookName) ?? [])];
  }

  private countAction(hookName: string): void {
    this.actionCounts.set(hookName, this.didAction(hookName) + 1);
  }

  private invoke(entry: HookRegistration, args: readonly unknown[]): unknown {
    try {
      return Reflect.apply(entry.callback, undefined, args.slice(0, entry.acceptedArgs));
    } catch (err: unknown) {
      throw this.failure(entry, err);
    }
  }

  private async invokeAsync(entry: HookRegistration, args: readonly unknown[], timeoutMs?: number): Promise<unknown> {
    try {
      const run = async (): Promise<unknown> =>
        Reflect.apply(entry.callback, undefined, args.slice(0, entry.acceptedArgs));
      return timeoutMs === undefined ? await run() : await withTimeout(run, timeoutMs, entry);
    } catch (err: unknown) {
      throw this.failure(entry, err);
    }
  }

  private failure(entry: HookRegistration, err: unknown): CallbackFailureError {
    // A nested dispatch already wrapped its own failure.
    if (err instanceof CallbackFailureError) return err;

    const failure = new CallbackFailureError(entry.hookName, entry.id, entry.priority, err);
    this.log.warn(`callback on ${entry.hookName} failed`, err, { id: entry.id, priority: entry.priority });
    return failure;
  }
}

function compareRegistrations(a: HookRegistration, b: HookRegistration): number {
  return a.priority - b.priority || a.sequence - b.sequence;
}

/**
 * Rejects with HookTimeoutError if `fn` does not settle within `ms`.
 */
async function withTimeout<T>(fn: () => Promise<T>, ms: number, entry: HookRegistration): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new HookTimeoutError(entry.hookName, entry.id, ms));
    }, ms);

    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
