/**
 * Theme - constructor-based setup over an injected hook registry.
 *
 * A theme subclass wires its callbacks in its constructor; setup() then fires
 * the lifecycle actions and freezes the registry, and render() resolves the
 * template for a request through the template filters.
 *
 *     class StarterTheme extends Theme {
 *       constructor(hooks: HookRegistry, resolver: TemplateResolver) {
 *         super({ info: { name: 'starter' }, hooks, resolver });
 *         hooks.addAction('register_widgets', (areas) => {
 *           areas.register({ id: 'sidebar', name: 'Sidebar' });
 *         });
 *         hooks.addAction('enqueue_assets', (queue) => {
 *           queue.enqueueStyle('starter', 'style.css');
 *         });
 *       }
 *     }
 *
 * The registry and the resolver share no state; the theme only passes values
 * between them.
 */

import { ThemeStateError } from '../errors.js';
import type { HookRegistry } from '../hooks/registry.js';
import type { ThemeInfo } from '../hooks/types.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { TemplateResolver } from '../templates/resolver.js';
import type { ContentDescriptor, ResolvedTemplate } from '../templates/types.js';
import { AssetQueue } from './assets.js';
import { WidgetAreaRegistry } from './widgets.js';

export interface ThemeOptions {
  info: ThemeInfo;
  hooks: HookRegistry;
  resolver: TemplateResolver;
  /** Freeze the registry once setup() has run. Default true. */
  freezeAfterSetup?: boolean;
  logger?: Logger;
}

export class Theme {
  readonly info: ThemeInfo;
  readonly hooks: HookRegistry;
  readonly resolver: TemplateResolver;
  readonly widgets = new WidgetAreaRegistry();
  readonly assets = new AssetQueue();
  protected readonly log: Logger;
  private readonly freezeAfterSetup: boolean;
  private ready = false;

  constructor(options: ThemeOptions) {
    this.info = { ...options.info };
    this.hooks = options.hooks;
    this.resolver = options.resolver;
    this.freezeAfterSetup = options.freezeAfterSetup ?? true;
    this.log = options.logger ?? rootLogger.child(`theme:${options.info.name}`);
  }

  get isReady(): boolean {
    return this.ready;
  }

  /**
   * Fire after_setup, init, register_widgets and enqueue_assets in order.
   *
   * @throws ThemeStateError when called twice.
   */
  setup(): void {
    if (this.ready) {
      throw new ThemeStateError(`Theme "${this.info.name}" is already set up`);
    }

    try {
      this.hooks.dispatchAction('after_setup', this.info);
      this.hooks.dispatchAction('init');
      this.hooks.dispatchAction('register_widgets', this.widgets);
      this.hooks.dispatchAction('enqueue_assets', this.assets);
    } catch (err: unknown) {
      this.log.error('theme setup failed', err);
      throw err;
    }

    if (this.freezeAfterSetup) this.hooks.freeze();
    this.ready = true;
    this.log.info('theme ready', {
      callbacks: this.hooks.size,
      widgetAreas: this.widgets.list().length,
      assets: this.assets.size,
    });
  }

  /**
   * Resolve the template for a request:
   * template_candidates → resolver → template_include → before_template_render.
   */
  async render(descriptor: ContentDescriptor): Promise<ResolvedTemplate> {
    this.assertReady('render');

    try {
      const candidates = this.hooks.applyFilter(
        'template_candidates',
        this.resolver.candidates(descriptor),
        descriptor
      );
      const resolved = await this.resolver.resolveFrom(candidates);
      const template = this.hooks.applyFilter('template_include', resolved, descriptor);
      this.hooks.dispatchAction('before_template_render', template, descriptor);
      return template;
    } catch (err: unknown) {
      this.log.error('render failed', err, { type: descriptor.type });
      throw err;
    }
  }

  /** `body_class` filter over the descriptor's default classes. */
  bodyClasses(descriptor: ContentDescriptor): string[] {
    return this.hooks.applyFilter('body_class', defaultBodyClasses(descriptor), descriptor);
  }

  private assertReady(operation: string): void {
    if (!this.ready) {
      throw new ThemeStateError(`Cannot ${operation} before setup() on theme "${this.info.name}"`);
    }
  }
}

export function defaultBodyClasses(descriptor: ContentDescriptor): string[] {
  const classes = [descriptor.type];
  if (descriptor.typeSlug) classes.push(`type-${descriptor.typeSlug}`);
  if (descriptor.pathSlug) classes.push(`${descriptor.type}-${descriptor.pathSlug}`);
  return classes;
}
