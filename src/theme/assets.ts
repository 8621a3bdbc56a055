/**
 * Asset queue
 *
 * Collects style and script handles during `enqueue_assets` and orders them
 * so every asset comes after its dependencies. Loading or bundling the files
 * is left to the host.
 */

import { InvalidRegistrationError } from '../errors.js';

export type AssetKind = 'style' | 'script';

export interface Asset {
  handle: string;
  kind: AssetKind;
  src: string;
  deps: string[];
  version?: string;
}

export interface EnqueueOptions {
  deps?: string[];
  version?: string;
}

export class AssetQueue {
  private assets: Map<string, Asset> = new Map();

  enqueueStyle(handle: string, src: string, options: EnqueueOptions = {}): void {
    this.enqueue('style', handle, src, options);
  }

  enqueueScript(handle: string, src: string, options: EnqueueOptions = {}): void {
    this.enqueue('script', handle, src, options);
  }

  /** Returns false when the handle was not queued. */
  dequeue(handle: string): boolean {
    return this.assets.delete(handle);
  }

  has(handle: string): boolean {
    return this.assets.has(handle);
  }

  get size(): number {
    return this.assets.size;
  }

  /**
   * Queued assets, dependencies first. Assets without an ordering constraint
   * keep their enqueue order.
   *
   * @throws InvalidRegistrationError on an unknown dependency or a cycle.
   */
  ordered(kind?: AssetKind): Asset[] {
    const result: Asset[] = [];
    const done = new Set<string>();
    const visiting: string[] = [];

    const visit = (asset: Asset): void => {
      if (done.has(asset.handle)) return;
      if (visiting.includes(asset.handle)) {
        const cycle = [...visiting.slice(visiting.indexOf(asset.handle)), asset.handle].join(' → ');
        throw new InvalidRegistrationError(`Asset dependency cycle: ${cycle}`, { handle: asset.handle });
      }

      visiting.push(asset.handle);
      for (const dep of asset.deps) {
        const target = this.assets.get(dep);
        if (!target) {
          throw new InvalidRegistrationError(`Asset "${asset.handle}" depends on "${dep}", which is not queued`, {
            handle: asset.handle,
            dependency: dep,
          });
        }
        visit(target);
      }
      visiting.pop();

      done.add(asset.handle);
      result.push(asset);
    };

    for (const asset of this.assets.values()) visit(asset);
    return kind === undefined ? result : result.filter((a) => a.kind === kind);
  }

  private enqueue(kind: AssetKind, handle: string, src: string, options: EnqueueOptions): void {
    if (handle.length === 0) {
      throw new InvalidRegistrationError('asset handle must not be empty');
    }
    // Re-enqueueing an existing handle is a no-op.
    if (this.assets.has(handle)) return;
    this.assets.set(handle, { handle, kind, src, deps: [...(options.deps ?? [])], version: options.version });
  }
}
