/**
 * Template sources
 *
 * FileSystemTemplateSource checks `<root>/<name>` on disk; MemoryTemplateSource
 * keeps a set of known pairs and is what tests and previews use.
 */

import { stat } from 'fs/promises';
import path from 'path';
import type { TemplateSource } from './types.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export class FileSystemTemplateSource implements TemplateSource {
  /**
   * True when `<root>/<name>` is a regular file. Missing paths are false;
   * any other I/O error (permissions, EIO) propagates.
   */
  async exists(root: string, name: string): Promise<boolean> {
    try {
      const info = await stat(path.join(root, name));
      return info.isFile();
    } catch (err: unknown) {
      const code = errorCode(err);
      if (code !== undefined && MISSING_CODES.has(code)) return false;
      throw err;
    }
  }
}

export class MemoryTemplateSource implements TemplateSource {
  private readonly entries = new Map<string, Set<string>>();

  constructor(templates: Record<string, readonly string[]> = {}) {
    for (const [root, names] of Object.entries(templates)) {
      for (const name of names) this.add(root, name);
    }
  }

  add(root: string, name: string): this {
    const names = this.entries.get(root) ?? new Set<string>();
    names.add(name);
    this.entries.set(root, names);
    return this;
  }

  remove(root: string, name: string): boolean {
    return this.entries.get(root)?.delete(name) ?? false;
  }

  exists(root: string, name: string): boolean {
    return this.entries.get(root)?.has(name) ?? false;
  }
}
