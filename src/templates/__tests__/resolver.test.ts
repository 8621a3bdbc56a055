import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';

import { TemplateResolver, formatTemplate } from '../resolver.js';
import { FileSystemTemplateSource, MemoryTemplateSource } from '../sources.js';
import type { RuleTable, TemplateSource } from '../types.js';
import { ConfigError, InvalidDescriptorError, TemplateNotFoundError } from '../../errors.js';
import { Logger } from '../../logging/logger.js';

const quiet = new Logger({ transports: [] });

const phpRules: RuleTable = {
  single: ['single-{type_slug}.php', 'single.php'],
};

describe('TemplateResolver', () => {
  describe('resolve', () => {
    it('prefers a more specific candidate in a lower root over a generic one in a higher root', async () => {
      const resolver = new TemplateResolver({
        roots: ['child', 'parent'],
        rules: phpRules,
        fallback: 'index.php',
        logger: quiet,
        source: new MemoryTemplateSource({
          child: ['single.php', 'index.php'],
          parent: ['single-post.php', 'single.php', 'index.php'],
        }),
      });

      await expect(resolver.resolve({ type: 'single', typeSlug: 'post' })).resolves.toEqual({
        root: 'parent',
        name: 'single-post.php',
        isFallback: false,
      });
    });

    it('checks every root for one candidate before moving to the next', async () => {
      const resolver = new TemplateResolver({
        roots: ['child', 'parent'],
        rules: phpRules,
        fallback: 'index.php',
        logger: quiet,
        source: new MemoryTemplateSource({ parent: ['single.php'] }),
      });

      expect(resolver.candidates({ type: 'single', typeSlug: 'post' })).toEqual([
        'single-post.php',
        'single.php',
        'index.php',
      ]);
      await expect(resolver.resolve({ type: 'single', typeSlug: 'post' })).resolves.toEqual({
        root: 'parent',
        name: 'single.php',
        isFallback: false,
      });
    });

    it('prefers the higher root for the same candidate', async () => {
      const resolver = new TemplateResolver({
        roots: ['child', 'parent'],
        logger: quiet,
        source: new MemoryTemplateSource({ child: ['single.html'], parent: ['single.html'] }),
      });

      const template = await resolver.resolve({ type: 'single', typeSlug: 'post' });
      expect(template.root).toBe('child');
      expect(template.name).toBe('single.html');
    });

    it('falls back when no candidate exists', async () => {
      const resolver = new TemplateResolver({
        roots: ['child', 'parent'],
        logger: quiet,
        source: new MemoryTemplateSource({ parent: ['index.html'] }),
      });

      await expect(resolver.resolve({ type: 'archive', typeSlug: 'book' })).resolves.toEqual({
        root: 'parent',
        name: 'index.html',
        isFallback: true,
      });
    });

    it('throws TemplateNotFoundError listing candidates and roots', async () => {
      const resolver = new TemplateResolver({
        roots: ['child', 'parent'],
        logger: quiet,
        source: new MemoryTemplateSource(),
      });

      const failure = await resolver.resolve({ type: 'search' }).then(
        () => undefined,
        (err: unknown) => err
      );

      expect(failure).toBeInstanceOf(TemplateNotFoundError);
      if (!(failure instanceof TemplateNotFoundError)) return;
      expect(failure.candidates).toEqual(['search.html', 'index.html']);
      expect(failure.roots).toEqual(['child', 'parent']);
      expect(failure.message).toBe('No template found for [search.html, index.html] in roots [child, parent]');
    });

    it('throws TemplateNotFoundError with no roots configured', async () => {
      const resolver = new TemplateResolver({ roots: [], logger: quiet, source: new MemoryTemplateSource() });
      await expect(resolver.resolve({ type: 'single' })).rejects.toThrow(TemplateNotFoundError);
    });

    it('accepts a synchronous or asynchronous source', async () => {
      const source: TemplateSource = {
        exists: async (root, name) => root === 'async' && name === 'home.html',
      };
      const resolver = new TemplateResolver({ roots: ['async'], source, logger: quiet });
      await expect(resolver.resolve({ type: 'home' })).resolves.toEqual({
        root: 'async',
        name: 'home.html',
        isFallback: false,
      });
    });

    it('propagates source errors', async () => {
      const source: TemplateSource = {
        exists: () => {
          throw new Error('EACCES');
        },
      };
      const resolver = new TemplateResolver({ roots: ['r'], source, logger: quiet });
      await expect(resolver.resolve({ type: 'home' })).rejects.toThrow('EACCES');
    });

    it('rejects a descriptor with an invalid depth before checking any root', async () => {
      const source = new MemoryTemplateSource({ theme: ['page-child.html', 'index.html'] });
      const exists = vi.spyOn(source, 'exists');
      const resolver = new TemplateResolver({ roots: ['theme'], source, logger: quiet });

      await expect(resolver.resolve({ type: 'page', depth: Number.NaN })).rejects.toThrow(InvalidDescriptorError);
      expect(exists).not.toHaveBeenCalled();
    });

    it('rejects an invalid rule table at construction', () => {
      expect(
        () =>
          new TemplateResolver({
            roots: [],
            source: new MemoryTemplateSource(),
            rules: { single: ['{nope}.html'] },
          })
      ).toThrow(ConfigError);
    });
  });

  describe('resolveFrom', () => {
    it('still tries the fallback when the list omits it', async () => {
      const resolver = new TemplateResolver({
        roots: ['theme'],
        logger: quiet,
        source: new MemoryTemplateSource({ theme: ['index.html'] }),
      });

      await expect(resolver.resolveFrom(['custom.html'])).resolves.toEqual({
        root: 'theme',
        name: 'index.html',
        isFallback: true,
      });
    });

    it('marks the fallback when it appears in the list', async () => {
      const resolver = new TemplateResolver({
        roots: ['theme'],
        logger: quiet,
        source: new MemoryTemplateSource({ theme: ['index.html'] }),
      });
      const template = await resolver.resolveFrom(['index.html', 'other.html']);
      expect(template.isFallback).toBe(true);
    });

    it('reports an empty candidate list', async () => {
      const resolver = new TemplateResolver({ roots: ['theme'], logger: quiet, source: new MemoryTemplateSource() });
      await expect(resolver.resolveFrom([])).rejects.toThrow('No template found for [] in roots [theme]');
    });
  });

  describe('roots and caching', () => {
    it('copies the roots it is given', () => {
      const roots = ['a'];
      const resolver = new TemplateResolver({ roots, source: new MemoryTemplateSource(), logger: quiet });
      roots.push('b');
      expect(resolver.getRoots()).toEqual(['a']);
    });

    it('checks the source on every resolve without a cache', async () => {
      const source = new MemoryTemplateSource({ theme: ['home.html'] });
      const exists = vi.spyOn(source, 'exists');
      const resolver = new TemplateResolver({ roots: ['theme'], source, logger: quiet });

      await resolver.resolve({ type: 'home' });
      await resolver.resolve({ type: 'home' });
      expect(exists).toHaveBeenCalledTimes(2);
    });

    it('reuses existence checks with the cache enabled', async () => {
      const source = new MemoryTemplateSource({ theme: ['home.html'] });
      const exists = vi.spyOn(source, 'exists');
      const resolver = new TemplateResolver({ roots: ['theme'], source, cache: true, logger: quiet });

      await resolver.resolve({ type: 'home' });
      await resolver.resolve({ type: 'home' });
      expect(exists).toHaveBeenCalledTimes(1);
    });

    it('discards cached checks when the roots change', async () => {
      const source = new MemoryTemplateSource({ parent: ['home.html'] });
      const resolver = new TemplateResolver({ roots: ['child', 'parent'], source, cache: true, logger: quiet });

      expect((await resolver.resolve({ type: 'home' })).root).toBe('parent');

      source.add('child', 'home.html');
      expect((await resolver.resolve({ type: 'home' })).root).toBe('parent');

      resolver.setRoots(['child', 'parent']);
      expect((await resolver.resolve({ type: 'home' })).root).toBe('child');
    });

    it('does not cache failed checks', async () => {
      let calls = 0;
      const source: TemplateSource = {
        exists: async () => {
          calls++;
          if (calls === 1) throw new Error('transient');
          return true;
        },
      };
      const resolver = new TemplateResolver({ roots: ['r'], source, cache: true, logger: quiet });

      await expect(resolver.resolve({ type: 'home' })).rejects.toThrow('transient');
      await expect(resolver.resolve({ type: 'home' })).resolves.toEqual({
        root: 'r',
        name: 'home.html',
        isFallback: false,
      });
    });
  });

  describe('formatTemplate', () => {
    it('joins root and name without doubling separators', () => {
      expect(formatTemplate({ root: '/themes/child/', name: 'page.html', isFallback: false })).toBe(
        '/themes/child/page.html'
      );
    });
  });
});

describe('FileSystemTemplateSource', () => {
  let dir: string;
  const source = new FileSystemTemplateSource();

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'themewright-'));
    mkdirSync(path.join(dir, 'parts'));
    writeFileSync(path.join(dir, 'single.html'), '<main></main>');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds regular files', async () => {
    await expect(source.exists(dir, 'single.html')).resolves.toBe(true);
  });

  it('treats missing files and directories as absent', async () => {
    await expect(source.exists(dir, 'page.html')).resolves.toBe(false);
    await expect(source.exists(dir, 'parts')).resolves.toBe(false);
    await expect(source.exists(path.join(dir, 'single.html'), 'nested.html')).resolves.toBe(false);
    await expect(source.exists(path.join(dir, 'missing-root'), 'single.html')).resolves.toBe(false);
  });

  it('resolves through the resolver across real directories', async () => {
    const child = path.join(dir, 'child');
    mkdirSync(child);
    writeFileSync(path.join(child, 'index.html'), '');

    const resolver = new TemplateResolver({ roots: [child, dir], source, logger: quiet });
    await expect(resolver.resolve({ type: 'single', typeSlug: 'post' })).resolves.toEqual({
      root: dir,
      name: 'single.html',
      isFallback: false,
    });
  });
});

describe('MemoryTemplateSource', () => {
  it('adds and removes templates', () => {
    const source = new MemoryTemplateSource().add('a', 'x.html').add('a', 'y.html');
    expect(source.exists('a', 'x.html')).toBe(true);
    expect(source.remove('a', 'x.html')).toBe(true);
    expect(source.remove('a', 'x.html')).toBe(false);
    expect(source.exists('a', 'x.html')).toBe(false);
    expect(source.exists('b', 'y.html')).toBe(false);
  });
});
