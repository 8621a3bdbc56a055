/**
 * CLI tests: commands run in-process through run() with a capturing sink.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { run, VERSION } from '../index.js';
import type { CliIO } from '../io.js';
import type { LogEntry } from '../../logging/logger.js';

const ANSI = /\x1b\[[0-9;]*m/g;

interface Captured extends CliIO {
  stdout: string[];
  stderr: string[];
  logs: LogEntry[];
  exitCode?: number;
}

function captureIO(): Captured {
  const io: Captured = {
    stdout: [],
    stderr: [],
    logs: [],
    out: (line) => io.stdout.push(line.replace(ANSI, '')),
    err: (line) => io.stderr.push(line.replace(ANSI, '')),
    setExitCode: (code) => {
      io.exitCode = code;
    },
    transports: () => [{ write: (entry) => io.logs.push(entry) }],
  };
  return io;
}

async function cli(...args: string[]): Promise<Captured> {
  const io = captureIO();
  await run(['node', 'themewright', ...args], io);
  return io;
}

describe('themewright CLI', () => {
  let dir: string;
  let child: string;
  let parent: string;
  let configFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'themewright-cli-'));
    child = path.join(dir, 'child');
    parent = path.join(dir, 'parent');
    fs.mkdirSync(child);
    fs.mkdirSync(parent);
    fs.writeFileSync(path.join(child, 'single.html'), '');
    fs.writeFileSync(path.join(child, 'index.html'), '');
    fs.writeFileSync(path.join(parent, 'single-post.html'), '');
    configFile = path.join(dir, 'themewright.config.json5');
    fs.writeFileSync(configFile, `{ roots: ['child', 'parent'] }`);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prints the version', async () => {
    const io = await cli('--version');
    expect(io.stdout).toEqual([VERSION]);
    expect(io.exitCode).toBe(0);
  });

  it('fails on an unknown command', async () => {
    const io = await cli('bogus');
    expect(io.exitCode).toBe(1);
    expect(io.stderr[0]).toBe("error: unknown command 'bogus'");
  });

  describe('candidates', () => {
    it('lists candidates most specific first', async () => {
      const io = await cli('-c', configFile, 'candidates', 'single', '-t', 'post', '-p', 'hello');
      expect(io.stdout).toEqual([
        ' 1  single-post-hello.html',
        ' 2  single-post.html',
        ' 3  single.html',
        ' 4  singular.html',
        ' 5  index.html',
      ]);
      expect(io.exitCode).toBeUndefined();
    });

    it('prints JSON with --json', async () => {
      const io = await cli('-c', configFile, 'candidates', 'page', '--path-slug', 'team', '--depth', '1', '--json');
      expect(io.stdout).toEqual(['["page-team.html","page-child.html","page.html","singular.html","index.html"]']);
    });

    it('rejects a negative depth', async () => {
      const io = await cli('-c', configFile, 'candidates', 'page', '-d', '-1');
      expect(io.exitCode).toBe(1);
      expect(io.stderr.join('\n')).toContain('depth must be a non-negative integer');
    });

    it('reports a missing config file', async () => {
      const missing = path.join(dir, 'nope.json5');
      const io = await cli('-c', missing, 'candidates', 'single');
      expect(io.stderr).toEqual([`themewright: Config file not found: ${missing}`]);
      expect(io.exitCode).toBe(1);
    });
  });

  describe('resolve', () => {
    it('finds the most specific template across roots', async () => {
      const io = await cli('-c', configFile, 'resolve', 'single', '-t', 'post');
      expect(io.stdout).toEqual([`${parent}/single-post.html`]);
    });

    it('marks a fallback', async () => {
      const io = await cli('-c', configFile, 'resolve', 'archive');
      expect(io.stdout).toEqual([`${child}/index.html (fallback)`]);
    });

    it('prints JSON with --json', async () => {
      const io = await cli('-c', configFile, 'resolve', 'single', '--json');
      expect(io.stdout).toEqual([JSON.stringify({ root: child, name: 'single.html', isFallback: false })]);
    });

    it('exits 1 when nothing is found', async () => {
      fs.rmSync(path.join(child, 'index.html'));
      const io = await cli('-c', configFile, 'resolve', 'search');
      expect(io.stderr).toEqual([`No template found for [search.html, index.html] in roots [${child}, ${parent}]`]);
      expect(io.exitCode).toBe(1);
    });

    it('reports a miss once, without a duplicate warning from the resolver', async () => {
      fs.rmSync(path.join(child, 'index.html'));
      fs.writeFileSync(configFile, `{ roots: ['child', 'parent'], logging: { level: 'debug' } }`);
      const io = await cli('-c', configFile, 'resolve', 'search');
      expect(io.stderr).toHaveLength(1);
      expect(io.logs).toEqual([]);
    });
  });

  describe('config', () => {
    it('shows the effective configuration', async () => {
      const io = await cli('-c', configFile, 'config', 'show');
      const shown: unknown = JSON.parse(io.stdout.join('\n'));
      expect(shown).toMatchObject({
        source: configFile,
        roots: [child, parent],
        fallback: 'index.html',
        cache: false,
        logging: { level: 'info' },
      });
    });

    it('validates a good file', async () => {
      const io = await cli('-c', configFile, 'config', 'validate');
      expect(io.stdout).toEqual([`✓ ${configFile} is valid`]);
    });

    it('reports an invalid file', async () => {
      fs.writeFileSync(configFile, `{ cache: 'yes' }`);
      const io = await cli('-c', configFile, 'config', 'validate');
      expect(io.stderr).toEqual([`✗ Invalid config in ${configFile}: cache: Expected boolean, received string`]);
      expect(io.exitCode).toBe(1);
    });
  });
});
