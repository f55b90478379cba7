import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { main } from './index.js';
import { stripAnsi } from './render.js';

const schema = {
  type: 'object',
  properties: {
    host: { type: 'string', description: 'Server host', default: 'localhost' },
    port: { type: 'integer', default: 8080 },
  },
};

describe('confsmith CLI', () => {
  let dir: string;
  let schemaPath: string;
  let stdoutChunks: string[];
  let stderrChunks: string[];
  let errorChunks: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'confsmith-cli-'));
    schemaPath = path.join(dir, 'schema.json');
    await writeFile(schemaPath, JSON.stringify(schema), 'utf8');

    stdoutChunks = [];
    stderrChunks = [];
    errorChunks = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdoutChunks.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderrChunks.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'error').mockImplementation((msg?: unknown) => {
      if (msg !== undefined) errorChunks.push(stripAnsi(String(msg)));
    });
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`EXIT:${code ?? 0}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(text: string): Promise<string> {
    const file = path.join(dir, 'app.yaml');
    await writeFile(file, text, 'utf8');
    return file;
  }

  describe('defaults', () => {
    it('prints the default config as YAML', async () => {
      await main(['node', 'confsmith', 'defaults', '--schema', schemaPath]);
      expect(stdoutChunks.join('')).toBe('host: localhost\nport: 8080\n');
    });

    it('prints JSON with the requested indent', async () => {
      await main(['node', 'confsmith', 'defaults', '-s', schemaPath, '-f', 'json']);
      await main([
        'node',
        'confsmith',
        'defaults',
        '-s',
        schemaPath,
        '-f',
        'json',
        '--indent',
        '2',
      ]);

      expect(stdoutChunks).toEqual([
        '{\n    "host": "localhost",\n    "port": 8080\n}\n',
        '{\n  "host": "localhost",\n  "port": 8080\n}\n',
      ]);
    });

    it('writes descriptions as comments', async () => {
      await main([
        'node',
        'confsmith',
        'defaults',
        '--schema',
        schemaPath,
        '--format',
        'yaml-with-comments',
      ]);
      expect(stdoutChunks.join('')).toContain('# Server host\nhost: localhost\n');
    });

    it('writes to --out instead of stdout', async () => {
      const out = path.join(dir, 'defaults.yaml');
      await main(['node', 'confsmith', 'defaults', '--schema', schemaPath, '--out', out]);

      expect(await readFile(out, 'utf8')).toBe('host: localhost\nport: 8080\n');
      expect(stdoutChunks).toEqual([]);
    });

    it('logs effective options with --verbose', async () => {
      await main(['node', 'confsmith', '--verbose', 'defaults', '--schema', schemaPath]);

      expect(stderrChunks).toEqual([
        '[confsmith] effective options: {"validateFormats":true,"indent":2,"includeComments":false,"injectDefaults":false}\n',
        '[confsmith] dialect: 2020-12\n',
      ]);
    });

    it('suggests a close format name and exits with the config error code', async () => {
      await expect(
        main(['node', 'confsmith', 'defaults', '--schema', schemaPath, '--format', 'yml'])
      ).rejects.toThrow('EXIT:50');

      const stderr = errorChunks.join('\n');
      expect(stderr).toContain(
        'Error E300: Unknown format "yml"; expected one of json, yaml, yaml-with-comments'
      );
      expect(stderr).toContain('Workaround: Did you mean --format yaml?');
    });

    it('fails when the schema file is missing', async () => {
      const missing = path.join(dir, 'nope.json');
      await expect(
        main(['node', 'confsmith', 'defaults', '--schema', missing])
      ).rejects.toThrow('EXIT:50');
      expect(errorChunks.join('\n')).toContain(`Schema file not found: ${missing}`);
    });

    it('requires --schema', async () => {
      await expect(main(['node', 'confsmith', 'defaults'])).rejects.toThrow('EXIT:50');
      expect(errorChunks.join('\n')).toContain('Missing --schema <file>');
    });
  });

  describe('validate', () => {
    it('reports a valid config', async () => {
      const config = await writeConfig('port: 9000\n');
      await main(['node', 'confsmith', 'validate', '--schema', schemaPath, '--config', config]);
      expect(stdoutChunks.join('')).toBe(`${config}: valid\n`);
    });

    it('prints the completed config', async () => {
      const config = await writeConfig('port: 9000\n');
      await main([
        'node',
        'confsmith',
        'validate',
        '-s',
        schemaPath,
        '-c',
        config,
        '--print',
      ]);
      expect(stdoutChunks.join('')).toBe('port: 9000\nhost: localhost\n');
    });

    it('prints JSON with --print-format json', async () => {
      const config = await writeConfig('port: 9000\n');
      await main([
        'node',
        'confsmith',
        'validate',
        '-s',
        schemaPath,
        '-c',
        config,
        '--print',
        '--print-format',
        'json',
      ]);
      expect(stdoutChunks.join('')).toBe('{\n    "port": 9000,\n    "host": "localhost"\n}\n');
    });

    it('lists failures and exits with the validation code', async () => {
      const config = await writeConfig('port: nope\n');

      await expect(
        main(['node', 'confsmith', 'validate', '-s', schemaPath, '-c', config])
      ).rejects.toThrow('EXIT:40');

      const [rendered] = errorChunks;
      expect(rendered?.split('\n')).toEqual([
        '❌ Error E200: Config validation failed at /port: must be integer',
        '📍 Location: /port',
        '  - /port: must be integer',
      ]);
    });

    it('exits with the parse code on broken YAML', async () => {
      const config = await writeConfig('port: [1\n');
      await expect(
        main(['node', 'confsmith', 'validate', '-s', schemaPath, '-c', config])
      ).rejects.toThrow('EXIT:60');
    });
  });
});
