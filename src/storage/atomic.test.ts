import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { atomicWriteJson, atomicWriteText, readJson, readJsonWith, fileExists, isNotFound } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('creates file with correct content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      const data = { foo: 'bar', num: 42 };

      await atomicWriteJson(filePath, data);

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual(data);
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'test.json');
      await atomicWriteJson(filePath, { test: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ test: true });
    });

    it('uses 2-space indentation', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { a: 1 });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('{\n  "a": 1\n}');
    });

    it('overwrites existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { first: true });
      await atomicWriteJson(filePath, { second: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ second: true });
    });

    it('leaves no temp files behind', async () => {
      await atomicWriteJson(path.join(tempDir, 'test.json'), { a: 1 });

      expect(await fs.readdir(tempDir)).toEqual(['test.json']);
    });
  });

  describe('atomicWriteText', () => {
    it('writes the text verbatim', async () => {
      const filePath = path.join(tempDir, 'out.csv');
      await atomicWriteText(filePath, 'a,b\n1,2');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('a,b\n1,2');
    });

    it('reports the target path when the write fails', async () => {
      // A file where a directory is expected
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, '');

      await expect(atomicWriteText(path.join(blocker, 'out.csv'), 'x')).rejects.toThrow(
        `Atomic write failed for ${path.join(blocker, 'out.csv')}`
      );
    });
  });

  describe('readJson', () => {
    it('returns parsed content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{"foo":"bar"}');

      expect(await readJson(filePath)).toEqual({ foo: 'bar' });
    });

    it('throws for non-existent file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow('File not found');
    });

    it('throws for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'invalid.json');
      await fs.writeFile(filePath, 'not json');

      await expect(readJson(filePath)).rejects.toThrow('Invalid JSON');
    });

    it('handles arrays', async () => {
      const filePath = path.join(tempDir, 'array.json');
      await fs.writeFile(filePath, '[1, 2, 3]');

      expect(await readJson(filePath)).toEqual([1, 2, 3]);
    });
  });

  describe('readJsonWith', () => {
    const schema = z.object({ name: z.string(), count: z.number().default(0) });

    it('returns validated data with defaults applied', async () => {
      const filePath = path.join(tempDir, 'data.json');
      await fs.writeFile(filePath, '{"name":"pantry"}');

      expect(await readJsonWith(filePath, schema)).toEqual({ name: 'pantry', count: 0 });
    });

    it('names the failing field', async () => {
      const filePath = path.join(tempDir, 'data.json');
      await fs.writeFile(filePath, '{"name":5}');

      await expect(readJsonWith(filePath, schema)).rejects.toThrow(
        `Invalid contents in ${filePath}: name: Expected string, received number`
      );
    });
  });

  describe('fileExists', () => {
    it('returns true for existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
    });

    it('returns false for non-existent file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      expect(await fileExists(filePath)).toBe(false);
    });

    it('returns false for directories', async () => {
      expect(await fileExists(tempDir)).toBe(false);
    });
  });

  describe('isNotFound', () => {
    it('recognises ENOENT errors', async () => {
      const error = await fs.readFile(path.join(tempDir, 'missing')).catch((e: unknown) => e);
      expect(isNotFound(error)).toBe(true);
    });

    it('rejects other values', () => {
      expect(isNotFound(new Error('boom'))).toBe(false);
      expect(isNotFound('ENOENT')).toBe(false);
    });
  });
});
