import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { FileNotFoundError, InvalidRecordError } from '../../src/cli/errors.js';
import { importExtension, readExtensionSource } from '../../src/storage/importer.js';
import { Storage } from '../../src/storage/storage.js';
import { FIXED_NOW, makeTempDir } from '../fixtures.js';

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir('import');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeExtensionDir(name: string, manifest: Record<string, unknown>, context?: string): string {
  const dir = path.join(tempDir, name);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'gemini-extension.json'), JSON.stringify(manifest), 'utf-8');
  if (context !== undefined) fs.writeFileSync(path.join(dir, 'GEMINI.md'), context, 'utf-8');
  return dir;
}

describe('readExtensionSource', () => {
  it('reads a directory with a manifest and context file', () => {
    const dir = writeExtensionDir(
      'db-tools',
      { name: 'DB Tools', version: '2.1.0', mcpServers: { db: { command: 'db-mcp', args: ['--ro'] } } },
      '# DB tools\n'
    );
    const extension = readExtensionSource(dir, FIXED_NOW);
    expect(extension.id).toBe('db-tools');
    expect(extension.version).toBe('2.1.0');
    expect(extension.mcpServers).toEqual({ db: { command: 'db-mcp', args: ['--ro'] } });
    expect(extension.contextFileName).toBe('GEMINI.md');
    expect(extension.contextContent).toBe('# DB tools\n');
    expect(extension.metadata).toEqual({ importedAt: FIXED_NOW.toISOString(), sourcePath: dir, tags: [] });
  });

  it('reads a manifest file directly and defaults the version', () => {
    const dir = writeExtensionDir('plain', { name: 'Plain Ext' });
    const extension = readExtensionSource(path.join(dir, 'gemini-extension.json'), FIXED_NOW);
    expect(extension.id).toBe('plain-ext');
    expect(extension.version).toBe('1.0.0');
    expect(extension.contextContent).toBeUndefined();
  });

  it('turns a markdown file into a context-only extension', () => {
    const file = path.join(tempDir, 'Style Guide.md');
    fs.writeFileSync(file, 'Use tabs.\n', 'utf-8');
    const extension = readExtensionSource(file, FIXED_NOW);
    expect(extension.id).toBe('style-guide');
    expect(extension.name).toBe('Style Guide');
    expect(extension.contextFileName).toBe('Style Guide.md');
    expect(extension.contextContent).toBe('Use tabs.\n');
  });

  it('rejects missing paths and directories without a manifest', () => {
    expect(() => readExtensionSource(path.join(tempDir, 'nope'))).toThrow(FileNotFoundError);
    const empty = path.join(tempDir, 'empty');
    fs.mkdirSync(empty);
    expect(() => readExtensionSource(empty)).toThrow(`${empty}: missing gemini-extension.json`);
  });

  it('refuses a context file name that leaves the extension directory', () => {
    fs.writeFileSync(path.join(tempDir, 'secret.txt'), 'test-secret', 'utf-8');
    const dir = writeExtensionDir('sneaky', { name: 'Sneaky', contextFileName: '../secret.txt' });
    const manifestPath = path.join(dir, 'gemini-extension.json');
    expect(() => readExtensionSource(dir, FIXED_NOW)).toThrow(
      `${manifestPath}: contextFileName: must be a plain file name`
    );
  });

  it('rejects unsupported file types', () => {
    const file = path.join(tempDir, 'notes.txt');
    fs.writeFileSync(file, 'hi', 'utf-8');
    expect(() => readExtensionSource(file)).toThrow(InvalidRecordError);
  });
});

describe('importExtension', () => {
  it('stores the extension and refuses a second import', () => {
    const storage = new Storage(path.join(tempDir, 'data'));
    storage.init();
    const dir = writeExtensionDir('search', { name: 'Search' });

    const imported = importExtension(storage, dir, FIXED_NOW);
    expect(storage.loadExtension('search')).toEqual(imported);
    expect(() => importExtension(storage, dir, FIXED_NOW)).toThrow('Extension already exists: search');
  });
});
