import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { SpawnSyncReturns } from 'node:child_process';
import { Launcher, buildLaunchEnv, expandEnvValue, type SpawnFn } from '../../src/launcher/launcher.js';
import type { Extension } from '../../src/schema/index.js';
import { makeExtension, makeProfile, makeTempDir } from '../fixtures.js';

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir('launch');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function result(status: number | null, overrides: Partial<SpawnSyncReturns<string | Buffer>> = {}): SpawnSyncReturns<string | Buffer> {
  return { pid: 1, output: [], stdout: '', stderr: '', status, signal: null, ...overrides };
}

function makeLauncher(spawn: SpawnFn, extensions: Extension[] = []): Launcher {
  const byId = new Map(extensions.map((e) => [e.id, e]));
  return new Launcher(
    { workspaceDir: path.join(tempDir, 'ws'), command: 'gemini', spawn, env: { HOME: '/home/tester', TOKEN: 'test-secret' } },
    (id) => {
      const found = byId.get(id);
      if (!found) throw new Error(`Extension not found: ${id}`);
      return found;
    }
  );
}

describe('expandEnvValue', () => {
  it('expands bare and braced variables and keeps unknown ones', () => {
    const env = { HOME: '/home/tester', USER: 'tester' };
    expect(expandEnvValue('$HOME/bin', env)).toBe('/home/tester/bin');
    expect(expandEnvValue('${USER}-x', env)).toBe('tester-x');
    expect(expandEnvValue('$MISSING and ${ALSO}', env)).toBe('$MISSING and ${ALSO}');
  });
});

describe('buildLaunchEnv', () => {
  it('layers profile variables over the base and tags the profile', () => {
    const profile = makeProfile('dev', { name: 'Dev Box', environmentVariables: { API_KEY: '$TOKEN', MODE: 'debug' } });
    const env = buildLaunchEnv(profile, { TOKEN: 'test-secret', MODE: 'prod' });
    expect(env).toEqual({
      TOKEN: 'test-secret',
      MODE: 'debug',
      API_KEY: 'test-secret',
      GEMINI_PROFILE: 'Dev Box',
      GEMINI_PROFILE_ID: 'dev',
    });
  });
});

describe('Launcher', () => {
  it('installs extensions and runs the command in the profile workspace', () => {
    const spawn = vi.fn<Parameters<SpawnFn>, ReturnType<SpawnFn>>(() => result(0));
    const ext = makeExtension('notes', { name: 'Notes', contextContent: 'Be brief.' });
    const profile = makeProfile('writer', {
      extensionIds: ['notes'],
      launchConfig: { cleanLaunch: false, cleanupOnExit: false, preserveExtensions: [] },
    });
    const launcher = makeLauncher(spawn, [ext]);

    launcher.launchWithProfile(profile);

    const workspace = path.join(tempDir, 'ws', 'writer');
    const installed = path.join(workspace, '.gemini', 'extensions', 'notes');
    expect(JSON.parse(fs.readFileSync(path.join(installed, 'gemini-extension.json'), 'utf-8'))).toEqual({
      name: 'Notes',
      version: '1.0.0',
      mcpServers: {},
    });
    expect(fs.readFileSync(path.join(installed, 'GEMINI.md'), 'utf-8')).toBe('Be brief.');

    expect(spawn).toHaveBeenCalledTimes(1);
    const call = spawn.mock.calls[0];
    expect(call?.[0]).toBe('gemini');
    expect(call?.[1]).toEqual([]);
    expect(call?.[2].cwd).toBe(workspace);
    expect(call?.[2].stdio).toBe('inherit');
    expect(call?.[2].env?.GEMINI_PROFILE_ID).toBe('writer');
  });

  it('removes installed extensions after exit when cleanupOnExit is set', () => {
    const launcher = makeLauncher(() => result(0), [makeExtension('a')]);
    const profile = makeProfile('tidy', { extensionIds: ['a'] });
    launcher.launchWithProfile(profile);
    expect(fs.existsSync(launcher.extensionsDir(profile))).toBe(false);
  });

  it('clears stale extensions on a clean launch except preserved ones', () => {
    const launcher = makeLauncher(() => result(0), [makeExtension('fresh')]);
    const profile = makeProfile('clean', {
      extensionIds: ['fresh'],
      launchConfig: { cleanLaunch: true, cleanupOnExit: false, preserveExtensions: ['keep'] },
    });
    const dir = launcher.extensionsDir(profile);
    fs.mkdirSync(path.join(dir, 'stale'), { recursive: true });
    fs.mkdirSync(path.join(dir, 'keep'), { recursive: true });

    expect(launcher.prepareWorkspace(profile)).toEqual(['fresh']);
    expect(fs.readdirSync(dir).sort()).toEqual(['fresh', 'keep']);
  });

  it('creates a custom working directory', () => {
    const target = path.join(tempDir, 'projects', 'site');
    const spawn = vi.fn<Parameters<SpawnFn>, ReturnType<SpawnFn>>(() => result(0));
    makeLauncher(spawn).launchWithProfile(makeProfile('site', { workingDirectory: target }));
    expect(fs.existsSync(target)).toBe(true);
    expect(spawn.mock.calls[0]?.[2].cwd).toBe(target);
  });

  it('reports spawn failures and non-zero exits', () => {
    const missing = makeLauncher(() => result(null, { error: new Error('spawn gemini ENOENT') }));
    expect(() => missing.launchWithProfile(makeProfile('p'))).toThrow('Failed to start gemini: spawn gemini ENOENT');

    const failing = makeLauncher(() => result(2));
    expect(() => failing.launchWithProfile(makeProfile('p'))).toThrow('gemini exited with code 2');

    const killed = makeLauncher(() => result(null, { signal: 'SIGTERM' }));
    expect(() => killed.launchWithProfile(makeProfile('p'))).toThrow('gemini exited with signal SIGTERM');
  });

  it('cleans up even when the command fails', () => {
    const launcher = makeLauncher(() => result(1), [makeExtension('a')]);
    const profile = makeProfile('oops', { extensionIds: ['a'] });
    expect(() => launcher.launchWithProfile(profile)).toThrow();
    expect(fs.existsSync(launcher.extensionsDir(profile))).toBe(false);
  });

  it('refuses to write a context file outside the extension directory', () => {
    const spawn = vi.fn<Parameters<SpawnFn>, ReturnType<SpawnFn>>(() => result(0));
    const ext = makeExtension('evil', { contextFileName: '../../../../../outside.md', contextContent: 'x' });
    const launcher = makeLauncher(spawn, [ext]);

    expect(() => launcher.launchWithProfile(makeProfile('p', { extensionIds: ['evil'] }))).toThrow(
      'Invalid context file name for extension evil: "../../../../../outside.md"'
    );
    expect(fs.existsSync(path.join(tempDir, 'outside.md'))).toBe(false);
    expect(spawn).not.toHaveBeenCalled();
  });

  it('writes an executable launch script', () => {
    const launcher = makeLauncher(() => result(0));
    const scriptPath = path.join(tempDir, 'run.sh');
    launcher.createLaunchScript(
      makeProfile('dev', { name: "Dev's", environmentVariables: { MODE: 'debug' } }),
      scriptPath,
      new Date('2026-03-01T00:00:00.000Z')
    );
    const lines = fs.readFileSync(scriptPath, 'utf-8').split('\n');
    expect(lines).toEqual([
      '#!/bin/sh',
      "# Profile: Dev's",
      '# Generated: 2026-03-01T00:00:00.000Z',
      '',
      "export MODE='debug'",
      `export GEMINI_PROFILE='Dev'"'"'s'`,
      "export GEMINI_PROFILE_ID='dev'",
      `cd '${path.join(tempDir, 'ws', 'dev')}' || exit 1`,
      `exec 'gemini' "$@"`,
      '',
    ]);
    expect(fs.statSync(scriptPath).mode & 0o111).not.toBe(0);
  });
});
