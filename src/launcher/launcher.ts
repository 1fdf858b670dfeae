import { spawnSync, type SpawnSyncOptions, type SpawnSyncReturns } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { expandHome } from '../config/loader.js';
import { logger } from '../logging/logger.js';
import { isPlainFileName, type Extension, type Profile } from '../schema/index.js';

export const EXTENSION_MANIFEST = 'gemini-extension.json';
export const DEFAULT_CONTEXT_FILE = 'GEMINI.md';

export type SpawnFn = (command: string, args: string[], options: SpawnSyncOptions) => SpawnSyncReturns<string | Buffer>;

export interface LauncherOptions {
  workspaceDir: string;
  command: string;
  args?: string[];
  spawn?: SpawnFn;
  env?: NodeJS.ProcessEnv;
}

/** What the app needs from a launcher; tests substitute their own. */
export interface ProfileLauncher {
  launchWithProfile(profile: Profile): void;
}

/**
 * Expand `$VAR` and `${VAR}` from `env`; unknown variables stay as written.
 */
export function expandEnvValue(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g, (match, braced, bare) => {
    const name = typeof braced === 'string' ? braced : String(bare);
    return env[name] ?? match;
  });
}

export function buildLaunchEnv(profile: Profile, base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  for (const [name, value] of Object.entries(profile.environmentVariables)) {
    env[name] = expandEnvValue(value, base);
  }
  env.GEMINI_PROFILE = profile.name;
  env.GEMINI_PROFILE_ID = profile.id;
  return env;
}

export function extensionManifest(extension: Extension): Record<string, unknown> {
  return {
    name: extension.name,
    version: extension.version,
    ...(extension.description ? { description: extension.description } : {}),
    mcpServers: extension.mcpServers,
    ...(extension.contextFileName ? { contextFileName: extension.contextFileName } : {}),
  };
}

function quoteShell(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Installs a profile's extensions into its workspace and runs the CLI with the terminal handed over.
 */
export class Launcher implements ProfileLauncher {
  private readonly spawn: SpawnFn;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly options: LauncherOptions,
    private readonly resolveExtension: (id: string) => Extension
  ) {
    this.spawn = options.spawn ?? spawnSync;
    this.env = options.env ?? process.env;
  }

  profileWorkspace(profile: Profile): string {
    return path.join(this.options.workspaceDir, profile.id);
  }

  extensionsDir(profile: Profile): string {
    return path.join(this.profileWorkspace(profile), '.gemini', 'extensions');
  }

  /** Write every extension of the profile into the workspace. Returns the installed ids. */
  prepareWorkspace(profile: Profile): string[] {
    const dir = this.extensionsDir(profile);
    fs.mkdirSync(dir, { recursive: true });

    if (profile.launchConfig.cleanLaunch) {
      const keep = new Set(profile.launchConfig.preserveExtensions);
      for (const entry of fs.readdirSync(dir)) {
        if (!keep.has(entry)) fs.rmSync(path.join(dir, entry), { recursive: true, force: true });
      }
    }

    const installed: string[] = [];
    for (const id of profile.extensionIds) {
      const extension = this.resolveExtension(id);
      const target = path.join(dir, extension.id);
      fs.mkdirSync(target, { recursive: true });
      fs.writeFileSync(
        path.join(target, EXTENSION_MANIFEST),
        JSON.stringify(extensionManifest(extension), null, 2) + '\n',
        'utf-8'
      );
      if (extension.contextContent !== undefined) {
        const fileName = extension.contextFileName ?? DEFAULT_CONTEXT_FILE;
        if (!isPlainFileName(fileName)) {
          throw new Error(`Invalid context file name for extension ${extension.id}: ${JSON.stringify(fileName)}`);
        }
        fs.writeFileSync(path.join(target, fileName), extension.contextContent, 'utf-8');
      }
      installed.push(extension.id);
    }
    return installed;
  }

  workingDirectory(profile: Profile): string {
    if (!profile.workingDirectory) return this.profileWorkspace(profile);
    const dir = path.resolve(expandHome(profile.workingDirectory));
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  /** Blocks until the CLI exits. */
  launchWithProfile(profile: Profile): void {
    const installed = this.prepareWorkspace(profile);
    const cwd = this.workingDirectory(profile);
    logger.info('launching', { profile: profile.id, command: this.options.command, cwd, extensions: installed.length });

    try {
      const result = this.spawn(this.options.command, this.options.args ?? [], {
        cwd,
        env: buildLaunchEnv(profile, this.env),
        stdio: 'inherit',
      });
      if (result.error) {
        throw new Error(`Failed to start ${this.options.command}: ${result.error.message}`);
      }
      if (result.status !== 0) {
        const reason = result.signal ? `signal ${result.signal}` : `code ${String(result.status)}`;
        throw new Error(`${this.options.command} exited with ${reason}`);
      }
    } finally {
      if (profile.launchConfig.cleanupOnExit) {
        fs.rmSync(this.extensionsDir(profile), { recursive: true, force: true });
      }
    }
  }

  createLaunchScript(profile: Profile, scriptPath: string, now: Date = new Date()): void {
    const lines = [
      '#!/bin/sh',
      `# Profile: ${profile.name}`,
      `# Generated: ${now.toISOString()}`,
      '',
    ];
    for (const [name, value] of Object.entries(profile.environmentVariables)) {
      lines.push(`export ${name}=${quoteShell(value)}`);
    }
    lines.push(`export GEMINI_PROFILE=${quoteShell(profile.name)}`);
    lines.push(`export GEMINI_PROFILE_ID=${quoteShell(profile.id)}`);
    lines.push(`cd ${quoteShell(this.workingDirectory(profile))} || exit 1`);
    lines.push(`exec ${quoteShell(this.options.command)} "$@"`);
    fs.writeFileSync(scriptPath, lines.join('\n') + '\n', { encoding: 'utf-8', mode: 0o755 });
  }
}
