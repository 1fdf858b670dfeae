/**
 * gcm script - Write a shell script that launches a profile outside the UI
 */

import path from 'node:path';
import { loadConfig } from '../config/loader.js';
import { Launcher } from '../launcher/launcher.js';
import { Storage } from '../storage/storage.js';
import { takeOption } from './flag-utils.js';
import { CliUsageError } from './errors.js';

export function printScriptHelp(): void {
  console.log(`Usage: gcm script <profile-id> [options]

Write an executable shell script that sets the profile's environment,
changes to its working directory and runs the Gemini CLI.

Options:
  --output, -o <path>   Script path (default: ./launch-<profile-id>.sh)
  --config, -c <path>   Path to config file
  -h, --help            Show help
`);
}

/** Returns the path written. */
export function handleScriptCommand(args: string[], now: Date = new Date()): string {
  const output = takeOption(args, ['--output', '-o']);
  const configPath = takeOption(args, ['--config', '-c']);
  const [profileId, ...rest] = args;
  if (!profileId) throw new CliUsageError('Missing profile id. Usage: gcm script <profile-id>');
  if (rest.length > 0) throw new CliUsageError(`Unexpected argument '${rest[0] ?? ''}'.`);

  const config = loadConfig(configPath);
  const storage = new Storage(config.dataDir);
  const profile = storage.loadProfile(profileId);
  const launcher = new Launcher({ workspaceDir: config.workspaceDir, command: config.geminiCommand }, (id) =>
    storage.loadExtension(id)
  );

  const scriptPath = path.resolve(output ?? `launch-${profile.id}.sh`);
  launcher.createLaunchScript(profile, scriptPath, now);
  console.log(`Wrote ${scriptPath}`);
  return scriptPath;
}
