/**
 * gcm list - Print stored extensions and profiles
 */

import { loadConfig } from '../config/loader.js';
import { profileDisplayName, profileSummary, type Extension, type Profile } from '../schema/index.js';
import { Storage } from '../storage/storage.js';
import { takeOption, takeSwitch } from './flag-utils.js';
import { CliUsageError } from './errors.js';
import { boldText, cyanText, dimText, greenText } from './terminal.js';

export function printListHelp(): void {
  console.log(`Usage: gcm list [options]

Print every stored extension and profile.

Options:
  --config, -c <path>   Path to config file
  --json                Output as JSON
  -h, --help            Show help
`);
}

export function formatListing(extensions: readonly Extension[], profiles: readonly Profile[]): string {
  const lines: string[] = [boldText(`Extensions (${extensions.length})`)];
  if (extensions.length === 0) lines.push(dimText('  none'));
  for (const ext of extensions) {
    const servers = Object.keys(ext.mcpServers).length;
    lines.push(`  ${cyanText(ext.id)}  ${ext.name} v${ext.version}  ${dimText(`${servers} server${servers === 1 ? '' : 's'}`)}`);
  }

  lines.push('', boldText(`Profiles (${profiles.length})`));
  if (profiles.length === 0) lines.push(dimText('  none'));
  for (const profile of profiles) {
    const marker = profile.metadata.isDefault ? ` ${greenText('(default)')}` : '';
    lines.push(`  ${cyanText(profile.id)}  ${profileDisplayName(profile)}${marker}  ${dimText(profileSummary(profile))}`);
  }
  return lines.join('\n');
}

export function handleListCommand(args: string[]): void {
  const json = takeSwitch(args, ['--json']);
  const configPath = takeOption(args, ['--config', '-c']);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0] ?? ''}'.`);
  }

  const config = loadConfig(configPath);
  const storage = new Storage(config.dataDir);
  const extensions = storage.listExtensions();
  const profiles = storage.listProfiles();

  if (json) {
    console.log(JSON.stringify({ extensions, profiles }, null, 2));
    return;
  }
  console.log(formatListing(extensions, profiles));
}
