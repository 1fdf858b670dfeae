/**
 * gcm ui - Full-screen manager
 */

import path from 'node:path';
import terminalKit from 'terminal-kit';
import { loadConfig } from '../config/loader.js';
import { Launcher } from '../launcher/launcher.js';
import { closeLogger, initLogger, logger } from '../logging/logger.js';
import { SettingsManager } from '../settings/settings-manager.js';
import { SharedSettings } from '../settings/shared-settings.js';
import { Storage } from '../storage/storage.js';
import { App } from '../tui/app.js';
import { TerminalEventSource } from '../tui/event.js';
import { TerminalKitHandle } from '../tui/terminal.js';
import { CliUsageError } from './errors.js';
import { takeOption } from './flag-utils.js';

export function printUiHelp(): void {
  console.log(`Usage: gcm [ui] [options]

Open the full-screen extension and profile manager.

Options:
  --config, -c <path>   Path to config file
  -h, --help            Show help
`);
}

export async function handleUiCommand(args: string[]): Promise<void> {
  const configPath = takeOption(args, ['--config', '-c']);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0] ?? ''}'.`);
  }

  const config = loadConfig(configPath);
  initLogger(path.join(config.dataDir, 'logs'));
  logger.info('starting', { dataDir: config.dataDir });

  // Startup failures below abort before the terminal is taken over.
  const storage = new Storage(config.dataDir);
  storage.init();
  const settings = SharedSettings.load(SettingsManager.inDataDir(config.dataDir));

  const term = terminalKit.terminal;
  const launcher = new Launcher({ workspaceDir: config.workspaceDir, command: config.geminiCommand }, (id) =>
    storage.loadExtension(id)
  );
  const app = new App({
    config,
    storage,
    settings,
    terminal: new TerminalKitHandle(term),
    events: new TerminalEventSource(term, { tickRate: config.tickRate, frameRate: config.frameRate }),
    launcher,
  });

  try {
    await app.run();
  } finally {
    logger.info('stopped');
    closeLogger();
  }
}
