#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleListCommand, printListHelp } from './cli/list-command.js';
import { handleScriptCommand, printScriptHelp } from './cli/script-command.js';
import { handleUiCommand, printUiHelp } from './cli/ui-command.js';
import { CliUsageError } from './cli/errors.js';
import { takeSwitch } from './cli/flag-utils.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  // Bare `gcm` and `gcm --config <path>` open the UI.
  const command = firstArg === undefined || firstArg.startsWith('-') ? 'ui' : args.shift();

  // Check for command-specific help
  const showHelp = takeSwitch(args, ['--help', '-h']);

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'ui':
        if (showHelp) {
          printUiHelp();
        } else {
          await handleUiCommand(args);
        }
        break;

      case 'list':
        if (showHelp) {
          printListHelp();
        } else {
          handleListCommand(args);
        }
        break;

      case 'script':
        if (showHelp) {
          printScriptHelp();
        } else {
          handleScriptCommand(args);
        }
        break;

      default:
        printHelp(`Unknown command '${command ?? ''}'.`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
