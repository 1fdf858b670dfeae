import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor()
    ? `${boldText('gcm')} ${dimText('Gemini CLI extension and profile manager')}`
    : 'gcm: Gemini CLI extension and profile manager';

  const lines = [
    title,
    '',
    'Usage: gcm [command] [options]',
    '',
    formatSection('Commands', [
      ['ui (default)', 'Open the full-screen manager'],
      ['list', 'Print stored extensions and profiles'],
      ['script <id>', 'Write a launch script for a profile'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--config, -c <path>', 'Path to config file'],
      ['--json', 'Output as JSON (list)'],
      ['--output, -o <path>', 'Script path (script)'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .gcm.json (walks up from cwd)'],
      ['Global config', '~/.config/gemini-cli-manager/config.json'],
      ['Key fields', 'dataDir, workspaceDir, geminiCommand, keymap'],
      ['Logging', '<dataDir>/logs/gcm.log, level from GCM_LOG_LEVEL'],
    ]),
    '',
    formatSection('Main keys', [
      ['1 / 2 / 3, Tab', 'Switch between Extensions, Profiles and Settings'],
      ['n / e / d / i', 'New, edit, delete, import'],
      ['Enter, Esc', 'Open details, go back'],
      ['l, *', 'Launch a profile, make it the default'],
      ['Ctrl+c, Ctrl+z', 'Quit, suspend'],
    ]),
    '',
    dimText('Run `gcm <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${boldText(name.padEnd(maxLen))}  ${dimText(desc)}`);
  return [boldText(title), ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
