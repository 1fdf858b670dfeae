import fs from 'node:fs';
import path from 'node:path';
import { SettingsError, errorMessage } from '../cli/errors.js';
import { logger } from '../logging/logger.js';
import { parseKeySequence } from '../tui/key-utils.js';
import {
  UserSettingsSchema,
  defaultKeybindings,
  defaultSettings,
  type UserSettings,
} from './schema.js';

export const SETTINGS_FILE_NAME = 'settings.json';

/**
 * Reads and writes `settings.json`. The file is always rewritten whole.
 */
export class SettingsManager {
  constructor(readonly filePath: string) {}

  static inDataDir(dataDir: string): SettingsManager {
    return new SettingsManager(path.join(dataDir, SETTINGS_FILE_NAME));
  }

  /** A missing or unreadable file yields the defaults. */
  load(): UserSettings {
    if (!fs.existsSync(this.filePath)) return defaultSettings();
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = UserSettingsSchema.safeParse(raw);
      if (parsed.success) return this.normalizeKeybindings(parsed.data);
      logger.warn('settings file is invalid; using defaults', {
        path: this.filePath,
        issue: parsed.error.issues[0]?.message,
      });
    } catch (error) {
      logger.warn('settings file is unreadable; using defaults', {
        path: this.filePath,
        error: errorMessage(error),
      });
    }
    return defaultSettings();
  }

  /** Hand-edited chords (`ctrl+s`, `G`) are rewritten in canonical form; unparsable ones are dropped. */
  private normalizeKeybindings(settings: UserSettings): UserSettings {
    const normalizeTable = (table: Record<string, string[]>): Record<string, string[]> => {
      const out: Record<string, string[]> = {};
      for (const [name, chords] of Object.entries(table)) {
        out[name] = chords.flatMap((chord) => {
          const sequence = parseKeySequence(chord);
          if (sequence) return [sequence.join(' ')];
          logger.warn('ignoring invalid key chord in settings', { path: this.filePath, action: name, chord });
          return [];
        });
      }
      return out;
    };
    return {
      ...settings,
      keybindings: {
        navigation: normalizeTable(settings.keybindings.navigation),
        actions: normalizeTable(settings.keybindings.actions),
      },
    };
  }

  save(settings: UserSettings): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  }
}

export function withTheme(settings: UserSettings, theme: string): UserSettings {
  return { ...settings, theme };
}

/**
 * Replace the chords of one logical action. Chords are stored in canonical form.
 */
export function withKeybinding(settings: UserSettings, name: string, chords: readonly string[]): UserSettings {
  const normalized: string[] = [];
  for (const chord of chords) {
    const sequence = parseKeySequence(chord);
    if (!sequence) throw new SettingsError(`Invalid key chord for ${name}: ${chord}`);
    normalized.push(sequence.join(' '));
  }

  const { navigation, actions } = settings.keybindings;
  if (Object.hasOwn(navigation, name)) {
    return {
      ...settings,
      keybindings: { navigation: { ...navigation, [name]: normalized }, actions },
    };
  }
  if (Object.hasOwn(actions, name)) {
    return {
      ...settings,
      keybindings: { navigation, actions: { ...actions, [name]: normalized } },
    };
  }
  throw new SettingsError(`Unknown keybinding action: ${name}`);
}

export function withDefaultKeybindings(settings: UserSettings): UserSettings {
  return { ...settings, keybindings: defaultKeybindings() };
}
