import { logger } from '../logging/logger.js';
import { defaultSettings, type UserSettings } from './schema.js';
import {
  SettingsManager,
  withDefaultKeybindings,
  withKeybinding,
  withTheme,
} from './settings-manager.js';

/**
 * Process-wide user settings.
 *
 * Readers go through `read`, writers through `write`. A writer swaps in a complete new value
 * before it touches the disk.
 */
export class SharedSettings {
  private current: UserSettings;

  constructor(
    initial: UserSettings = defaultSettings(),
    private readonly manager: SettingsManager | null = null
  ) {
    this.current = initial;
  }

  static load(manager: SettingsManager): SharedSettings {
    return new SharedSettings(manager.load(), manager);
  }

  read<T>(fn: (settings: Readonly<UserSettings>) => T): T {
    return fn(this.current);
  }

  snapshot(): UserSettings {
    return structuredClone(this.current);
  }

  write(fn: (settings: UserSettings) => UserSettings): void {
    const next = fn(this.snapshot());
    this.current = next;
    this.persist(next);
  }

  updateTheme(theme: string): void {
    this.write((s) => withTheme(s, theme));
  }

  updateKeybinding(name: string, chords: readonly string[]): void {
    this.write((s) => withKeybinding(s, name, chords));
  }

  resetKeybindings(): void {
    this.write(withDefaultKeybindings);
  }

  private persist(settings: UserSettings): void {
    if (!this.manager) return;
    this.manager.save(settings);
    logger.debug('settings saved', { path: this.manager.filePath });
  }
}
