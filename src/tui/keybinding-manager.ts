import { SharedSettings } from '../settings/shared-settings.js';
import { chordsFor } from '../settings/schema.js';
import { formatKeyEvent, type KeyEvent } from './key-utils.js';

export type HelpPair = readonly [name: string, label: string];

/**
 * Answers "does this key press trigger logical action X?" against the user's settings.
 */
export class KeybindingManager {
  constructor(private readonly settings: SharedSettings = new SharedSettings()) {}

  getKeysForAction(name: string): string[] {
    return this.settings.read((s) => [...chordsFor(s.keybindings, name)]);
  }

  matches(event: KeyEvent, name: string): boolean {
    const chord = formatKeyEvent(event);
    return this.settings.read((s) => chordsFor(s.keybindings, name).includes(chord));
  }

  /** `Up/k: up | q/Ctrl+c: quit`; actions without chords are left out. */
  buildHelpText(pairs: readonly HelpPair[]): string {
    return pairs
      .map(([name, label]) => {
        const keys = this.getKeysForAction(name);
        return keys.length > 0 ? `${keys.join('/')}: ${label}` : null;
      })
      .filter((item): item is string => item !== null)
      .join(' | ');
  }
}
