import type { Action } from './action.js';
import { formatKeyEvent, type KeyEvent } from './key-utils.js';

/** Keymap keys are canonical chords joined by a single space, e.g. `g g` or `Ctrl+c`. */
export type Keymap = Map<string, Action>;

export function sequenceKey(chords: readonly string[]): string {
  return chords.join(' ');
}

/**
 * Resolves key presses against single-key and multi-key bindings.
 *
 * Keys that miss as a single chord accumulate in a buffer until `clear()`, which the app
 * calls once per Tick; a sequence has to be completed within that window.
 */
export class KeyChordResolver {
  private buffer: string[] = [];

  constructor(private keymap: Keymap) {}

  setKeymap(keymap: Keymap): void {
    this.keymap = keymap;
    this.buffer = [];
  }

  resolve(event: KeyEvent): Action | null {
    const chord = formatKeyEvent(event);
    const single = this.keymap.get(chord);
    if (single) return single;

    this.buffer.push(chord);
    return this.keymap.get(sequenceKey(this.buffer)) ?? null;
  }

  clear(): void {
    this.buffer = [];
  }

  get pending(): readonly string[] {
    return this.buffer;
  }
}
