export const NAMED_KEYS = [
  'Up',
  'Down',
  'Left',
  'Right',
  'Enter',
  'Tab',
  'BackTab',
  'Backspace',
  'Delete',
  'Insert',
  'Home',
  'End',
  'PageUp',
  'PageDown',
  'Esc',
] as const;
export type NamedKey = (typeof NAMED_KEYS)[number];

/**
 * A single key press. `code` is either one printable character, a named key, or `F1`..`F24`.
 */
export interface KeyEvent {
  code: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

const TERM_KEY_NAMES: Record<string, NamedKey> = {
  UP: 'Up',
  DOWN: 'Down',
  LEFT: 'Left',
  RIGHT: 'Right',
  ENTER: 'Enter',
  KP_ENTER: 'Enter',
  TAB: 'Tab',
  BACKSPACE: 'Backspace',
  DELETE: 'Delete',
  DEL: 'Delete',
  INSERT: 'Insert',
  HOME: 'Home',
  END: 'End',
  PAGE_UP: 'PageUp',
  PAGE_DOWN: 'PageDown',
  ESCAPE: 'Esc',
};

export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

export function isCharCode(code: string): boolean {
  return Array.from(code).length === 1;
}

export function isNamedKey(code: string): code is NamedKey {
  return NAMED_KEYS.some((name) => name === code);
}

function isFunctionKey(code: string): boolean {
  return /^F([1-9]|1[0-9]|2[0-4])$/.test(code);
}

export function key(code: string, modifiers: Partial<Omit<KeyEvent, 'code'>> = {}): KeyEvent {
  return {
    code,
    ctrl: modifiers.ctrl ?? false,
    alt: modifiers.alt ?? false,
    shift: modifiers.shift ?? false,
  };
}

function isUpperLetter(ch: string): boolean {
  return ch.length === 1 && ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/**
 * Translate a terminal-kit key name (`CTRL_S`, `SHIFT_TAB`, `ALT_UP`, `a`, `A`, ...) into a KeyEvent.
 *
 * Returns null for names that have no key equivalent (terminal reports, unknown escapes).
 */
export function parseTermKey(name: string): KeyEvent | null {
  if (isSpaceKeyName(name)) return key(' ');
  if (isCharCode(name)) return key(name, { shift: isUpperLetter(name) });

  let rest = name;
  const mods = { ctrl: false, alt: false, shift: false };
  for (;;) {
    if (rest.startsWith('CTRL_')) {
      mods.ctrl = true;
      rest = rest.slice(5);
    } else if (rest.startsWith('ALT_') || rest.startsWith('META_')) {
      mods.alt = true;
      rest = rest.slice(rest.indexOf('_') + 1);
    } else if (rest.startsWith('SHIFT_')) {
      mods.shift = true;
      rest = rest.slice(6);
    } else {
      break;
    }
  }

  if (rest === 'TAB' && mods.shift) return key('BackTab', mods);
  const named = TERM_KEY_NAMES[rest];
  if (named) return key(named, mods);
  if (isFunctionKey(rest)) return key(rest, mods);
  if (isSpaceKeyName(rest)) return key(' ', mods);

  if (rest.length === 1) {
    // terminal-kit reports CTRL_S / ALT_S in uppercase; ALT_SHIFT_S carries the shift explicitly.
    const letter = mods.shift ? rest.toUpperCase() : rest.toLowerCase();
    return key(letter, mods);
  }
  return null;
}

/**
 * Canonical chord string for a key press: `Ctrl+`, `Alt+`, `Shift+` in that order, then the key.
 *
 * Space renders as `Space`; a character is uppercased only when Shift is held.
 */
export function formatKeyEvent(event: KeyEvent): string {
  let keyName: string;
  if (event.code === ' ') keyName = 'Space';
  else if (isCharCode(event.code)) keyName = event.shift ? event.code.toUpperCase() : event.code;
  else if (isNamedKey(event.code) || isFunctionKey(event.code)) keyName = event.code;
  else return 'Unknown';

  const parts: string[] = [];
  if (event.ctrl) parts.push('Ctrl');
  if (event.alt) parts.push('Alt');
  if (event.shift) parts.push('Shift');
  parts.push(keyName);
  return parts.join('+');
}

const CHORD_REGEX = /^((?:(?:Ctrl|Alt|Shift)\+)*)(.+)$/i;

/**
 * Parse a chord string as written in settings or config (`Ctrl+s`, `Shift+G`, `Space`, `F5`).
 */
export function parseChord(chord: string): KeyEvent | null {
  const trimmed = chord.trim();
  const match = trimmed.match(CHORD_REGEX);
  if (!match) return null;

  const modifierText = (match[1] ?? '').toLowerCase();
  const keyText = match[2] ?? '';
  const mods = {
    ctrl: modifierText.includes('ctrl+'),
    alt: modifierText.includes('alt+'),
    shift: modifierText.includes('shift+'),
  };

  if (keyText.toLowerCase() === 'space') return key(' ', mods);
  const named = NAMED_KEYS.find((k) => k.toLowerCase() === keyText.toLowerCase());
  if (named === 'Tab' && mods.shift) return key('BackTab', mods);
  if (named) return key(named, mods);
  if (isFunctionKey(keyText.toUpperCase())) return key(keyText.toUpperCase(), mods);
  if (!isCharCode(keyText)) return null;

  // Terminals cannot tell Ctrl+S from Ctrl+s, so `Ctrl+S` means the latter unless Shift is spelled out.
  if (isUpperLetter(keyText) && (mods.ctrl || mods.alt) && !mods.shift) return key(keyText.toLowerCase(), mods);
  if (isUpperLetter(keyText)) return key(keyText, { ...mods, shift: true });
  return key(mods.shift ? keyText.toUpperCase() : keyText, mods);
}

export function normalizeChord(chord: string): string | null {
  const parsed = parseChord(chord);
  return parsed ? formatKeyEvent(parsed) : null;
}

/**
 * Parse a key sequence such as `g g` or `Ctrl+x Ctrl+s` into canonical chord strings.
 */
export function parseKeySequence(sequence: string): string[] | null {
  const parts = sequence.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return null;
  const chords: string[] = [];
  for (const part of parts) {
    const normalized = normalizeChord(part);
    if (!normalized) return null;
    chords.push(normalized);
  }
  return chords;
}

export function isKey(event: KeyEvent, code: string, modifiers: Partial<Omit<KeyEvent, 'code'>> = {}): boolean {
  return (
    event.code === code &&
    event.ctrl === (modifiers.ctrl ?? false) &&
    event.alt === (modifiers.alt ?? false) &&
    (modifiers.shift === undefined ? true : event.shift === modifiers.shift)
  );
}

export function isPrintable(event: KeyEvent): boolean {
  return isCharCode(event.code) && !event.ctrl && !event.alt;
}
