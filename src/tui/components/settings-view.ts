import { keybindingNames, chordsFor } from '../../settings/schema.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import { truncateEndByWidth, type Frame } from '../frame.js';
import { formatKeyEvent, isKey, type KeyEvent } from '../key-utils.js';
import { inset, moveSelection, scrollOffset, type Rect } from '../layout.js';
import { THEME_NAMES, findTheme } from '../theme.js';
import { drawStatusBar } from './status-bar.js';
import { tabShortcut } from './tab-bar.js';

type Section = 'themes' | 'keybindings';

interface Capture {
  name: string;
  chords: string[];
}

/**
 * Theme picker and keybinding editor. The only place that writes user settings.
 */
export class SettingsView extends BaseComponent {
  private section: Section = 'themes';
  private themeIndex = 0;
  private bindingIndex = 0;
  private capture: Capture | null = null;

  get capturing(): Capture | null {
    return this.capture;
  }

  get activeSection(): Section {
    return this.section;
  }

  private bindingNames(): string[] {
    return this.settings.read((s) => keybindingNames(s.keybindings));
  }

  override update(action: Action): Action | null {
    switch (action.type) {
      case 'ChangeTheme': {
        const theme = findTheme(action.theme);
        if (!theme) return { type: 'Error', message: `Unknown theme: ${action.theme}` };
        this.settings.updateTheme(theme.name);
        return { type: 'Success', message: `Theme set to ${theme.name}` };
      }
      case 'UpdateKeybinding':
        this.settings.updateKeybinding(action.action, action.keys);
        return { type: 'Success', message: `Updated keys for ${action.action}` };
      case 'ResetKeybindings':
        this.settings.resetKeybindings();
        return { type: 'Success', message: 'Keybindings reset to defaults' };
      case 'SaveSettings':
        this.settings.write((s) => s);
        return { type: 'Success', message: 'Settings saved' };
      default:
        return null;
    }
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    if (this.capture) return this.handleCaptureKey(this.capture, key);

    if (this.keys.matches(key, 'quit')) return { type: 'Quit' };
    const shortcut = tabShortcut(key, 'Settings');
    if (shortcut) return shortcut;

    if (this.keys.matches(key, 'left')) this.section = 'themes';
    else if (this.keys.matches(key, 'right')) this.section = 'keybindings';
    else if (this.keys.matches(key, 'up')) this.moveCursor(-1);
    else if (this.keys.matches(key, 'down')) this.moveCursor(1);
    else if (isKey(key, 'r')) return { type: 'ResetKeybindings' };
    else if (this.keys.matches(key, 'select')) return this.activate();
    return null;
  }

  private moveCursor(delta: number): void {
    if (this.section === 'themes') this.themeIndex = moveSelection(this.themeIndex, delta, THEME_NAMES.length);
    else this.bindingIndex = moveSelection(this.bindingIndex, delta, this.bindingNames().length);
  }

  private activate(): Action | null {
    if (this.section === 'themes') {
      const theme = THEME_NAMES[this.themeIndex];
      return theme ? { type: 'ChangeTheme', theme } : null;
    }
    const name = this.bindingNames()[this.bindingIndex];
    if (name) this.capture = { name, chords: [] };
    return null;
  }

  /** Every key is recorded except the editing keys: Ctrl+s saves, Backspace removes, Esc cancels. */
  private handleCaptureKey(capture: Capture, key: KeyEvent): Action | null {
    if (isKey(key, 'Esc')) {
      this.capture = null;
      return null;
    }
    if (isKey(key, 's', { ctrl: true })) {
      this.capture = null;
      if (capture.chords.length === 0) return { type: 'Error', message: `Press at least one key for ${capture.name}` };
      return { type: 'UpdateKeybinding', action: capture.name, keys: capture.chords };
    }
    if (isKey(key, 'Backspace')) {
      capture.chords.pop();
      return null;
    }
    const chord = formatKeyEvent(key);
    if (chord !== 'Unknown' && !capture.chords.includes(chord)) capture.chords.push(chord);
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const { theme } = frame;
    const help = this.capture
      ? 'Press keys to bind | Backspace: remove last | Ctrl+s: save | Esc: cancel'
      : 'Left/Right: section | Up/Down: move | Enter: apply/edit | r: reset keys | Tab: next tab';
    const body = drawStatusBar(frame, area, help);

    const themeWidth = Math.min(28, Math.floor(body.width / 3));
    const themeArea: Rect = { x: body.x, y: body.y, width: themeWidth, height: body.height };
    const keysArea: Rect = { x: body.x + themeWidth, y: body.y, width: body.width - themeWidth, height: body.height };

    const active = this.settings.read((s) => s.theme);
    frame.drawBox(themeArea, { fg: this.section === 'themes' ? theme.primary : theme.border }, 'Theme');
    const themeInner = inset(themeArea, 1);
    THEME_NAMES.slice(0, themeInner.height).forEach((name, i) => {
      const focused = this.section === 'themes' && i === this.themeIndex;
      const marker = name === active ? '● ' : '  ';
      frame.setString(themeInner.x + 1, themeInner.y + i, `${marker}${name}`, {
        fg: focused ? theme.background : theme.text,
        bg: focused ? theme.primary : undefined,
        bold: name === active,
      });
    });

    frame.drawBox(keysArea, { fg: this.section === 'keybindings' ? theme.primary : theme.border }, 'Keybindings');
    const keysInner = inset(keysArea, 1);
    const names = this.bindingNames();
    const offset = scrollOffset(this.bindingIndex, keysInner.height, names.length);
    names.slice(offset, offset + keysInner.height).forEach((name, i) => {
      const index = offset + i;
      const focused = this.section === 'keybindings' && index === this.bindingIndex;
      const editing = this.capture?.name === name;
      const chords = editing && this.capture ? this.capture.chords : this.settings.read((s) => chordsFor(s.keybindings, name));
      const value = editing ? `${chords.join(', ')}_` : chords.join(', ') || '(unbound)';
      const y = keysInner.y + i;
      frame.setString(keysInner.x + 1, y, name.padEnd(10), {
        fg: focused ? theme.background : theme.text,
        bg: focused ? theme.primary : undefined,
        bold: focused,
      });
      frame.setString(keysInner.x + 12, y, truncateEndByWidth(value, keysInner.width - 13), {
        fg: editing ? theme.warning : theme.muted,
      });
    });
  }
}
