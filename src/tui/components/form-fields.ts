import type { Frame } from '../frame.js';
import { renderLabeledInputField } from '../input-render.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import type { Rect } from '../layout.js';
import { applyTextInputKey, createTextInput, type TextInputState } from '../text-input.js';

export interface TextField {
  kind: 'text';
  key: string;
  label: string;
  input: TextInputState;
  placeholder?: string;
}

export interface ToggleField {
  kind: 'toggle';
  key: string;
  label: string;
  value: boolean;
}

export type FormField = TextField | ToggleField;

export function textField(key: string, label: string, value = '', placeholder?: string): TextField {
  return { kind: 'text', key, label, input: createTextInput(value), placeholder };
}

export function toggleField(key: string, label: string, value: boolean): ToggleField {
  return { kind: 'toggle', key, label, value };
}

export function fieldText(fields: readonly FormField[], key: string): string {
  const field = fields.find((f) => f.key === key);
  return field?.kind === 'text' ? field.input.value.trim() : '';
}

export function fieldToggle(fields: readonly FormField[], key: string): boolean {
  const field = fields.find((f) => f.key === key);
  return field?.kind === 'toggle' ? field.value : false;
}

export type FormKeyResult = { kind: 'submit' } | { kind: 'cancel' } | { kind: 'handled' } | { kind: 'ignored' };

/**
 * Focus and editing shared by the create/edit forms. Fields are edited in place.
 *
 * Tab/Down and Shift+Tab/Up move focus, Space toggles, Enter advances (and submits on the
 * last field), Ctrl+s submits from anywhere, Esc cancels.
 */
export class FormController {
  focus = 0;

  constructor(readonly fields: FormField[]) {}

  get focused(): FormField | null {
    return this.fields[this.focus] ?? null;
  }

  handleKey(key: KeyEvent): FormKeyResult {
    if (isKey(key, 'Esc') || isKey(key, 'c', { ctrl: true })) return { kind: 'cancel' };
    if (isKey(key, 's', { ctrl: true })) return { kind: 'submit' };
    if (isKey(key, 'Tab') || isKey(key, 'Down')) return this.move(1);
    if (isKey(key, 'BackTab') || isKey(key, 'Up')) return this.move(-1);

    const field = this.focused;
    if (!field) return { kind: 'ignored' };

    if (field.kind === 'toggle' && (isKey(key, ' ') || isKey(key, 'Enter'))) {
      field.value = !field.value;
      return { kind: 'handled' };
    }
    if (isKey(key, 'Enter')) {
      if (this.focus === this.fields.length - 1) return { kind: 'submit' };
      return this.move(1);
    }
    if (field.kind === 'text') {
      const result = applyTextInputKey(field.input, key);
      if (!result) return { kind: 'ignored' };
      field.input = result.state;
      return { kind: 'handled' };
    }
    return { kind: 'ignored' };
  }

  private move(delta: number): FormKeyResult {
    const count = this.fields.length;
    if (count > 0) this.focus = (this.focus + delta + count) % count;
    return { kind: 'handled' };
  }

  /** One row per field, scrolled so the focused one stays visible. */
  draw(frame: Frame, area: Rect, labelWidth: number): void {
    const { theme } = frame;
    const offset = Math.max(0, this.focus - area.height + 1);
    this.fields.slice(offset, offset + area.height).forEach((field, i) => {
      const y = area.y + i;
      const focused = offset + i === this.focus;
      const label = field.label.padEnd(labelWidth);
      if (field.kind === 'text') {
        renderLabeledInputField(frame, area.x, y, {
          label,
          input: field.input,
          width: area.width,
          placeholder: field.placeholder,
          focused,
        });
        return;
      }
      const labelStyle = focused ? { fg: theme.primary, bold: true } : { fg: theme.muted };
      const x = area.x + frame.setString(area.x, y, label, labelStyle, area.width);
      frame.setString(x, y, field.value ? '[x]' : '[ ]', { fg: field.value ? theme.success : theme.muted, bold: focused });
    });
  }
}
