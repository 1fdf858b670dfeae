import terminalKit from 'terminal-kit';
import { truncateStartByWidth, type Frame } from './frame.js';
import type { TextInputState } from './text-input.js';

const CURSOR_TOKEN = '|';

/**
 * Draw `label[value|   ]` on one row. The field gets a surface background so it is visible on
 * any palette; the cursor token sits at the insertion point.
 */
export function renderLabeledInputField(
  frame: Frame,
  x: number,
  y: number,
  options: {
    label: string;
    input: TextInputState;
    width: number;
    placeholder?: string;
    focused?: boolean;
  }
): void {
  const { theme } = frame;
  const { label, input, width } = options;
  const focused = options.focused ?? true;
  const placeholder = options.placeholder ?? '';

  const prefixWidth = frame.setString(x, y, label, { fg: focused ? theme.primary : theme.muted, bold: focused }, width);
  const available = Math.max(0, width - prefixWidth);
  if (available < 3) return;

  const fieldWidth = available - 2; // [ ]
  const fieldX = x + prefixWidth + 1;
  const field = { fg: theme.text, bg: theme.surface };
  const dim = { fg: theme.muted, bg: theme.surface };

  frame.setString(x + prefixWidth, y, '[', { fg: theme.border });
  frame.fill({ x: fieldX, y, width: fieldWidth, height: 1 }, { bg: theme.surface });
  frame.setString(fieldX + fieldWidth, y, ']', { fg: theme.border });

  if (input.value.length === 0 && placeholder) {
    let col = fieldX;
    if (focused) col += frame.setString(col, y, CURSOR_TOKEN, { fg: theme.background, bg: theme.accent });
    frame.setString(col, y, placeholder, dim, fieldX + fieldWidth - col);
    return;
  }

  if (!focused) {
    frame.setString(fieldX, y, truncateStartByWidth(input.value, fieldWidth), field, fieldWidth);
    return;
  }

  // Keep the cursor in view: trim from the start of the text before it.
  const chars = Array.from(input.value);
  const before = chars.slice(0, input.cursor).join('');
  const after = chars.slice(input.cursor).join('');
  const budget = Math.max(0, fieldWidth - terminalKit.stringWidth(CURSOR_TOKEN));
  const shownBefore = truncateStartByWidth(before, budget);
  let col = fieldX + frame.setString(fieldX, y, shownBefore, field);
  col += frame.setString(col, y, CURSOR_TOKEN, { fg: theme.background, bg: theme.accent });
  frame.setString(col, y, after, field, fieldX + fieldWidth - col);
}
