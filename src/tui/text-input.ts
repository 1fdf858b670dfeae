import { isKey, isPrintable, type KeyEvent } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

function toChars(value: string): string[] {
  return Array.from(value ?? '');
}

function clampCursor(value: string, cursor: number): number {
  const len = toChars(value).length;
  return Math.max(0, Math.min(cursor, len));
}

export function createTextInput(initial: string): TextInputState {
  const value = initial ?? '';
  const cursor = toChars(value).length;
  return { value, cursor };
}

function withCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function setValueAndCursor(value: string, cursor: number): TextInputState {
  const clamped = clampCursor(value, cursor);
  return { value, cursor: clamped };
}

function insertAt(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const insertChars = toChars(text);
  const cursor = clampCursor(state.value, state.cursor);
  chars.splice(cursor, 0, ...insertChars);
  return setValueAndCursor(chars.join(''), cursor + insertChars.length);
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return withCursor(state, state.cursor);
  chars.splice(from, to - from);
  return setValueAndCursor(chars.join(''), from);
}

function isWhitespaceChar(ch: string): boolean {
  return /\s/.test(ch);
}

function moveWordLeft(state: TextInputState): TextInputState {
  const chars = toChars(state.value);
  let i = clampCursor(state.value, state.cursor);
  while (i > 0 && isWhitespaceChar(chars[i - 1] ?? '')) i--;
  while (i > 0 && !isWhitespaceChar(chars[i - 1] ?? '')) i--;
  return withCursor(state, i);
}

function moveWordRight(state: TextInputState): TextInputState {
  const chars = toChars(state.value);
  let i = clampCursor(state.value, state.cursor);
  while (i < chars.length && isWhitespaceChar(chars[i] ?? '')) i++;
  while (i < chars.length && !isWhitespaceChar(chars[i] ?? '')) i++;
  return withCursor(state, i);
}

export function applyTextInputKey(
  state: TextInputState,
  event: KeyEvent
): { state: TextInputState; didChangeValue: boolean } | null {
  const prevValue = state.value;
  const prevCursor = clampCursor(state.value, state.cursor);
  const normalized = { value: state.value ?? '', cursor: prevCursor };
  const len = toChars(normalized.value).length;

  const finish = (next: TextInputState): { state: TextInputState; didChangeValue: boolean } => ({
    state: next,
    didChangeValue: next.value !== prevValue,
  });
  const is = (code: string, mods: { ctrl?: boolean; alt?: boolean } = {}): boolean => isKey(event, code, mods);

  // Cancel/submit/focus changes are handled by callers.
  if (is('Esc') || is('Enter') || is('Tab') || is('BackTab') || is('c', { ctrl: true })) return null;

  // Word movement (common on macOS terminals and readline-style UIs)
  if (is('Left', { alt: true }) || is('Left', { ctrl: true }) || is('b', { alt: true }))
    return finish(moveWordLeft(normalized));
  if (is('Right', { alt: true }) || is('Right', { ctrl: true }) || is('f', { alt: true }))
    return finish(moveWordRight(normalized));

  // Basic movement
  if (is('Left') || is('b', { ctrl: true })) return finish(withCursor(normalized, prevCursor - 1));
  if (is('Right') || is('f', { ctrl: true })) return finish(withCursor(normalized, prevCursor + 1));
  if (is('Home') || is('a', { ctrl: true })) return finish(withCursor(normalized, 0));
  if (is('End') || is('e', { ctrl: true })) return finish(withCursor(normalized, len));

  // Deletion
  if (is('Backspace', { alt: true }) || is('w', { ctrl: true })) {
    const moved = moveWordLeft(normalized);
    return finish(deleteRange(normalized, moved.cursor, prevCursor));
  }
  if (is('Backspace')) {
    if (prevCursor <= 0) return finish(normalized);
    return finish(deleteRange(normalized, prevCursor - 1, prevCursor));
  }
  if (is('Delete') || is('d', { ctrl: true })) {
    if (prevCursor >= len) return finish(normalized);
    return finish(deleteRange(normalized, prevCursor, prevCursor + 1));
  }
  if (is('u', { ctrl: true })) return finish(deleteRange(normalized, 0, prevCursor));
  if (is('k', { ctrl: true })) return finish(deleteRange(normalized, prevCursor, len));

  // Insertion
  if (isPrintable(event)) return finish(insertAt(normalized, event.code));

  return null;
}
