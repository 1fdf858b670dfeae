import { describe, it, expect } from 'vitest';
import { key } from '../../src/tui/key-utils.js';
import { applyTextInputKey, createTextInput, type TextInputState } from '../../src/tui/text-input.js';

function apply(state: TextInputState, ...keys: Parameters<typeof key>[]): TextInputState {
  let current = state;
  for (const args of keys) {
    const result = applyTextInputKey(current, key(...args));
    if (result) current = result.state;
  }
  return current;
}

describe('applyTextInputKey', () => {
  it('inserts at the cursor', () => {
    const state = apply(createTextInput('ac'), ['Left'], ['b']);
    expect(state).toEqual({ value: 'abc', cursor: 2 });
  });

  it('deletes by character and by word', () => {
    expect(apply(createTextInput('abc'), ['Backspace'])).toEqual({ value: 'ab', cursor: 2 });
    expect(apply(createTextInput('one two'), ['w', { ctrl: true }])).toEqual({ value: 'one ', cursor: 4 });
    expect(apply(createTextInput('abc'), ['Home'], ['Delete'])).toEqual({ value: 'bc', cursor: 0 });
    expect(apply(createTextInput('abc'), ['Left'], ['k', { ctrl: true }])).toEqual({ value: 'ab', cursor: 2 });
  });

  it('moves by word', () => {
    expect(apply(createTextInput('one two'), ['Left', { alt: true }])).toEqual({ value: 'one two', cursor: 4 });
    expect(apply(createTextInput('one two'), ['Home'], ['f', { alt: true }])).toEqual({ value: 'one two', cursor: 3 });
  });

  it('counts codepoints, not UTF-16 units', () => {
    expect(apply(createTextInput('a🚀'), ['Backspace'])).toEqual({ value: 'a', cursor: 1 });
  });

  it('leaves submit and focus keys to the caller', () => {
    const state = createTextInput('x');
    expect(applyTextInputKey(state, key('Enter'))).toBeNull();
    expect(applyTextInputKey(state, key('Esc'))).toBeNull();
    expect(applyTextInputKey(state, key('Tab'))).toBeNull();
    expect(applyTextInputKey(state, key('c', { ctrl: true }))).toBeNull();
  });

  it('reports whether the value changed', () => {
    const state = createTextInput('x');
    expect(applyTextInputKey(state, key('Left'))?.didChangeValue).toBe(false);
    expect(applyTextInputKey(state, key('y'))?.didChangeValue).toBe(true);
  });
});
