import { describe, it, expect } from 'vitest';
import type { Action } from '../../src/tui/action.js';
import { KeyChordResolver, sequenceKey, type Keymap } from '../../src/tui/key-chord.js';
import { key } from '../../src/tui/key-utils.js';

const quit: Action = { type: 'Quit' };
const render: Action = { type: 'Render' };

function keymap(): Keymap {
  return new Map<string, Action>([
    ['Ctrl+c', quit],
    [sequenceKey(['g', 'g']), render],
  ]);
}

describe('KeyChordResolver', () => {
  it('resolves single chords immediately', () => {
    const resolver = new KeyChordResolver(keymap());
    expect(resolver.resolve(key('c', { ctrl: true }))).toEqual(quit);
    expect(resolver.pending).toEqual([]);
  });

  it('resolves a two-key sequence within one tick', () => {
    const resolver = new KeyChordResolver(keymap());
    expect(resolver.resolve(key('g'))).toBeNull();
    expect(resolver.resolve(key('g'))).toEqual(render);
  });

  it('loses a partial sequence when the buffer is cleared between keys', () => {
    const resolver = new KeyChordResolver(keymap());
    expect(resolver.resolve(key('g'))).toBeNull();
    resolver.clear();
    expect(resolver.resolve(key('g'))).toBeNull();
    expect(resolver.pending).toEqual(['g']);
  });

  it('keeps buffering unmatched keys until cleared', () => {
    const resolver = new KeyChordResolver(keymap());
    resolver.resolve(key('x'));
    expect(resolver.resolve(key('g'))).toBeNull();
    expect(resolver.pending).toEqual(['x', 'g']);
  });

  it('resets the buffer when the keymap changes', () => {
    const resolver = new KeyChordResolver(keymap());
    resolver.resolve(key('g'));
    resolver.setKeymap(new Map<string, Action>([['z', quit]]));
    expect(resolver.pending).toEqual([]);
    expect(resolver.resolve(key('z'))).toEqual(quit);
  });
});
