import { describe, it, expect } from 'vitest';
import { Frame, truncateEndByWidth, truncateStartByWidth } from '../../src/tui/frame.js';
import { centeredRect, inset, moveSelection, scrollOffset, splitBottom, splitTop } from '../../src/tui/layout.js';
import { THEME_NAMES, findTheme, themeByName } from '../../src/tui/theme.js';

const mocha = themeByName('mocha');

describe('Frame', () => {
  it('writes text clipped to the frame and reports columns used', () => {
    const frame = new Frame(8, 2, mocha);
    expect(frame.setString(5, 0, 'abcdef')).toBe(3);
    expect(frame.rowText(0)).toBe('     abc');
    expect(frame.setString(0, 5, 'x')).toBe(0);
  });

  it('honors maxWidth and wide characters', () => {
    const frame = new Frame(10, 1, mocha);
    expect(frame.setString(0, 0, 'hello', {}, 2)).toBe(2);
    expect(frame.setString(3, 0, '日本')).toBe(4);
    expect(frame.cell(4, 0)?.ch).toBe('');
  });

  it('applies styles from the theme', () => {
    const frame = new Frame(4, 1, mocha);
    frame.setString(0, 0, 'a', { fg: '#000000', bold: true });
    expect(frame.cell(0, 0)).toEqual({ ch: 'a', fg: '#000000', bg: mocha.background, bold: true });
    expect(frame.cell(9, 9)).toBeNull();
  });

  it('draws rounded boxes with a title', () => {
    const frame = new Frame(12, 3, mocha);
    frame.drawBox(frame.area, {}, 'Hi');
    expect(frame.lines()).toEqual(['╭─ Hi ─────╮', '│          │', '╰──────────╯']);
  });
});

describe('truncation', () => {
  it('keeps the end or the start of the text', () => {
    expect(truncateEndByWidth('abcdef', 4)).toBe('abc…');
    expect(truncateEndByWidth('abc', 4)).toBe('abc');
    expect(truncateStartByWidth('abcdef', 4)).toBe('cdef');
    expect(truncateStartByWidth('abc', 0)).toBe('');
  });
});

describe('layout', () => {
  const area = { x: 0, y: 0, width: 80, height: 24 };

  it('splits and insets rectangles', () => {
    expect(splitTop(area, 3)).toEqual([
      { x: 0, y: 0, width: 80, height: 3 },
      { x: 0, y: 3, width: 80, height: 21 },
    ]);
    expect(splitBottom(area, 1)[1]).toEqual({ x: 0, y: 23, width: 80, height: 1 });
    expect(inset(area, 2)).toEqual({ x: 2, y: 2, width: 76, height: 20 });
    expect(inset({ x: 0, y: 0, width: 2, height: 2 }, 2)).toEqual({ x: 2, y: 2, width: 0, height: 0 });
  });

  it('centers and shrinks boxes', () => {
    expect(centeredRect(area, 40, 10)).toEqual({ x: 20, y: 7, width: 40, height: 10 });
    expect(centeredRect(area, 100, 30)).toEqual(area);
  });

  it('clamps selection and scroll', () => {
    expect(moveSelection(0, -1, 3)).toBe(0);
    expect(moveSelection(2, 1, 3)).toBe(2);
    expect(moveSelection(5, 0, 0)).toBe(0);
    expect(scrollOffset(9, 4, 10)).toBe(6);
    expect(scrollOffset(5, 4, 10)).toBe(3);
    expect(scrollOffset(1, 10, 5)).toBe(0);
  });
});

describe('themes', () => {
  it('finds palettes by name and falls back to the first', () => {
    expect(THEME_NAMES).toEqual(['mocha', 'macchiato', 'frappe', 'latte']);
    expect(findTheme(' FRAPPE ')?.name).toBe('frappe');
    expect(findTheme('solarized')).toBeNull();
    expect(themeByName('solarized').name).toBe('mocha');
  });
});
