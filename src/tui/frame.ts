import terminalKit from 'terminal-kit';
import type { Rect } from './layout.js';
import type { Theme } from './theme.js';

export interface Style {
  fg?: string;
  bg?: string;
  bold?: boolean;
}

export interface Cell {
  /** Empty for the trailing half of a double-width character. */
  ch: string;
  fg: string;
  bg: string;
  bold: boolean;
}

/**
 * Off-screen cell buffer for one render pass. Components draw into it; the terminal handle
 * flushes it. The active theme travels with the frame.
 */
export class Frame {
  private readonly cells: Cell[][];

  constructor(
    readonly width: number,
    readonly height: number,
    readonly theme: Theme
  ) {
    this.cells = Array.from({ length: height }, () =>
      Array.from({ length: width }, () => this.blank({}))
    );
  }

  get area(): Rect {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  private blank(style: Style): Cell {
    return {
      ch: ' ',
      fg: style.fg ?? this.theme.text,
      bg: style.bg ?? this.theme.background,
      bold: style.bold ?? false,
    };
  }

  cell(x: number, y: number): Cell | null {
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Write `text` starting at (x, y), clipped to `maxWidth` columns and the frame edge.
   * Returns the number of columns written.
   */
  setString(x: number, y: number, text: string, style: Style = {}, maxWidth = Infinity): number {
    const row = this.cells[y];
    if (!row || x < 0) return 0;
    const limit = Math.min(x + maxWidth, this.width);
    let col = x;
    for (const ch of Array.from(text)) {
      const w = Math.max(1, terminalKit.stringWidth(ch));
      if (col + w > limit) break;
      const existing = row[col];
      row[col] = {
        ch,
        fg: style.fg ?? this.theme.text,
        bg: style.bg ?? existing?.bg ?? this.theme.background,
        bold: style.bold ?? false,
      };
      if (w === 2) row[col + 1] = { ...this.blank(style), ch: '' };
      col += w;
    }
    return col - x;
  }

  fill(area: Rect, style: Style = {}, ch = ' '): void {
    for (let y = area.y; y < area.y + area.height; y++) {
      const row = this.cells[y];
      if (!row) continue;
      for (let x = area.x; x < Math.min(area.x + area.width, this.width); x++) {
        if (x < 0) continue;
        row[x] = { ...this.blank(style), ch };
      }
    }
  }

  drawBox(area: Rect, style: Style = {}, title?: string): void {
    if (area.width < 2 || area.height < 2) return;
    const border: Style = { fg: style.fg ?? this.theme.border, bg: style.bg };
    const right = area.x + area.width - 1;
    const bottom = area.y + area.height - 1;
    this.fill(area, { bg: style.bg });
    this.setString(area.x, area.y, '╭' + '─'.repeat(area.width - 2) + '╮', border);
    this.setString(area.x, bottom, '╰' + '─'.repeat(area.width - 2) + '╯', border);
    for (let y = area.y + 1; y < bottom; y++) {
      this.setString(area.x, y, '│', border);
      this.setString(right, y, '│', border);
    }
    if (title) {
      this.setString(area.x + 2, area.y, ` ${title} `, { fg: style.fg ?? this.theme.primary, bg: style.bg, bold: true }, area.width - 4);
    }
  }

  /** Plain text of one row, for tests and debugging. */
  rowText(y: number): string {
    return (this.cells[y] ?? []).map((c) => c.ch).join('');
  }

  lines(): string[] {
    return this.cells.map((_, y) => this.rowText(y).trimEnd());
  }

  rows(): readonly (readonly Cell[])[] {
    return this.cells;
  }
}

/** Drop characters from the start until `text` fits in `maxWidth` columns. */
export function truncateStartByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(text) <= maxWidth) return text;

  const chars = Array.from(text);
  let width = 0;
  const out: string[] = [];
  for (let idx = chars.length - 1; idx >= 0; idx--) {
    const ch = chars[idx] ?? '';
    const w = terminalKit.stringWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }
  return out.reverse().join('');
}

/** Cut `text` to `maxWidth` columns, ending with `…` when something was dropped. */
export function truncateEndByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(text) <= maxWidth) return text;
  let width = 0;
  let out = '';
  for (const ch of Array.from(text)) {
    const w = terminalKit.stringWidth(ch);
    if (width + w > maxWidth - 1) break;
    out += ch;
    width += w;
  }
  return out + '…';
}
