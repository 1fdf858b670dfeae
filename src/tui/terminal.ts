import terminalKit from 'terminal-kit';
import type { Frame } from './frame.js';

type Term = typeof terminalKit.terminal;

export interface TerminalSize {
  width: number;
  height: number;
}

/** What the app needs from the terminal: raw mode in and out, size, and drawing. */
export interface TerminalHandle {
  enter(): void;
  exit(): void;
  /** Restore the terminal and stop the process until SIGCONT. */
  suspend(): void;
  clear(): void;
  size(): TerminalSize;
  draw(frame: Frame): void;
}

export function setCursorVisible(term: Term, visible: boolean): void {
  term.hideCursor(!visible);
}

export class TerminalKitHandle implements TerminalHandle {
  private active = false;

  constructor(private readonly term: Term = terminalKit.terminal) {}

  enter(): void {
    if (this.active) return;
    this.active = true;
    this.term.fullscreen(true);
    this.term.grabInput({ mouse: 'button' });
    setCursorVisible(this.term, false);
    this.term.clear();
  }

  exit(): void {
    if (!this.active) return;
    this.active = false;
    this.term.grabInput(false);
    this.term.styleReset();
    setCursorVisible(this.term, true);
    this.term.fullscreen(false);
  }

  suspend(): void {
    this.exit();
    process.kill(process.pid, 'SIGTSTP');
  }

  clear(): void {
    this.term.styleReset();
    this.term.clear();
  }

  size(): TerminalSize {
    return { width: this.term.width, height: this.term.height };
  }

  draw(frame: Frame): void {
    const rows = frame.rows();
    rows.forEach((row, y) => {
      this.term.moveTo(1, y + 1);
      let run = '';
      let runStyle: { fg: string; bg: string; bold: boolean } | null = null;
      const flush = (): void => {
        if (!runStyle || run === '') return;
        this.term.styleReset();
        this.term.colorRgbHex(runStyle.fg);
        this.term.bgColorRgbHex(runStyle.bg);
        if (runStyle.bold) this.term.bold();
        this.term.noFormat(run);
        run = '';
      };
      for (const cell of row) {
        if (cell.ch === '') continue;
        if (!runStyle || runStyle.fg !== cell.fg || runStyle.bg !== cell.bg || runStyle.bold !== cell.bold) {
          flush();
          runStyle = { fg: cell.fg, bg: cell.bg, bold: cell.bold };
        }
        run += cell.ch;
      }
      flush();
    });
    this.term.styleReset();
  }
}
