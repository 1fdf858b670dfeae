import terminalKit from 'terminal-kit';
import { parseTermKey, type KeyEvent } from './key-utils.js';
import { logger } from '../logging/logger.js';

type Term = typeof terminalKit.terminal;

export interface MouseEvent {
  kind: string;
  x: number;
  y: number;
}

/** Raw input as produced by the terminal, before any keymap is applied. */
export type TerminalEvent =
  | { type: 'Tick' }
  | { type: 'Render' }
  | { type: 'Resize'; width: number; height: number }
  | { type: 'Key'; key: KeyEvent }
  | { type: 'Mouse'; mouse: MouseEvent }
  | { type: 'Quit' };

export interface EventSource {
  start(): void;
  /** Resolves with the next event, or null once the source is stopped. */
  next(): Promise<TerminalEvent | null>;
  stop(): void;
}

/**
 * Buffers pushed events for a single async consumer.
 */
export class EventQueue implements EventSource {
  private readonly pending: TerminalEvent[] = [];
  private waiter: ((event: TerminalEvent | null) => void) | null = null;
  private stopped = false;

  start(): void {
    this.stopped = false;
  }

  push(event: TerminalEvent): void {
    if (this.stopped) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(event);
      return;
    }
    this.pending.push(event);
  }

  next(): Promise<TerminalEvent | null> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    if (this.stopped) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  stop(): void {
    this.stopped = true;
    this.pending.length = 0;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}

export interface TerminalEventSourceOptions {
  tickRate: number;
  frameRate: number;
}

/**
 * Feeds terminal-kit key, mouse and resize callbacks plus tick/render timers into an EventQueue.
 */
export class TerminalEventSource extends EventQueue {
  private timers: NodeJS.Timeout[] = [];
  private listening = false;

  constructor(
    private readonly term: Term,
    private readonly options: TerminalEventSourceOptions
  ) {
    super();
  }

  override start(): void {
    super.start();
    if (!this.listening) {
      this.listening = true;
      this.term.on('key', (name: string) => {
        const parsed = parseTermKey(name);
        if (parsed) {
          this.push({ type: 'Key', key: parsed });
        } else {
          logger.debug('ignored terminal key', { name });
        }
      });
      this.term.on('resize', (width: number, height: number) => {
        this.push({ type: 'Resize', width, height });
      });
      this.term.on('mouse', (name: string, data: { x: number; y: number }) => {
        this.push({ type: 'Mouse', mouse: { kind: name, x: data.x, y: data.y } });
      });
    }

    this.clearTimers();
    const tickMs = Math.max(1, Math.round(1000 / this.options.tickRate));
    const frameMs = Math.max(1, Math.round(1000 / this.options.frameRate));
    this.timers = [
      setInterval(() => this.push({ type: 'Tick' }), tickMs),
      setInterval(() => this.push({ type: 'Render' }), frameMs),
    ];
  }

  override stop(): void {
    this.clearTimers();
    super.stop();
  }

  private clearTimers(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
  }
}
