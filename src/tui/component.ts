import { defaultConfig, type Config } from '../config/loader.js';
import { SharedSettings } from '../settings/shared-settings.js';
import type { Action } from './action.js';
import type { ActionSender } from './action-channel.js';
import type { MouseEvent, TerminalEvent } from './event.js';
import type { Frame } from './frame.js';
import type { KeyEvent } from './key-utils.js';
import { KeybindingManager } from './keybinding-manager.js';
import type { Rect } from './layout.js';
import type { TerminalSize } from './terminal.js';

/**
 * A UI unit: a view, dialog, form or bar.
 *
 * `handleEvents` turns raw input into at most one action; `update` applies an action and may
 * answer with a follow-up, which the app queues for the next drain pass.
 */
export interface Component {
  registerActionHandler(tx: ActionSender): void;
  registerConfigHandler(config: Config): void;
  registerSettingsHandler(settings: SharedSettings): void;
  init(size: TerminalSize): void;
  handleEvents(event: TerminalEvent | null): Action | null;
  update(action: Action): Action | null;
  draw(frame: Frame, area: Rect): void;
}

export abstract class BaseComponent implements Component {
  protected tx: ActionSender | null = null;
  protected config: Config = defaultConfig();
  protected settings: SharedSettings = new SharedSettings();
  protected keys: KeybindingManager = new KeybindingManager(this.settings);

  registerActionHandler(tx: ActionSender): void {
    this.tx = tx;
  }

  registerConfigHandler(config: Config): void {
    this.config = config;
  }

  registerSettingsHandler(settings: SharedSettings): void {
    this.settings = settings;
    this.keys = new KeybindingManager(settings);
  }

  init(_size: TerminalSize): void {}

  handleEvents(event: TerminalEvent | null): Action | null {
    if (!event) return null;
    if (event.type === 'Key') return this.handleKeyEvent(event.key);
    if (event.type === 'Mouse') return this.handleMouseEvent(event.mouse);
    return null;
  }

  handleKeyEvent(_key: KeyEvent): Action | null {
    return null;
  }

  handleMouseEvent(_mouse: MouseEvent): Action | null {
    return null;
  }

  update(_action: Action): Action | null {
    return null;
  }

  abstract draw(frame: Frame, area: Rect): void;

  protected send(action: Action): void {
    this.tx?.send(action);
  }
}
