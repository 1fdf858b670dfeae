import { errorMessage } from '../cli/errors.js';
import type { Config } from '../config/loader.js';
import type { ProfileLauncher } from '../launcher/launcher.js';
import { logger } from '../logging/logger.js';
import type { SharedSettings } from '../settings/shared-settings.js';
import type { Storage } from '../storage/storage.js';
import { describeAction, type Action, type SimpleActionType } from './action.js';
import { ActionChannel } from './action-channel.js';
import type { Component } from './component.js';
import type { EventSource, TerminalEvent } from './event.js';
import { Frame } from './frame.js';
import { KeyChordResolver, sequenceKey, type Keymap } from './key-chord.js';
import { nextInFormView, shouldAllowShortcuts } from './key-policy.js';
import { parseKeySequence } from './key-utils.js';
import type { TerminalHandle } from './terminal.js';
import { themeByName } from './theme.js';
import { ViewManager } from './view-manager.js';

/** Drain passes per loop iteration; anything still queued waits for the next event. */
export const MAX_DRAIN_PASSES = 32;

export const DEFAULT_KEYMAP: Readonly<Record<string, SimpleActionType>> = {
  'Ctrl+c': 'Quit',
  'Ctrl+d': 'Quit',
  'Ctrl+z': 'Suspend',
};

/** Global keymap: the defaults, overridden entry by entry from config. */
export function buildKeymap(entries: Readonly<Record<string, SimpleActionType>>): Keymap {
  const keymap: Keymap = new Map();
  for (const [sequence, type] of Object.entries({ ...DEFAULT_KEYMAP, ...entries })) {
    const chords = parseKeySequence(sequence);
    if (!chords) {
      logger.warn('ignoring invalid key sequence', { sequence });
      continue;
    }
    keymap.set(sequenceKey(chords), { type });
  }
  return keymap;
}

export interface AppDeps {
  config: Config;
  storage: Storage;
  settings: SharedSettings;
  terminal: TerminalHandle;
  events: EventSource;
  launcher: ProfileLauncher;
  now?: () => number;
}

export class App {
  readonly channel = new ActionChannel();
  readonly viewManager: ViewManager;
  readonly components: Component[];
  private readonly resolver: KeyChordResolver;
  shouldQuit = false;
  shouldSuspend = false;
  inFormView = false;

  constructor(private readonly deps: AppDeps) {
    this.viewManager = new ViewManager(deps.storage, { now: deps.now });
    this.components = [this.viewManager];
    this.resolver = new KeyChordResolver(buildKeymap(deps.config.keymap));
  }

  /** Wire handlers and init every component. */
  start(): void {
    const size = this.deps.terminal.size();
    for (const component of this.components) {
      component.registerActionHandler(this.channel);
      component.registerConfigHandler(this.deps.config);
      component.registerSettingsHandler(this.deps.settings);
      component.init(size);
    }
  }

  async run(): Promise<void> {
    const { terminal, events } = this.deps;
    terminal.enter();
    try {
      this.start();
      events.start();
      this.channel.send({ type: 'Render' });
      this.drain();

      while (!this.shouldQuit) {
        const event = await events.next();
        this.handleEvent(event);
        this.drain();

        if (this.shouldSuspend) {
          terminal.suspend();
          terminal.enter();
          this.channel.send({ type: 'Resume' });
          this.channel.send({ type: 'ClearScreen' });
          this.drain();
        }
      }
    } finally {
      events.stop();
      this.channel.close();
      terminal.exit();
    }
  }

  /** Queue whatever a raw event produces. A null event means the source is gone. */
  handleEvent(event: TerminalEvent | null): void {
    if (!event) {
      this.channel.send({ type: 'Quit' });
      return;
    }

    for (const component of this.components) {
      try {
        const action = component.handleEvents(event);
        if (action) this.channel.send(action);
      } catch (error) {
        this.channel.send({ type: 'Error', message: errorMessage(error) });
      }
    }

    switch (event.type) {
      case 'Tick':
        this.channel.send({ type: 'Tick' });
        break;
      case 'Render':
        this.channel.send({ type: 'Render' });
        break;
      case 'Resize':
        this.channel.send({ type: 'Resize', width: event.width, height: event.height });
        break;
      case 'Quit':
        this.channel.send({ type: 'Quit' });
        break;
      case 'Key':
        if (shouldAllowShortcuts({ inFormView: this.inFormView, searchActive: this.viewManager.textInputActive })) {
          const action = this.resolver.resolve(event.key);
          if (action) this.channel.send(action);
        }
        break;
      case 'Mouse':
        break;
    }
  }

  /**
   * Process queued actions in passes. Follow-ups sent while a pass runs are picked up by the next
   * pass, so every component sees an action before any of its consequences.
   */
  drain(): void {
    for (let pass = 0; pass < MAX_DRAIN_PASSES; pass++) {
      const batch = this.channel.drain();
      if (batch.length === 0) return;
      for (const action of batch) this.process(action);
    }
  }

  process(action: Action): void {
    if (action.type !== 'Tick' && action.type !== 'Render') {
      logger.debug('action', { action: describeAction(action) });
    }

    switch (action.type) {
      case 'Tick':
        this.resolver.clear();
        break;
      case 'Quit':
        this.shouldQuit = true;
        break;
      case 'Suspend':
        this.shouldSuspend = true;
        break;
      case 'Resume':
        this.shouldSuspend = false;
        break;
      case 'ClearScreen':
        this.deps.terminal.clear();
        break;
      case 'Resize':
      case 'Render':
        this.render();
        break;
      case 'LaunchWithProfile':
        this.launch(action.id);
        break;
      default:
        break;
    }
    this.inFormView = nextInFormView(this.inFormView, action);

    for (const component of this.components) {
      try {
        const followUp = component.update(action);
        if (followUp) this.channel.send(followUp);
      } catch (error) {
        this.channel.send({ type: 'Error', message: errorMessage(error) });
      }
    }
  }

  render(): void {
    const { width, height } = this.deps.terminal.size();
    const theme = themeByName(this.deps.settings.read((s) => s.theme));
    const frame = new Frame(width, height, theme);
    for (const component of this.components) {
      try {
        component.draw(frame, frame.area);
      } catch (error) {
        this.channel.send({ type: 'Error', message: errorMessage(error) });
      }
    }
    this.deps.terminal.draw(frame);
  }

  /** Hand the terminal to the launched CLI and take it back afterwards. */
  private launch(profileId: string): void {
    const { terminal, launcher, storage } = this.deps;
    let outcome: Action;
    try {
      const profile = storage.loadProfile(profileId);
      terminal.exit();
      try {
        launcher.launchWithProfile(profile);
      } finally {
        terminal.enter();
      }
      outcome = { type: 'Render' };
    } catch (error) {
      outcome = { type: 'Error', message: `Launch failed: ${errorMessage(error)}` };
    }
    this.channel.send({ type: 'ClearScreen' });
    this.channel.send(outcome);
  }
}
