import { errorMessage } from '../cli/errors.js';
import type { Config } from '../config/loader.js';
import { logger } from '../logging/logger.js';
import { profileDisplayName } from '../schema/index.js';
import type { SharedSettings } from '../settings/shared-settings.js';
import type { Storage } from '../storage/storage.js';
import type { Action } from './action.js';
import type { ActionSender } from './action-channel.js';
import { BaseComponent, type Component } from './component.js';
import { ConfirmDialog } from './components/confirm-dialog.js';
import { ExtensionDetail } from './components/extension-detail.js';
import { ExtensionForm } from './components/extension-form.js';
import { ExtensionList } from './components/extension-list.js';
import { ImportDialog } from './components/import-dialog.js';
import { ProfileDetail } from './components/profile-detail.js';
import { ProfileForm } from './components/profile-form.js';
import { ProfileList } from './components/profile-list.js';
import { SettingsView } from './components/settings-view.js';
import { TabBar } from './components/tab-bar.js';
import type { TerminalEvent } from './event.js';
import { truncateEndByWidth, type Frame } from './frame.js';
import { isKey } from './key-utils.js';
import { centeredRect, inset, splitBottom, splitTop, TAB_BAR_HEIGHT, type Rect } from './layout.js';
import { createTimedMessage, isTimedMessageExpired, type TimedMessage } from './overlay.js';
import type { TerminalSize } from './terminal.js';
import type { ViewType } from './view-type.js';

export interface ViewManagerOptions {
  now?: () => number;
}

/** Word-wrap `text` into lines of at most `width` columns. */
export function wrapText(text: string, width: number): string[] {
  if (width <= 0) return [];
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    let line = '';
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      if (!line) line = word;
      else if (line.length + 1 + word.length <= width) line += ` ${word}`;
      else {
        lines.push(line);
        line = word;
      }
      while (line.length > width) {
        lines.push(line.slice(0, width));
        line = line.slice(width);
      }
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Owns every view, which one is active, and the cross-view state: one-slot history, pending
 * edit/delete ids, the error overlay and the success notice.
 */
export class ViewManager extends BaseComponent {
  currentView: ViewType = 'ExtensionList';
  previousView: ViewType | null = null;
  editingExtensionId: string | null = null;
  editingProfileId: string | null = null;
  deletingExtensionId: string | null = null;
  deletingProfileId: string | null = null;
  cameFromDetailView = false;
  errorOverlay: TimedMessage | null = null;
  notice: TimedMessage | null = null;

  readonly tabBar = new TabBar();
  private readonly views = new Map<ViewType, Component>();
  private readonly extensionDetail: ExtensionDetail;
  private readonly profileDetail: ProfileDetail;
  private readonly now: () => number;
  private size: TerminalSize = { width: 80, height: 24 };

  constructor(
    private readonly storage: Storage,
    options: ViewManagerOptions = {}
  ) {
    super();
    this.now = options.now ?? Date.now;
    this.extensionDetail = new ExtensionDetail(storage);
    this.profileDetail = new ProfileDetail(storage);
  }

  view(type: ViewType): Component | null {
    return this.views.get(type) ?? null;
  }

  /** True while the active view takes free text: list search or key capture. */
  get textInputActive(): boolean {
    const view = this.view(this.currentView);
    if (view instanceof ExtensionList) return view.searchActive;
    if (view instanceof SettingsView) return view.capturing !== null;
    return false;
  }

  override registerActionHandler(tx: ActionSender): void {
    super.registerActionHandler(tx);
    for (const child of this.children()) child.registerActionHandler(tx);
  }

  override registerConfigHandler(config: Config): void {
    super.registerConfigHandler(config);
    for (const child of this.children()) child.registerConfigHandler(config);
  }

  override registerSettingsHandler(settings: SharedSettings): void {
    super.registerSettingsHandler(settings);
    for (const child of this.children()) child.registerSettingsHandler(settings);
  }

  override init(size: TerminalSize): void {
    this.size = size;
    this.wire(this.tabBar);
    this.register('ExtensionList', new ExtensionList(this.storage));
    this.register('ExtensionDetail', this.extensionDetail);
    this.register('ProfileList', new ProfileList(this.storage));
    this.register('ProfileDetail', this.profileDetail);
    this.register('Settings', new SettingsView());
    this.tabBar.setView(this.currentView);
  }

  private children(): Component[] {
    return [this.tabBar, ...this.views.values()];
  }

  private wire(component: Component): void {
    if (this.tx) component.registerActionHandler(this.tx);
    component.registerConfigHandler(this.config);
    component.registerSettingsHandler(this.settings);
    component.init(this.size);
  }

  /** Put `component` in the slot for `type`, replacing whatever was there. */
  private register(type: ViewType, component: Component): void {
    this.wire(component);
    this.views.set(type, component);
  }

  private navigate(to: ViewType): void {
    if (to === this.currentView) return;
    // A consumed dialog is not somewhere to go back to.
    this.previousView = this.currentView === 'ConfirmDelete' ? null : this.currentView;
    this.currentView = to;
    this.tabBar.setView(to);
    logger.debug('navigate', { from: this.previousView, to });
  }

  private clearEditing(): void {
    this.editingExtensionId = null;
    this.editingProfileId = null;
    this.cameFromDetailView = false;
  }

  override handleEvents(event: TerminalEvent | null): Action | null {
    if (event?.type === 'Key' && this.errorOverlay) {
      if (isKey(event.key, 'Esc')) this.errorOverlay = null;
      return null;
    }
    return this.view(this.currentView)?.handleEvents(event) ?? null;
  }

  override update(action: Action): Action | null {
    let result: Action | null;
    try {
      result = this.transition(action);
    } catch (error) {
      result = { type: 'Error', message: errorMessage(error) };
    }

    for (const child of this.children()) {
      try {
        const followUp = child.update(action);
        if (followUp) this.send(followUp);
      } catch (error) {
        this.send({ type: 'Error', message: errorMessage(error) });
      }
    }
    return result;
  }

  private transition(action: Action): Action | null {
    switch (action.type) {
      case 'ViewExtensionDetails':
        this.extensionDetail.show(this.storage.loadExtension(action.id));
        this.navigate('ExtensionDetail');
        return null;

      case 'ViewProfileDetails':
        this.profileDetail.show(this.storage.loadProfile(action.id));
        this.navigate('ProfileDetail');
        return null;

      case 'CreateNewExtension':
        this.clearEditing();
        this.register('ExtensionCreate', new ExtensionForm(this.storage, { mode: 'create' }));
        this.navigate('ExtensionCreate');
        return null;

      case 'CreateProfile':
        this.clearEditing();
        this.register('ProfileCreate', new ProfileForm(this.storage, { mode: 'create' }));
        this.navigate('ProfileCreate');
        return null;

      case 'EditExtension': {
        const extension = this.storage.loadExtension(action.id);
        this.cameFromDetailView = this.currentView === 'ExtensionDetail';
        this.editingExtensionId = action.id;
        this.register('ExtensionEdit', new ExtensionForm(this.storage, { mode: 'edit', extension }));
        this.navigate('ExtensionEdit');
        return null;
      }

      case 'EditProfile': {
        const profile = this.storage.loadProfile(action.id);
        this.cameFromDetailView = this.currentView === 'ProfileDetail';
        this.editingProfileId = action.id;
        this.register('ProfileEdit', new ProfileForm(this.storage, { mode: 'edit', profile }));
        this.navigate('ProfileEdit');
        return null;
      }

      case 'ImportExtension':
        this.register('ExtensionImport', new ImportDialog(this.storage));
        this.navigate('ExtensionImport');
        return null;

      case 'NavigateToExtensions':
        this.clearEditing();
        this.navigate('ExtensionList');
        return null;

      case 'NavigateToProfiles':
        this.clearEditing();
        this.navigate('ProfileList');
        return null;

      case 'NavigateToSettings':
        this.clearEditing();
        this.navigate('Settings');
        return null;

      case 'NavigateBack':
        this.navigateBack();
        return null;

      case 'DeleteExtension':
        return this.requestExtensionDelete(action.id);

      case 'DeleteProfile':
        return this.requestProfileDelete(action.id);

      case 'ConfirmDelete':
        return this.confirmDelete();

      case 'CancelDelete':
        this.deletingExtensionId = null;
        this.deletingProfileId = null;
        this.leaveConfirmDialog(null);
        return null;

      case 'SetDefaultProfile': {
        const profile = this.storage.setDefaultProfile(action.id);
        this.send({ type: 'RefreshProfiles' });
        return { type: 'Success', message: `Default profile: ${profileDisplayName(profile)}` };
      }

      case 'Error':
        logger.warn('error shown', { message: action.message });
        this.errorOverlay = createTimedMessage(action.message, this.now());
        return null;

      case 'Success':
        this.notice = createTimedMessage(action.message, this.now());
        return null;

      case 'Tick': {
        const now = this.now();
        if (this.errorOverlay && isTimedMessageExpired(this.errorOverlay, now, this.config.errorDisplayMs)) {
          this.errorOverlay = null;
        }
        if (this.notice && isTimedMessageExpired(this.notice, now, this.config.noticeDisplayMs)) {
          this.notice = null;
        }
        return null;
      }

      default:
        return null;
    }
  }

  private navigateBack(): void {
    switch (this.currentView) {
      case 'ExtensionDetail':
        this.navigate('ExtensionList');
        return;
      case 'ProfileDetail':
        this.navigate('ProfileList');
        return;
      case 'ExtensionEdit': {
        const toDetail = this.cameFromDetailView && this.editingExtensionId !== null;
        this.clearEditing();
        this.navigate(toDetail ? 'ExtensionDetail' : 'ExtensionList');
        return;
      }
      case 'ProfileEdit': {
        const toDetail = this.cameFromDetailView && this.editingProfileId !== null;
        this.clearEditing();
        this.navigate(toDetail ? 'ProfileDetail' : 'ProfileList');
        return;
      }
      case 'ExtensionCreate':
        this.navigate('ExtensionList');
        return;
      case 'ProfileCreate':
        this.navigate('ProfileList');
        return;
      default:
        if (this.previousView) this.navigate(this.previousView);
    }
  }

  private requestExtensionDelete(id: string): Action | null {
    const users = this.storage.findProfilesReferencingExtension(id);
    if (users.length > 0) {
      const names = users.map((p) => profileDisplayName(p)).join(', ');
      return { type: 'Error', message: `Cannot delete extension "${id}": it is used by profile(s): ${names}` };
    }

    let message = 'Delete this extension? This cannot be undone.';
    try {
      message = `Delete extension "${this.storage.loadExtension(id).name}"? This cannot be undone.`;
    } catch (error) {
      logger.debug('delete prompt without a name', { id, error: errorMessage(error) });
    }
    this.deletingExtensionId = id;
    this.deletingProfileId = null;
    this.openConfirmDialog('Delete extension', message);
    return null;
  }

  private requestProfileDelete(id: string): Action | null {
    let message = 'Delete this profile? This cannot be undone.';
    try {
      message = `Delete profile "${profileDisplayName(this.storage.loadProfile(id))}"? This cannot be undone.`;
    } catch (error) {
      logger.debug('delete prompt without a name', { id, error: errorMessage(error) });
    }
    this.deletingProfileId = id;
    this.deletingExtensionId = null;
    this.openConfirmDialog('Delete profile', message);
    return null;
  }

  private openConfirmDialog(title: string, message: string): void {
    this.register('ConfirmDelete', new ConfirmDialog(title, message, { type: 'ConfirmDelete' }, { type: 'CancelDelete' }));
    this.navigate('ConfirmDelete');
  }

  private confirmDelete(): Action | null {
    const profileId = this.deletingProfileId;
    const extensionId = this.deletingExtensionId;
    this.deletingProfileId = null;
    this.deletingExtensionId = null;

    let result: Action | null = null;
    let deletedDetail: ViewType | null = null;
    try {
      if (profileId !== null) {
        this.storage.deleteProfile(profileId);
        this.send({ type: 'RefreshProfiles' });
        result = { type: 'Render' };
        if (this.profileDetail.current?.id === profileId) deletedDetail = 'ProfileDetail';
      } else if (extensionId !== null) {
        this.storage.deleteExtension(extensionId);
        this.send({ type: 'RefreshExtensions' });
        result = { type: 'Render' };
        if (this.extensionDetail.current?.id === extensionId) deletedDetail = 'ExtensionDetail';
      }
    } catch (error) {
      result = { type: 'Error', message: `Delete failed: ${errorMessage(error)}` };
    }

    this.leaveConfirmDialog(deletedDetail);
    return result;
  }

  /** Return to the view under the dialog; a detail view of the deleted record gives way to its list. */
  private leaveConfirmDialog(deletedDetail: ViewType | null): void {
    if (this.currentView !== 'ConfirmDelete') return;
    let target = this.previousView ?? 'ExtensionList';
    if (target === deletedDetail) target = target === 'ProfileDetail' ? 'ProfileList' : 'ExtensionList';
    this.navigate(target);
  }

  draw(frame: Frame, area: Rect): void {
    const [tabArea, body] = splitTop(area, TAB_BAR_HEIGHT);
    this.tabBar.draw(frame, tabArea);

    if (this.currentView === 'ConfirmDelete' && this.previousView) {
      this.view(this.previousView)?.draw(frame, body);
    }
    this.view(this.currentView)?.draw(frame, body);

    if (this.notice) this.drawNotice(frame, body, this.notice.message);
    if (this.errorOverlay) this.drawErrorOverlay(frame, body, this.errorOverlay.message);
  }

  private drawNotice(frame: Frame, area: Rect, message: string): void {
    const [, bottom] = splitBottom(area, 1);
    if (bottom.height === 0) return;
    const text = ` ✓ ${message} `;
    frame.fill(bottom, { bg: frame.theme.success });
    frame.setString(bottom.x + 1, bottom.y, truncateEndByWidth(text, bottom.width - 2), {
      fg: frame.theme.background,
      bg: frame.theme.success,
      bold: true,
    });
  }

  private drawErrorOverlay(frame: Frame, area: Rect, message: string): void {
    const width = Math.min(60, Math.max(30, area.width - 8));
    const lines = wrapText(message, width - 4);
    const box = centeredRect(area, width, lines.length + 4);
    frame.drawBox(box, { fg: frame.theme.error, bg: frame.theme.background }, 'Error');
    const inner = inset(box, 1);
    lines.slice(0, Math.max(0, inner.height - 1)).forEach((line, i) => {
      frame.setString(inner.x + 1, inner.y + i, line, { fg: frame.theme.text, bg: frame.theme.background });
    });
    frame.setString(inner.x + 1, inner.y + inner.height - 1, 'Esc to dismiss', {
      fg: frame.theme.muted,
      bg: frame.theme.background,
    });
  }
}
