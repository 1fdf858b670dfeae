import { profileDisplayName, profileSummary, type Profile } from '../../schema/index.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import { truncateEndByWidth, type Frame } from '../frame.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import { moveSelection, scrollOffset, type Rect } from '../layout.js';
import type { TerminalSize } from '../terminal.js';
import { drawEmptyState, drawStatusBar } from './status-bar.js';
import { tabShortcut } from './tab-bar.js';

export class ProfileList extends BaseComponent {
  private profiles: Profile[] = [];
  private selected = 0;

  constructor(private readonly storage: Storage) {
    super();
  }

  override init(_size: TerminalSize): void {
    this.refresh();
  }

  get items(): readonly Profile[] {
    return this.profiles;
  }

  get selectedProfile(): Profile | null {
    return this.profiles[this.selected] ?? null;
  }

  refresh(): void {
    this.profiles = this.storage.listProfiles();
    this.selected = moveSelection(this.selected, 0, this.profiles.length);
  }

  override update(action: Action): Action | null {
    if (action.type === 'RefreshProfiles' || action.type === 'RefreshExtensions') this.refresh();
    return null;
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    const keys = this.keys;
    if (keys.matches(key, 'up')) {
      this.selected = moveSelection(this.selected, -1, this.profiles.length);
      return null;
    }
    if (keys.matches(key, 'down')) {
      this.selected = moveSelection(this.selected, 1, this.profiles.length);
      return null;
    }
    if (keys.matches(key, 'create')) return { type: 'CreateProfile' };
    if (keys.matches(key, 'quit')) return { type: 'Quit' };
    const shortcut = tabShortcut(key, 'Profiles');
    if (shortcut) return shortcut;

    const profile = this.selectedProfile;
    if (!profile) return null;
    if (keys.matches(key, 'select')) return { type: 'ViewProfileDetails', id: profile.id };
    if (keys.matches(key, 'edit')) return { type: 'EditProfile', id: profile.id };
    if (keys.matches(key, 'delete')) return { type: 'DeleteProfile', id: profile.id };
    if (keys.matches(key, 'launch')) return { type: 'LaunchWithProfile', id: profile.id };
    if (isKey(key, '*')) return { type: 'SetDefaultProfile', id: profile.id };
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const { theme } = frame;
    const help = this.keys.buildHelpText([
      ['select', 'details'],
      ['launch', 'launch'],
      ['create', 'new'],
      ['edit', 'edit'],
      ['delete', 'delete'],
      ['quit', 'quit'],
    ]);
    const body = drawStatusBar(frame, area, help ? `${help} | *: set default` : '*: set default');

    if (this.profiles.length === 0) {
      drawEmptyState(frame, body, 'No profiles yet', 'Press n to create one');
      return;
    }

    const offset = scrollOffset(this.selected, body.height, this.profiles.length);
    this.profiles.slice(offset, offset + body.height).forEach((profile, i) => {
      const y = body.y + i;
      const isSelected = offset + i === this.selected;
      const bg = isSelected ? theme.surface : undefined;
      if (isSelected) frame.fill({ x: body.x, y, width: body.width, height: 1 }, { bg: theme.surface });
      let x = body.x + 1;
      x += frame.setString(x, y, isSelected ? '▶ ' : '  ', { fg: theme.accent, bg });
      x += frame.setString(x, y, profileDisplayName(profile), { fg: theme.text, bg, bold: isSelected }, 32);
      if (profile.metadata.isDefault) x += frame.setString(x, y, ' (default)', { fg: theme.success, bg });
      x += frame.setString(x, y, `  ${profileSummary(profile)}`, { fg: theme.muted, bg });
      if (profile.description) {
        frame.setString(x + 2, y, truncateEndByWidth(profile.description, body.x + body.width - x - 3), { fg: theme.muted, bg });
      }
    });
  }
}
