import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import type { Frame } from '../frame.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import type { Rect } from '../layout.js';
import type { ViewType } from '../view-type.js';

export type Tab = 'Extensions' | 'Profiles' | 'Settings';

export const TABS: readonly Tab[] = ['Extensions', 'Profiles', 'Settings'];

export function tabForView(view: ViewType): Tab {
  switch (view) {
    case 'ExtensionList':
    case 'ExtensionDetail':
    case 'ExtensionCreate':
    case 'ExtensionEdit':
    case 'ExtensionImport':
      return 'Extensions';
    case 'ProfileList':
    case 'ProfileDetail':
    case 'ProfileCreate':
    case 'ProfileEdit':
      return 'Profiles';
    case 'Settings':
      return 'Settings';
    case 'ConfirmDelete':
      return 'Extensions';
  }
}

const BREADCRUMBS: Record<ViewType, string> = {
  ExtensionList: '',
  ExtensionDetail: 'Details',
  ExtensionCreate: 'New',
  ExtensionEdit: 'Edit',
  ExtensionImport: 'Import',
  ProfileList: '',
  ProfileDetail: 'Details',
  ProfileCreate: 'New',
  ProfileEdit: 'Edit',
  ConfirmDelete: 'Confirm',
  Settings: '',
};

export class TabBar extends BaseComponent {
  private active: Tab = 'Extensions';
  private breadcrumb = '';

  get activeTab(): Tab {
    return this.active;
  }

  /** ConfirmDelete keeps the tab of the view it covers. */
  setView(view: ViewType): void {
    if (view !== 'ConfirmDelete') this.active = tabForView(view);
    this.breadcrumb = BREADCRUMBS[view];
  }

  override update(action: Action): Action | null {
    if (action.type === 'NavigateToExtensions') this.active = 'Extensions';
    if (action.type === 'NavigateToProfiles') this.active = 'Profiles';
    if (action.type === 'NavigateToSettings') this.active = 'Settings';
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const { theme } = frame;
    frame.drawBox(area);
    let x = area.x + 2;
    const y = area.y + 1;
    TABS.forEach((tab, i) => {
      if (i > 0) x += frame.setString(x, y, ' │ ', { fg: theme.border });
      const isActive = tab === this.active;
      x += frame.setString(x, y, ` ${i + 1} ${tab} `, isActive ? { fg: theme.background, bg: theme.primary, bold: true } : { fg: theme.muted });
    });
    if (this.breadcrumb) {
      const crumb = `${this.active} › ${this.breadcrumb}`;
      const crumbX = area.x + area.width - crumb.length - 2;
      if (crumbX > x + 1) frame.setString(crumbX, y, crumb, { fg: theme.accent });
    }
  }
}

const NAVIGATE: Record<Tab, Action> = {
  Extensions: { type: 'NavigateToExtensions' },
  Profiles: { type: 'NavigateToProfiles' },
  Settings: { type: 'NavigateToSettings' },
};

/** `1`..`3` jump to a tab; Tab and Shift+Tab cycle from `current`. */
export function tabShortcut(key: KeyEvent, current: Tab): Action | null {
  const index = TABS.indexOf(current);
  let target: Tab | undefined;
  if (isKey(key, '1')) target = 'Extensions';
  else if (isKey(key, '2')) target = 'Profiles';
  else if (isKey(key, '3')) target = 'Settings';
  else if (isKey(key, 'Tab')) target = TABS[(index + 1) % TABS.length];
  else if (isKey(key, 'BackTab', { shift: true })) target = TABS[(index + TABS.length - 1) % TABS.length];
  return target && target !== current ? NAVIGATE[target] : null;
}
