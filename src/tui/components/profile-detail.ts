import { profileDisplayName, type Extension, type Profile } from '../../schema/index.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import { truncateEndByWidth, type Frame } from '../frame.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import { inset, type Rect } from '../layout.js';
import { drawEmptyState, drawStatusBar } from './status-bar.js';

export function describeProfile(profile: Profile, extensions: readonly Extension[]): string[] {
  const lines = [`Name:        ${profileDisplayName(profile)}`, `ID:          ${profile.id}`];
  if (profile.description) lines.push(`Description: ${profile.description}`);
  if (profile.workingDirectory) lines.push(`Directory:   ${profile.workingDirectory}`);
  if (profile.metadata.isDefault) lines.push('Default:     yes');
  if (profile.metadata.tags.length > 0) lines.push(`Tags:        ${profile.metadata.tags.join(', ')}`);

  lines.push('', `Extensions (${profile.extensionIds.length})`);
  for (const id of profile.extensionIds) {
    const ext = extensions.find((e) => e.id === id);
    lines.push(ext ? `  • ${ext.name} v${ext.version}` : `  • ${id} (missing)`);
  }

  const env = Object.entries(profile.environmentVariables);
  lines.push('', `Environment (${env.length})`);
  for (const [name, value] of env) lines.push(`  ${name}=${value}`);

  const launch = profile.launchConfig;
  lines.push(
    '',
    'Launch',
    `  Clean launch:    ${launch.cleanLaunch ? 'yes' : 'no'}`,
    `  Cleanup on exit: ${launch.cleanupOnExit ? 'yes' : 'no'}`
  );
  if (launch.preserveExtensions.length > 0) lines.push(`  Preserve:        ${launch.preserveExtensions.join(', ')}`);
  return lines;
}

const HEADINGS = ['Extensions (', 'Environment (', 'Launch'];

export class ProfileDetail extends BaseComponent {
  private profile: Profile | null = null;
  private extensions: Extension[] = [];
  private scroll = 0;

  constructor(private readonly storage: Storage) {
    super();
  }

  get current(): Profile | null {
    return this.profile;
  }

  show(profile: Profile): void {
    this.profile = profile;
    this.extensions = this.storage.listExtensions();
    this.scroll = 0;
  }

  override update(action: Action): Action | null {
    if ((action.type === 'RefreshProfiles' || action.type === 'RefreshExtensions') && this.profile) {
      const id = this.profile.id;
      const fresh = this.storage.listProfiles().find((p) => p.id === id);
      if (fresh) this.show(fresh);
      else this.profile = null;
    }
    return null;
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    const profile = this.profile;
    if (this.keys.matches(key, 'back')) return { type: 'NavigateBack' };
    if (this.keys.matches(key, 'quit')) return { type: 'Quit' };
    if (this.keys.matches(key, 'up')) this.scroll = Math.max(0, this.scroll - 1);
    else if (this.keys.matches(key, 'down')) this.scroll += 1;
    else if (profile && this.keys.matches(key, 'edit')) return { type: 'EditProfile', id: profile.id };
    else if (profile && this.keys.matches(key, 'delete')) return { type: 'DeleteProfile', id: profile.id };
    else if (profile && this.keys.matches(key, 'launch')) return { type: 'LaunchWithProfile', id: profile.id };
    else if (profile && isKey(key, '*')) return { type: 'SetDefaultProfile', id: profile.id };
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const body = drawStatusBar(
      frame,
      area,
      this.keys.buildHelpText([
        ['back', 'back'],
        ['launch', 'launch'],
        ['edit', 'edit'],
        ['delete', 'delete'],
      ])
    );
    if (!this.profile) {
      drawEmptyState(frame, body, 'Profile not found', 'It may have been deleted');
      return;
    }

    frame.drawBox(body, {}, profileDisplayName(this.profile));
    const inner = inset(body, 1);
    const lines = describeProfile(this.profile, this.extensions);
    this.scroll = Math.min(this.scroll, Math.max(0, lines.length - inner.height));
    lines.slice(this.scroll, this.scroll + inner.height).forEach((line, i) => {
      const isHeading = HEADINGS.some((h) => line.startsWith(h));
      const isMissing = line.endsWith('(missing)');
      frame.setString(inner.x + 1, inner.y + i, truncateEndByWidth(line, inner.width - 2), {
        fg: isHeading ? frame.theme.accent : isMissing ? frame.theme.warning : frame.theme.text,
        bold: isHeading,
      });
    });
  }
}
