import { errorMessage } from '../../cli/errors.js';
import { defaultLaunchConfig, parseTagList, slugifyName, type Extension, type Profile } from '../../schema/index.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import type { Frame } from '../frame.js';
import type { KeyEvent } from '../key-utils.js';
import { inset, type Rect } from '../layout.js';
import { FormController, fieldText, fieldToggle, textField, toggleField, type FormField } from './form-fields.js';
import { drawStatusBar } from './status-bar.js';

const ENV_ENTRY = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;
const EXTENSION_KEY_PREFIX = 'ext:';

/** Parse `A=1, B=two` into a variable map. Values cannot contain commas. */
export function parseEnvAssignments(text: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of text.split(',').map((e) => e.trim()).filter(Boolean)) {
    const match = entry.match(ENV_ENTRY);
    if (!match) throw new Error(`Invalid environment variable: ${entry}`);
    env[match[1] ?? ''] = (match[2] ?? '').trim();
  }
  return env;
}

export function formatEnvAssignments(env: Record<string, string>): string {
  return Object.entries(env)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ');
}

export type ProfileFormMode = { mode: 'create' } | { mode: 'edit'; profile: Profile };

export class ProfileForm extends BaseComponent {
  readonly form: FormController;

  constructor(
    private readonly storage: Storage,
    readonly target: ProfileFormMode,
    private readonly now: () => Date = () => new Date()
  ) {
    super();
    this.form = new FormController(this.buildFields(storage.listExtensions()));
  }

  private buildFields(extensions: readonly Extension[]): FormField[] {
    const p = this.target.mode === 'edit' ? this.target.profile : null;
    const launch = p?.launchConfig ?? defaultLaunchConfig();
    return [
      textField('name', 'Name', p?.name ?? '', 'Work'),
      textField('icon', 'Icon', p?.metadata.icon ?? ''),
      textField('description', 'Description', p?.description ?? ''),
      textField('workingDirectory', 'Directory', p?.workingDirectory ?? '', '~/projects'),
      textField('env', 'Environment', formatEnvAssignments(p?.environmentVariables ?? {}), 'KEY=value, OTHER=$HOME'),
      textField('tags', 'Tags', p?.metadata.tags.join(', ') ?? '', 'comma separated'),
      ...extensions.map((ext) =>
        toggleField(`${EXTENSION_KEY_PREFIX}${ext.id}`, `Ext: ${ext.name}`, p?.extensionIds.includes(ext.id) ?? false)
      ),
      toggleField('cleanLaunch', 'Clean launch', launch.cleanLaunch),
      toggleField('cleanupOnExit', 'Cleanup on exit', launch.cleanupOnExit),
    ];
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    const result = this.form.handleKey(key);
    if (result.kind === 'cancel') return { type: 'NavigateBack' };
    if (result.kind === 'submit') return this.submit();
    return null;
  }

  submit(): Action {
    const fields = this.form.fields;
    const name = fieldText(fields, 'name');
    if (!name) return { type: 'Error', message: 'Name is required' };

    let environmentVariables: Record<string, string>;
    try {
      environmentVariables = parseEnvAssignments(fieldText(fields, 'env'));
    } catch (error) {
      return { type: 'Error', message: errorMessage(error) };
    }

    const extensionIds = fields
      .filter((f) => f.kind === 'toggle' && f.key.startsWith(EXTENSION_KEY_PREFIX) && f.value)
      .map((f) => f.key.slice(EXTENSION_KEY_PREFIX.length));
    const existing = this.target.mode === 'edit' ? this.target.profile : null;
    const stamp = this.now().toISOString();
    const icon = fieldText(fields, 'icon') || undefined;
    const kept = existing?.launchConfig ?? defaultLaunchConfig();

    let id: string;
    if (existing) {
      id = existing.id;
    } else {
      id = slugifyName(name);
      if (!id) return { type: 'Error', message: `Cannot derive an id from name "${name}"` };
      if (this.storage.listProfiles().some((p) => p.id === id)) {
        return { type: 'Error', message: `Profile already exists: ${id}` };
      }
    }

    const profile: Profile = {
      id,
      name,
      description: fieldText(fields, 'description') || undefined,
      extensionIds,
      environmentVariables,
      workingDirectory: fieldText(fields, 'workingDirectory') || undefined,
      launchConfig: {
        cleanLaunch: fieldToggle(fields, 'cleanLaunch'),
        cleanupOnExit: fieldToggle(fields, 'cleanupOnExit'),
        preserveExtensions: kept.preserveExtensions,
      },
      metadata: {
        createdAt: existing?.metadata.createdAt ?? stamp,
        updatedAt: stamp,
        tags: parseTagList(fieldText(fields, 'tags')),
        isDefault: existing?.metadata.isDefault ?? false,
        icon,
      },
    };

    try {
      this.storage.saveProfile(profile);
    } catch (error) {
      return { type: 'Error', message: errorMessage(error) };
    }
    this.send({ type: 'RefreshProfiles' });
    this.send({ type: 'Success', message: `Saved profile "${name}"` });
    return { type: 'NavigateBack' };
  }

  draw(frame: Frame, area: Rect): void {
    const body = drawStatusBar(frame, area, 'Tab/Down: next | Shift+Tab/Up: previous | Space: toggle | Ctrl+s: save | Esc: cancel');
    const title = this.target.mode === 'edit' ? `Edit ${this.target.profile.name}` : 'New profile';
    frame.drawBox(body, {}, title);
    this.form.draw(frame, inset(body, 2), 16);
  }
}
