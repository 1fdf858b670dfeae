import { errorMessage } from '../../cli/errors.js';
import { parseTagList, slugifyName, type Extension } from '../../schema/index.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import type { Frame } from '../frame.js';
import type { KeyEvent } from '../key-utils.js';
import { inset, type Rect } from '../layout.js';
import { FormController, fieldText, textField } from './form-fields.js';
import { drawStatusBar } from './status-bar.js';

export type ExtensionFormMode = { mode: 'create' } | { mode: 'edit'; extension: Extension };

export class ExtensionForm extends BaseComponent {
  readonly form: FormController;

  constructor(
    private readonly storage: Storage,
    readonly target: ExtensionFormMode,
    private readonly now: () => Date = () => new Date()
  ) {
    super();
    const ext = target.mode === 'edit' ? target.extension : null;
    this.form = new FormController([
      textField('name', 'Name', ext?.name ?? '', 'My Extension'),
      textField('version', 'Version', ext?.version ?? '1.0.0'),
      textField('description', 'Description', ext?.description ?? ''),
      textField('tags', 'Tags', ext?.metadata.tags.join(', ') ?? '', 'comma separated'),
    ]);
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    const result = this.form.handleKey(key);
    if (result.kind === 'cancel') return { type: 'NavigateBack' };
    if (result.kind === 'submit') return this.submit();
    return null;
  }

  /** Saves the record; on success the refresh and notice are sent and the form asks to close. */
  submit(): Action {
    const fields = this.form.fields;
    const name = fieldText(fields, 'name');
    if (!name) return { type: 'Error', message: 'Name is required' };
    const version = fieldText(fields, 'version') || '1.0.0';
    const description = fieldText(fields, 'description') || undefined;
    const tags = parseTagList(fieldText(fields, 'tags'));

    let extension: Extension;
    if (this.target.mode === 'edit') {
      const existing = this.target.extension;
      extension = { ...existing, name, version, description, metadata: { ...existing.metadata, tags } };
    } else {
      const id = slugifyName(name);
      if (!id) return { type: 'Error', message: `Cannot derive an id from name "${name}"` };
      if (this.storage.listExtensions().some((e) => e.id === id)) {
        return { type: 'Error', message: `Extension already exists: ${id}` };
      }
      extension = {
        id,
        name,
        version,
        description,
        mcpServers: {},
        metadata: { importedAt: this.now().toISOString(), tags },
      };
    }

    try {
      this.storage.saveExtension(extension);
    } catch (error) {
      return { type: 'Error', message: errorMessage(error) };
    }
    this.send({ type: 'RefreshExtensions' });
    this.send({ type: 'Success', message: `Saved extension "${name}"` });
    return { type: 'NavigateBack' };
  }

  draw(frame: Frame, area: Rect): void {
    const body = drawStatusBar(frame, area, 'Tab/Down: next | Shift+Tab/Up: previous | Ctrl+s: save | Esc: cancel');
    const title = this.target.mode === 'edit' ? `Edit ${this.target.extension.name}` : 'New extension';
    frame.drawBox(body, {}, title);
    this.form.draw(frame, inset(body, 2), 14);
  }
}
