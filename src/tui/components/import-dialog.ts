import { errorMessage } from '../../cli/errors.js';
import { importExtension } from '../../storage/importer.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import type { Frame } from '../frame.js';
import { renderLabeledInputField } from '../input-render.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import { centeredRect, type Rect } from '../layout.js';
import { applyTextInputKey, createTextInput, type TextInputState } from '../text-input.js';

export class ImportDialog extends BaseComponent {
  private input: TextInputState = createTextInput('');

  constructor(
    private readonly storage: Storage,
    private readonly now: () => Date = () => new Date()
  ) {
    super();
  }

  get value(): string {
    return this.input.value;
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    if (isKey(key, 'Esc')) return { type: 'NavigateBack' };
    if (isKey(key, 'Enter')) return this.submit();
    const result = applyTextInputKey(this.input, key);
    if (result) this.input = result.state;
    return null;
  }

  submit(): Action {
    const sourcePath = this.input.value.trim();
    if (!sourcePath) return { type: 'Error', message: 'Enter a path to import' };
    try {
      const ext = importExtension(this.storage, sourcePath, this.now());
      this.send({ type: 'RefreshExtensions' });
      this.send({ type: 'Success', message: `Imported extension "${ext.name}"` });
      return { type: 'NavigateBack' };
    } catch (error) {
      return { type: 'Error', message: `Import failed: ${errorMessage(error)}` };
    }
  }

  draw(frame: Frame, area: Rect): void {
    const box = centeredRect(area, 72, 8);
    frame.drawBox(box, { bg: frame.theme.background }, 'Import extension');
    const x = box.x + 2;
    const width = box.width - 4;
    frame.setString(x, box.y + 2, 'Directory with gemini-extension.json, a .json manifest or a .md file', { fg: frame.theme.muted }, width);
    renderLabeledInputField(frame, x, box.y + 4, {
      label: 'Path: ',
      input: this.input,
      width,
      placeholder: '~/extensions/my-extension',
    });
    frame.setString(x, box.y + 6, 'Enter: import | Esc: cancel', { fg: frame.theme.muted }, width);
  }
}
