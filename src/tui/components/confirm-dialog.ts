import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import type { Frame } from '../frame.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import { centeredRect, type Rect } from '../layout.js';

type Choice = 'confirm' | 'cancel';

/**
 * Yes/Cancel modal. Cancel is selected initially.
 */
export class ConfirmDialog extends BaseComponent {
  private choice: Choice = 'cancel';

  constructor(
    readonly title: string,
    readonly message: string,
    private readonly onConfirm: Action,
    private readonly onCancel: Action
  ) {
    super();
  }

  get selected(): Choice {
    return this.choice;
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    if (isKey(key, 'y') || isKey(key, 'Y', { shift: true })) return this.onConfirm;
    if (isKey(key, 'n') || isKey(key, 'N', { shift: true }) || isKey(key, 'Esc')) return this.onCancel;
    if (isKey(key, 'Enter')) return this.choice === 'confirm' ? this.onConfirm : this.onCancel;
    if (isKey(key, 'Left') || isKey(key, 'Right') || isKey(key, 'Tab') || isKey(key, 'BackTab') || isKey(key, 'h') || isKey(key, 'l')) {
      this.choice = this.choice === 'confirm' ? 'cancel' : 'confirm';
    }
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const { theme } = frame;
    const width = Math.min(Math.max(this.message.length + 6, 40), area.width);
    const box = centeredRect(area, width, 7);
    frame.drawBox(box, { fg: theme.warning, bg: theme.background }, this.title);
    frame.setString(box.x + 3, box.y + 2, this.message, { fg: theme.text }, box.width - 6);

    const yes = '  Yes  ';
    const cancel = ' Cancel ';
    const buttonsWidth = yes.length + 4 + cancel.length;
    let x = box.x + Math.floor((box.width - buttonsWidth) / 2);
    const y = box.y + 4;
    const active = { fg: theme.background, bg: theme.warning, bold: true };
    const idle = { fg: theme.muted, bg: theme.surface };
    x += frame.setString(x, y, yes, this.choice === 'confirm' ? active : idle);
    x += 4;
    frame.setString(x, y, cancel, this.choice === 'cancel' ? active : idle);
  }
}
