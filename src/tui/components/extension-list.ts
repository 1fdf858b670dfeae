import type { Extension } from '../../schema/index.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import { truncateEndByWidth, type Frame } from '../frame.js';
import { renderLabeledInputField } from '../input-render.js';
import { isKey, type KeyEvent } from '../key-utils.js';
import { moveSelection, scrollOffset, splitTop, type Rect } from '../layout.js';
import { applyTextInputKey, createTextInput, type TextInputState } from '../text-input.js';
import type { TerminalSize } from '../terminal.js';
import { drawEmptyState, drawStatusBar } from './status-bar.js';
import { tabShortcut } from './tab-bar.js';

export function filterExtensions(extensions: readonly Extension[], query: string): Extension[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [...extensions];
  return extensions.filter(
    (e) =>
      e.name.toLowerCase().includes(needle) ||
      e.id.toLowerCase().includes(needle) ||
      (e.description ?? '').toLowerCase().includes(needle) ||
      e.metadata.tags.some((t) => t.toLowerCase().includes(needle))
  );
}

export class ExtensionList extends BaseComponent {
  private extensions: Extension[] = [];
  private selected = 0;
  private search: TextInputState | null = null;
  private query = '';

  constructor(private readonly storage: Storage) {
    super();
  }

  override init(_size: TerminalSize): void {
    this.refresh();
  }

  get visible(): Extension[] {
    return filterExtensions(this.extensions, this.query);
  }

  get selectedExtension(): Extension | null {
    return this.visible[this.selected] ?? null;
  }

  get searchActive(): boolean {
    return this.search !== null;
  }

  refresh(): void {
    this.extensions = this.storage.listExtensions();
    this.selected = moveSelection(this.selected, 0, this.visible.length);
  }

  override update(action: Action): Action | null {
    if (action.type === 'RefreshExtensions') this.refresh();
    return null;
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    if (this.search) return this.handleSearchKey(this.search, key);

    const keys = this.keys;
    if (keys.matches(key, 'up')) this.selected = moveSelection(this.selected, -1, this.visible.length);
    else if (keys.matches(key, 'down')) this.selected = moveSelection(this.selected, 1, this.visible.length);
    else if (keys.matches(key, 'search')) this.search = createTextInput(this.query);
    else if (keys.matches(key, 'create')) return { type: 'CreateNewExtension' };
    else if (keys.matches(key, 'import')) return { type: 'ImportExtension' };
    else if (keys.matches(key, 'quit')) return { type: 'Quit' };
    else if (isKey(key, 'Esc') && this.query) {
      this.query = '';
      this.selected = 0;
    } else {
      const shortcut = tabShortcut(key, 'Extensions');
      if (shortcut) return shortcut;
      const ext = this.selectedExtension;
      if (!ext) return null;
      if (keys.matches(key, 'select')) return { type: 'ViewExtensionDetails', id: ext.id };
      if (keys.matches(key, 'edit')) return { type: 'EditExtension', id: ext.id };
      if (keys.matches(key, 'delete')) return { type: 'DeleteExtension', id: ext.id };
    }
    return null;
  }

  private handleSearchKey(search: TextInputState, key: KeyEvent): Action | null {
    if (isKey(key, 'Esc')) {
      this.search = null;
      this.query = '';
      this.selected = 0;
      return null;
    }
    if (isKey(key, 'Enter')) {
      this.search = null;
      return null;
    }
    const result = applyTextInputKey(search, key);
    if (result) {
      this.search = result.state;
      if (result.didChangeValue) {
        this.query = result.state.value;
        this.selected = 0;
      }
    }
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const { theme } = frame;
    const help = this.search
      ? 'Enter: apply | Esc: clear'
      : this.keys.buildHelpText([
          ['up', 'up'],
          ['down', 'down'],
          ['select', 'details'],
          ['create', 'new'],
          ['import', 'import'],
          ['edit', 'edit'],
          ['delete', 'delete'],
          ['search', 'search'],
          ['quit', 'quit'],
        ]);
    let body = drawStatusBar(frame, area, help);

    if (this.search || this.query) {
      const [searchRow, rest] = splitTop(body, 2);
      renderLabeledInputField(frame, searchRow.x + 1, searchRow.y, {
        label: 'Search: ',
        input: this.search ?? createTextInput(this.query),
        width: searchRow.width - 2,
        placeholder: 'name, id, description or tag',
        focused: this.search !== null,
      });
      body = rest;
    }

    const items = this.visible;
    if (items.length === 0) {
      if (this.query) drawEmptyState(frame, body, 'No matches', 'Esc clears the search');
      else drawEmptyState(frame, body, 'No extensions yet', 'Press n to create one or i to import');
      return;
    }

    const offset = scrollOffset(this.selected, body.height, items.length);
    items.slice(offset, offset + body.height).forEach((ext, i) => {
      const y = body.y + i;
      const isSelected = offset + i === this.selected;
      const style = isSelected ? { fg: theme.text, bg: theme.surface, bold: true } : { fg: theme.text };
      if (isSelected) frame.fill({ x: body.x, y, width: body.width, height: 1 }, { bg: theme.surface });
      let x = body.x + 1;
      x += frame.setString(x, y, isSelected ? '▶ ' : '  ', { fg: theme.accent, bg: style.bg });
      x += frame.setString(x, y, ext.name, style, 32);
      x += frame.setString(x, y, `  v${ext.version}`, { fg: theme.muted, bg: style.bg });
      const servers = Object.keys(ext.mcpServers).length;
      x += frame.setString(x, y, `  ${servers} server${servers === 1 ? '' : 's'}`, { fg: theme.primary, bg: style.bg });
      if (ext.description) {
        frame.setString(x + 2, y, truncateEndByWidth(ext.description, body.x + body.width - x - 3), {
          fg: theme.muted,
          bg: style.bg,
        });
      }
    });
  }
}
