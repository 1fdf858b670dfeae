import type { Extension } from '../../schema/index.js';
import type { Storage } from '../../storage/storage.js';
import type { Action } from '../action.js';
import { BaseComponent } from '../component.js';
import { truncateEndByWidth, type Frame } from '../frame.js';
import type { KeyEvent } from '../key-utils.js';
import { inset, type Rect } from '../layout.js';
import { drawEmptyState, drawStatusBar } from './status-bar.js';

/** Text lines describing an extension, as shown in the detail view. */
export function describeExtension(ext: Extension): string[] {
  const lines = [`Name:        ${ext.name}`, `ID:          ${ext.id}`, `Version:     ${ext.version}`];
  if (ext.description) lines.push(`Description: ${ext.description}`);
  if (ext.metadata.tags.length > 0) lines.push(`Tags:        ${ext.metadata.tags.join(', ')}`);
  lines.push(`Imported:    ${ext.metadata.importedAt}`);
  if (ext.metadata.sourcePath) lines.push(`Source:      ${ext.metadata.sourcePath}`);

  const servers = Object.entries(ext.mcpServers);
  lines.push('', `MCP servers (${servers.length})`);
  for (const [name, server] of servers) {
    const command = [server.command ?? '', ...(server.args ?? [])].join(' ').trim();
    lines.push(`  • ${name}${command ? `: ${command}` : ''}`);
  }

  if (ext.contextContent !== undefined) {
    lines.push('', `Context (${ext.contextFileName ?? 'GEMINI.md'})`);
    for (const line of ext.contextContent.split('\n')) lines.push(`  ${line}`);
  }
  return lines;
}

export class ExtensionDetail extends BaseComponent {
  private extension: Extension | null = null;
  private scroll = 0;

  constructor(private readonly storage: Storage) {
    super();
  }

  get current(): Extension | null {
    return this.extension;
  }

  show(extension: Extension): void {
    this.extension = extension;
    this.scroll = 0;
  }

  override update(action: Action): Action | null {
    if (action.type === 'RefreshExtensions' && this.extension) {
      const id = this.extension.id;
      this.extension = this.storage.listExtensions().find((e) => e.id === id) ?? null;
    }
    return null;
  }

  override handleKeyEvent(key: KeyEvent): Action | null {
    const ext = this.extension;
    if (this.keys.matches(key, 'back')) return { type: 'NavigateBack' };
    if (this.keys.matches(key, 'quit')) return { type: 'Quit' };
    if (this.keys.matches(key, 'up')) this.scroll = Math.max(0, this.scroll - 1);
    else if (this.keys.matches(key, 'down')) this.scroll += 1;
    else if (ext && this.keys.matches(key, 'edit')) return { type: 'EditExtension', id: ext.id };
    else if (ext && this.keys.matches(key, 'delete')) return { type: 'DeleteExtension', id: ext.id };
    return null;
  }

  draw(frame: Frame, area: Rect): void {
    const body = drawStatusBar(
      frame,
      area,
      this.keys.buildHelpText([
        ['back', 'back'],
        ['edit', 'edit'],
        ['delete', 'delete'],
        ['up', 'scroll up'],
        ['down', 'scroll down'],
      ])
    );
    if (!this.extension) {
      drawEmptyState(frame, body, 'Extension not found', 'It may have been deleted');
      return;
    }

    frame.drawBox(body, {}, this.extension.name);
    const inner = inset(body, 1);
    const lines = describeExtension(this.extension);
    this.scroll = Math.min(this.scroll, Math.max(0, lines.length - inner.height));
    lines.slice(this.scroll, this.scroll + inner.height).forEach((line, i) => {
      const isHeading = line.startsWith('MCP servers') || line.startsWith('Context (');
      frame.setString(inner.x + 1, inner.y + i, truncateEndByWidth(line, inner.width - 2), {
        fg: isHeading ? frame.theme.accent : frame.theme.text,
        bold: isHeading,
      });
    });
  }
}
