import { truncateEndByWidth, type Frame } from '../frame.js';
import { splitBottom, STATUS_BAR_HEIGHT, type Rect } from '../layout.js';

/** Draw a one-line hint bar at the bottom of `area` and return the space above it. */
export function drawStatusBar(frame: Frame, area: Rect, text: string): Rect {
  const [body, bar] = splitBottom(area, STATUS_BAR_HEIGHT);
  if (bar.height === 0) return body;
  frame.fill(bar, { bg: frame.theme.surface });
  frame.setString(bar.x + 1, bar.y, truncateEndByWidth(text, bar.width - 2), {
    fg: frame.theme.muted,
    bg: frame.theme.surface,
  });
  return body;
}

export function drawEmptyState(frame: Frame, area: Rect, title: string, hint: string): void {
  const y = area.y + Math.floor(area.height / 2) - 1;
  const center = (text: string): number => area.x + Math.max(0, Math.floor((area.width - text.length) / 2));
  frame.setString(center(title), y, title, { fg: frame.theme.text, bold: true }, area.width);
  frame.setString(center(hint), y + 1, hint, { fg: frame.theme.muted }, area.width);
}
