export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// Rendered as: top border (1) + tab labels (1) + bottom border (1)
export const TAB_BAR_HEIGHT = 3;
export const STATUS_BAR_HEIGHT = 1;

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width: Math.max(0, width), height: Math.max(0, height) };
}

/** Cut `height` rows off the top; returns [top, rest]. */
export function splitTop(area: Rect, height: number): [Rect, Rect] {
  const h = Math.min(area.height, Math.max(0, height));
  return [rect(area.x, area.y, area.width, h), rect(area.x, area.y + h, area.width, area.height - h)];
}

/** Cut `height` rows off the bottom; returns [rest, bottom]. */
export function splitBottom(area: Rect, height: number): [Rect, Rect] {
  const h = Math.min(area.height, Math.max(0, height));
  return [
    rect(area.x, area.y, area.width, area.height - h),
    rect(area.x, area.y + area.height - h, area.width, h),
  ];
}

export function inset(area: Rect, margin: number): Rect {
  return rect(area.x + margin, area.y + margin, area.width - margin * 2, area.height - margin * 2);
}

/** A `width` x `height` box centered in `area`, shrunk to fit. */
export function centeredRect(area: Rect, width: number, height: number): Rect {
  const w = Math.min(width, area.width);
  const h = Math.min(height, area.height);
  return rect(area.x + Math.floor((area.width - w) / 2), area.y + Math.floor((area.height - h) / 2), w, h);
}

/** Move a list selection by `delta`, clamped to the list. */
export function moveSelection(selected: number, delta: number, length: number): number {
  if (length <= 0) return 0;
  return Math.max(0, Math.min(length - 1, selected + delta));
}

/** First index to show so that `selected` stays inside a window of `visible` rows. */
export function scrollOffset(selected: number, visible: number, total: number): number {
  if (visible <= 0 || total <= visible) return 0;
  const half = Math.floor(visible / 2);
  return Math.max(0, Math.min(selected - half, total - visible));
}
