/**
 * Scrolling rule shared by every list view
 */

export interface Viewport {
  cursor: number;
  top: number;
}

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

/**
 * Clamp the cursor into [0, length) and move `top` the least amount needed
 * so that `top <= cursor <= top + rows - 1`.
 */
export function adjustViewport(
  cursor: number,
  top: number,
  rows: number,
  length: number
): Viewport {
  const visible = Math.max(1, rows);
  if (length <= 0) return { cursor: 0, top: 0 };
  const c = clamp(cursor, 0, length - 1);
  let t = top;
  if (c < t) t = c;
  if (c > t + visible - 1) t = c - visible + 1;
  t = Math.min(t, Math.max(0, length - visible));
  return { cursor: c, top: Math.max(0, t) };
}

/**
 * Rows available to list items: one row is kept for the
 * "Showing a-b of n" footer when the list overflows.
 */
export function visibleRows(height: number, length: number): number {
  const h = Math.max(1, height);
  return length > h ? Math.max(1, h - 1) : h;
}

export function showingLine(top: number, rows: number, length: number): string {
  const first = length === 0 ? 0 : top + 1;
  const last = Math.min(top + rows, length);
  return `Showing ${first}-${last} of ${length} entries`;
}
