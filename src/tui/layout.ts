/**
 * Screen layout
 *
 *   0        tab bar
 *   1        hint line
 *   2        blank
 *   3..h-3   content
 *   h-2      status bar
 *   h-1      help bar
 */
export const CONTENT_TOP = 3;
const CHROME_ROWS = 5;

export const contentHeight = (height: number): number =>
  Math.max(1, height - CHROME_ROWS);

export const treeHeight = (height: number): number => contentHeight(height);

// DN line, blank line and column header come first
export const RECORD_HEADER_ROWS = 3;
export const recordHeight = (height: number): number =>
  Math.max(1, contentHeight(height) - RECORD_HEADER_ROWS);

// filter line, result info line
export const QUERY_HEADER_ROWS = 2;
export const queryHeight = (height: number): number =>
  Math.max(1, contentHeight(height) - QUERY_HEADER_ROWS);

export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (text.length <= width) return text;
  return width > 3 ? `${text.slice(0, width - 3)}...` : text.slice(0, width);
}

export const pad = (text: string, width: number): string =>
  truncate(text, width).padEnd(Math.max(0, width));
