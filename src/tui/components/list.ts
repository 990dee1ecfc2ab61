/**
 * Scrolled list with one zone per visible row
 */
import { showingLine, visibleRows } from '../../lib/viewport';
import { pad, truncate } from '../layout';
import type { Line, Target, Zone } from '../types';

export interface Block {
  lines: Line[];
  zones: Zone[];
}

export interface ListOptions<T> {
  items: T[];
  cursor: number;
  top: number;
  // rows available, footer included
  height: number;
  width: number;
  // screen row of the first item
  y: number;
  highlight: boolean;
  format: (item: T, index: number) => string;
  target: (index: number) => Target;
}

export function renderList<T>(options: ListOptions<T>): Block {
  const { items, top, width } = options;
  const rows = visibleRows(options.height, items.length);
  const end = Math.min(top + rows, items.length);
  const lines: Line[] = [];
  const zones: Zone[] = [];

  for (let i = top; i < end; i++) {
    const text = options.format(items[i], i);
    lines.push(
      options.highlight && i === options.cursor
        ? [{ text: pad(text, width), style: 'selected' }]
        : [{ text: truncate(text, width) }]
    );
    zones.push({
      rect: { x: 0, y: options.y + (i - top), width, height: 1 },
      target: options.target(i),
    });
  }
  if (items.length > options.height) {
    lines.push([{ text: showingLine(top, rows, items.length), style: 'dim' }]);
  }
  return { lines, zones };
}

export const textBlock = (lines: Line[]): Block => ({ lines, zones: [] });

export const plain = (text: string, width: number): Line => [
  { text: truncate(text, width) },
];
