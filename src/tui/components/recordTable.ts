import type { AppState, Line } from '../types';
import { RECORD_HEADER_ROWS, pad, truncate } from '../layout';
import { recordRows } from '../views/record';

import { renderList, textBlock, plain, type Block } from './list';

export const nameColumnWidth = (width: number): number =>
  Math.max(15, Math.floor(width / 3));

export function renderRecord(state: AppState, y: number, height: number): Block {
  const { record, width } = state;
  if (!record.entry) {
    if (record.loading) return textBlock([plain('Loading record...', width)]);
    return textBlock([plain('No record selected', width)]);
  }
  const nameWidth = nameColumnWidth(width);
  const valueWidth = Math.max(1, width - nameWidth - 2);
  const rows = recordRows(record.entry);
  const header: Line[] = [
    [{ text: truncate(`DN: ${record.entry.dn}`, width), style: 'title' }],
    [],
    [
      {
        text: truncate(`${pad('Attribute', nameWidth)}  Value(s)`, width),
        style: 'dim',
      },
    ],
  ];
  if (rows.length === 0) {
    return textBlock([...header, plain('No attributes to display', width)]);
  }
  const list = renderList({
    items: rows,
    cursor: record.cursor,
    top: record.viewportTop,
    height: Math.max(1, height - RECORD_HEADER_ROWS),
    width,
    y: y + RECORD_HEADER_ROWS,
    highlight: true,
    format: row => `${pad(row.name, nameWidth)}  ${truncate(row.value, valueWidth)}`,
    target: index => ({ kind: 'recordRow', index }),
  });
  return { lines: [...header, ...list.lines], zones: list.zones };
}
