import type { Entry } from '../../lib/types';
import type { AppState, Line } from '../types';
import { QUERY_HEADER_ROWS, truncate } from '../layout';

import { renderList, textBlock, plain, type Block } from './list';

const SUMMARY_ATTRIBUTES = 3;

/**
 * First attributes of an entry, "name: value (+n more)"
 */
export function summarize(entry: Entry): string {
  const parts = Object.entries(entry.attributes)
    .filter(([, values]) => values.length > 0)
    .slice(0, SUMMARY_ATTRIBUTES)
    .map(([name, values]) =>
      values.length > 1
        ? `${name}: ${values[0]} (+${values.length - 1} more)`
        : `${name}: ${values[0]}`
    );
  return parts.length > 0 ? parts.join(' | ') : '(no attributes)';
}

function infoLine(state: AppState): Line {
  const { session, error } = state.query;
  if (error) return [{ text: truncate(`Error: ${error}`, state.width), style: 'error' }];
  if (session.pending) return plain('Running query...', state.width);
  if (session.mode === 'input') return [];
  const count = session.results.length;
  return [
    {
      text: session.hasMore
        ? `Showing ${count} of ${count}+ results • Press [N] for next page`
        : `${count} results`,
      style: 'dim',
    },
  ];
}

export function renderQuery(state: AppState, y: number, height: number): Block {
  const { session, cursor, viewportTop } = state.query;
  const { width } = state;
  const browsing = session.mode === 'browse';
  const header: Line[] = [
    [
      { text: 'Query: ', style: 'title' },
      {
        text: truncate(browsing ? session.filter : `${session.filter}_`, width - 7),
        style: browsing ? 'normal' : 'editing',
      },
    ],
    infoLine(state),
  ];
  if (!browsing) return textBlock(header);
  if (session.results.length === 0) {
    return textBlock([...header, plain('No results', width)]);
  }
  const list = renderList({
    items: session.results,
    cursor,
    top: viewportTop,
    height: Math.max(1, height - QUERY_HEADER_ROWS),
    width,
    y: y + QUERY_HEADER_ROWS,
    highlight: true,
    format: entry => `${entry.dn}  ${summarize(entry)}`,
    target: index => ({ kind: 'queryRow', index }),
  });
  return { lines: [...header, ...list.lines], zones: list.zones };
}
