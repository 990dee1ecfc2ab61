/**
 * State to frame. The zone list is rebuilt with every frame and is the only
 * way a pointer position maps to something on screen.
 */
import { CONTENT_TOP, contentHeight } from './layout';
import { renderTabBar } from './components/tabBar';
import { HINT, renderHelpBar, renderStatusBar } from './components/statusBar';
import { renderStartForm } from './components/startForm';
import { renderTree } from './components/treeList';
import { renderRecord } from './components/recordTable';
import { renderQuery } from './components/queryPanel';
import type { Block } from './components/list';
import type { AppState, Frame, Line, Target, Zone } from './types';

function renderContent(state: AppState, y: number, height: number): Block {
  switch (state.view) {
    case 'start':
      return renderStartForm(state, y, height);
    case 'tree':
      return renderTree(state, y, height);
    case 'record':
      return renderRecord(state, y, height);
    case 'query':
      return renderQuery(state, y, height);
  }
}

export function render(state: AppState): Frame {
  const height = contentHeight(state.height);
  const tabs = renderTabBar(state);
  const content = renderContent(state, CONTENT_TOP, height);

  const body: Line[] = content.lines.slice(0, height);
  while (body.length < height) body.push([]);

  return {
    lines: [
      ...tabs.lines,
      [{ text: HINT, style: 'dim' }],
      [],
      ...body,
      renderStatusBar(state),
      renderHelpBar(state),
    ],
    zones: [...tabs.zones, ...content.zones],
  };
}

const contains = (zone: Zone, x: number, y: number): boolean =>
  x >= zone.rect.x &&
  x < zone.rect.x + zone.rect.width &&
  y >= zone.rect.y &&
  y < zone.rect.y + zone.rect.height;

/**
 * First zone, in paint order, under the pointer
 */
export function hitTest(zones: Zone[], x: number, y: number): Target | null {
  return zones.find(zone => contains(zone, x, y))?.target ?? null;
}

export const lineText = (line: Line): string =>
  line.map(segment => segment.text).join('');
