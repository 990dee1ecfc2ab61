import type { AppState, Line, Segment, ViewKind, Zone } from '../types';
import { viewOrder } from '../types';
import { isEnabled } from '../store/controller';

import type { Block } from './list';

const labels: Record<ViewKind, string> = {
  start: 'Start',
  tree: 'Tree',
  record: 'Record',
  query: 'Query',
};

const SEPARATOR = '  ';

export function renderTabBar(state: AppState): Block {
  const line: Line = [];
  const zones: Zone[] = [];
  let x = 0;
  viewOrder.forEach((view, i) => {
    if (i > 0) {
      line.push({ text: SEPARATOR });
      x += SEPARATOR.length;
    }
    const text = `[${i + 1}] ${labels[view]}`;
    const enabled = isEnabled(state, view);
    const segment: Segment = {
      text,
      style: view === state.view ? 'active' : enabled ? 'normal' : 'disabled',
    };
    line.push(segment);
    if (enabled) {
      zones.push({
        rect: { x, y: 0, width: text.length, height: 1 },
        target: { kind: 'tab', view },
      });
    }
    x += text.length;
  });
  return { lines: [line], zones };
}
