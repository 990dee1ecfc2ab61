/**
 * Record view: one row per attribute, sorted by name
 */
import type { Entry } from '../../lib/types';
import { adjustViewport, visibleRows } from '../../lib/viewport';
import { recordHeight } from '../layout';
import type { AppState, RecordState, Transition } from '../types';

import { listTarget, stay } from './navigation';

export interface RecordRow {
  name: string;
  value: string;
}

export function recordRows(entry: Entry | null): RecordRow[] {
  if (!entry) return [];
  return Object.keys(entry.attributes)
    .sort((a, b) => a.localeCompare(b))
    .map(name => {
      const values = entry.attributes[name];
      return {
        name,
        value: values.length === 1 ? values[0] : `• ${values.join(' • ')}`,
      };
    });
}

export function setRecordCursor(
  state: AppState,
  cursor: number
): RecordState {
  const length = recordRows(state.record.entry).length;
  const { cursor: c, top } = adjustViewport(
    cursor,
    state.record.viewportTop,
    visibleRows(recordHeight(state.height), length),
    length
  );
  return { ...state.record, cursor: c, viewportTop: top };
}

export function recordKey(state: AppState, key: string): Transition {
  const length = recordRows(state.record.entry).length;
  const target = listTarget(
    key,
    state.record.cursor,
    visibleRows(recordHeight(state.height), length),
    length
  );
  if (target === null) return stay(state);
  return stay({ ...state, record: setRecordCursor(state, target) });
}
