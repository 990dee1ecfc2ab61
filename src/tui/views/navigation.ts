import type { AppState, Transition } from '../types';

export const stay = (state: AppState): Transition => ({ state, tasks: [] });

/**
 * Cursor target for a list navigation key, or null when the key is not one
 */
export function listTarget(
  key: string,
  cursor: number,
  rows: number,
  length: number
): number | null {
  switch (key) {
    case 'up':
    case 'k':
      return cursor - 1;
    case 'down':
    case 'j':
      return cursor + 1;
    case 'pageup':
      return cursor - rows;
    case 'pagedown':
      return cursor + rows;
    case 'home':
    case 'g':
      return 0;
    case 'end':
    case 'G':
      return length - 1;
    default:
      return null;
  }
}

export const isPrintable = (key: string): boolean =>
  key.length === 1 && key >= ' ' && key !== '\x7f';
