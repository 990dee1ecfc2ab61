import { formFields, isToggleField, type FormField } from '../../lib/connection';
import type { AppState, Line, StartState, Zone } from '../types';
import { truncate } from '../layout';

import type { Block } from './list';

const LABEL_WIDTH = 15;
// title and blank line above the fields
const FORM_OFFSET = 2;

function fieldValue(start: StartState, field: FormField, focused: boolean): string {
  if (field === 'connect') return start.connecting ? 'Connecting...' : '';
  if (isToggleField(field)) return start.form[field] ? '[x]' : '[ ]';
  const value = focused && start.editing ? start.draft : start.form[field];
  const shown = field === 'bindPassword' ? '*'.repeat(value.length) : value;
  return focused && start.editing ? `${shown}_` : shown;
}

export function renderStartForm(state: AppState, y: number, height: number): Block {
  const { start, width } = state;
  const lines: Line[] = [
    [{ text: 'Configure your LDAP connection settings:', style: 'title' }],
    [],
  ];
  const zones: Zone[] = [];

  formFields.forEach((field, i) => {
    const focused = i === start.focus;
    const label =
      field.id === 'connect' ? '[ Connect ]' : field.label.padEnd(LABEL_WIDTH);
    const marker = focused ? '> ' : '  ';
    const value = fieldValue(start, field.id, focused);
    lines.push([
      { text: marker + label, style: focused ? 'selected' : 'normal' },
      {
        text: truncate(value ? ` ${value}` : '', Math.max(0, width - 2 - label.length)),
        style: focused && start.editing ? 'editing' : 'normal',
      },
    ]);
    zones.push({
      rect: { x: 0, y: y + FORM_OFFSET + i, width, height: 1 },
      target: { kind: 'field', index: i },
    });
  });

  lines.push([]);
  if (start.error) {
    lines.push([{ text: truncate(`⚠ ${start.error}`, width), style: 'error' }]);
  }
  start.warnings.forEach(warning =>
    lines.push([
      { text: truncate(`⚠ Config: ${warning}`, width), style: 'warning' },
    ])
  );
  return {
    lines: lines.slice(0, height),
    zones: zones.filter(zone => zone.rect.y < y + height),
  };
}
