import type { AppState, Line } from '../types';
import { pad } from '../layout';

export const HINT = 'Use [Tab] to cycle views • [Ctrl+C] or [Q] to quit';

export function connectionLabel(state: AppState): string {
  if (state.start.connecting) return 'Connecting';
  if (!state.client) return 'Disconnected';
  const { host, port } = state.client.params;
  return `Connected: ${host}:${port}`;
}

export function renderStatusBar(state: AppState): Line {
  return [
    {
      text: pad(`${connectionLabel(state)} │ ${state.status}`, state.width),
      style: 'status',
    },
  ];
}

export function helpText(state: AppState): string {
  switch (state.view) {
    case 'start':
      if (state.start.connecting) return 'Connecting... • [Esc] to cancel';
      return state.start.editing
        ? 'Press [Enter] to save • [Esc] to cancel'
        : 'Configure LDAP settings • [↑↓] navigate • [Enter] edit';
    case 'tree':
      return 'Browse LDAP tree • [↑↓] navigate • [→] expand • [←] collapse • [Enter] view record';
    case 'record':
      return 'View LDAP record details • [↑↓] navigate attributes';
    case 'query':
      return state.query.session.mode === 'input'
        ? 'Press [Enter] to execute • [Esc] to clear'
        : 'Press [↑↓] to navigate • [Enter/Space] to view record • [N] next page • [Esc] to edit query';
  }
}

export const renderHelpBar = (state: AppState): Line => [
  { text: pad(helpText(state), state.width), style: 'help' },
];
