/**
 * Start view: the connection form
 */
import {
  formFields,
  isTextField,
  isToggleField,
  toConnectionParams,
  toggleField,
  validateField,
  type ConnectionForm,
  type ResolvedConnection,
} from '../../lib/connection';
import { clamp } from '../../lib/viewport';
import { errorMessage } from '../../lib/errors';
import { connectTask, type Connect } from '../store/tasks';
import type { AppState, StartState, Transition } from '../types';

import { isPrintable, stay } from './navigation';

const withStart = (state: AppState, start: Partial<StartState>): AppState => ({
  ...state,
  start: { ...state.start, ...start },
});

export function beginConnect(state: AppState, connect: Connect): Transition {
  let resolved: ResolvedConnection;
  try {
    resolved = toConnectionParams(state.start.form, state.settings);
  } catch (err) {
    const error = errorMessage(err);
    return stay({ ...withStart(state, { error }), status: `Error: ${error}` });
  }
  const { params, pageSize } = resolved;
  const attempt = state.start.attempt + 1;
  return {
    state: {
      ...withStart(state, { connecting: true, attempt, pageSize, error: null }),
      status: `Connecting to ${params.host}:${params.port}...`,
    },
    tasks: [
      connectTask(
        connect,
        params,
        attempt,
        pageSize,
        state.settings.connectTimeoutMs
      ),
    ],
  };
}

/**
 * `enter` on the focused field: edit, toggle or connect
 */
export function activateField(state: AppState, connect: Connect): Transition {
  const field = formFields[state.start.focus].id;
  if (field === 'connect') return beginConnect(state, connect);
  if (isToggleField(field)) {
    return stay(
      withStart(state, { form: toggleField(state.start.form, field) })
    );
  }
  return stay(
    withStart(state, { editing: true, draft: state.start.form[field] })
  );
}

function editKey(state: AppState, key: string): Transition {
  const { start } = state;
  const field = formFields[start.focus].id;
  if (!isTextField(field)) return stay(withStart(state, { editing: false }));

  switch (key) {
    case 'esc':
      return stay(withStart(state, { editing: false, draft: '', error: null }));
    case 'enter': {
      const error = validateField(field, start.draft);
      if (error) return stay({ ...withStart(state, { error }), status: error });
      const form: ConnectionForm = { ...start.form };
      form[field] = start.draft;
      return stay(
        withStart(state, {
          form,
          editing: false,
          draft: '',
          error: null,
        })
      );
    }
    case 'backspace':
      return stay(withStart(state, { draft: start.draft.slice(0, -1) }));
    case 'ctrl+u':
      return stay(withStart(state, { draft: '' }));
    default:
      if (!isPrintable(key)) return stay(state);
      return stay(withStart(state, { draft: start.draft + key }));
  }
}

export function startKey(
  state: AppState,
  key: string,
  connect: Connect
): Transition {
  if (state.start.editing) return editKey(state, key);
  const last = formFields.length - 1;
  switch (key) {
    case 'up':
    case 'k':
      return stay(
        withStart(state, { focus: clamp(state.start.focus - 1, 0, last) })
      );
    case 'down':
    case 'j':
      return stay(
        withStart(state, { focus: clamp(state.start.focus + 1, 0, last) })
      );
    case 'home':
      return stay(withStart(state, { focus: 0 }));
    case 'end':
      return stay(withStart(state, { focus: last }));
    case 'enter':
    case ' ':
      return activateField(state, connect);
    default:
      return stay(state);
  }
}
