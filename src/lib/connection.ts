/**
 * Connection form values and their conversion to ConnectionParams
 */
import type { Settings } from '../config/settings';
import { defaultPort } from '../config/settings';

import type { ConnectionParams } from './types';
import { freezeConnectionParams } from './types';
import { InvalidInputError } from './errors';

export interface ConnectionForm {
  host: string;
  port: string;
  baseDN: string;
  useSSL: boolean;
  useTLS: boolean;
  bindUser: string;
  bindPassword: string;
  pageSize: string;
}

export type TextField = 'host' | 'port' | 'baseDN' | 'bindUser' | 'bindPassword' | 'pageSize';
export type ToggleField = 'useSSL' | 'useTLS';
export type FormField = TextField | ToggleField | 'connect';

export const formFields: { id: FormField; label: string }[] = [
  { id: 'host', label: 'Host' },
  { id: 'port', label: 'Port' },
  { id: 'baseDN', label: 'Base DN' },
  { id: 'useSSL', label: 'Use SSL' },
  { id: 'useTLS', label: 'Use TLS' },
  { id: 'bindUser', label: 'Bind User' },
  { id: 'bindPassword', label: 'Bind Password' },
  { id: 'pageSize', label: 'Page Size' },
  { id: 'connect', label: 'Connect' },
];

export const isToggleField = (field: FormField): field is ToggleField =>
  field === 'useSSL' || field === 'useTLS';

export const isTextField = (field: FormField): field is TextField =>
  field !== 'connect' && !isToggleField(field);

export function formFromSettings(settings: Settings): ConnectionForm {
  return {
    host: settings.host,
    port: String(settings.port),
    baseDN: settings.baseDN,
    useSSL: settings.useSSL,
    useTLS: settings.useTLS,
    bindUser: settings.bindUser,
    bindPassword: settings.bindPassword,
    pageSize: String(settings.pageSize),
  };
}

function parseInteger(
  raw: string,
  label: string,
  min: number,
  max: number
): number {
  const value = Number(raw.trim());
  if (!/^\d+$/.test(raw.trim()) || value < min || value > max) {
    throw new InvalidInputError(`${label} must be a number between ${min} and ${max}`);
  }
  return value;
}

/**
 * Check one edited text value, returning an error message or null
 */
export function validateField(field: TextField, value: string): string | null {
  try {
    if (field === 'port' && value.trim() !== '') {
      parseInteger(value, 'Port', 1, 65535);
    }
    if (field === 'pageSize' && value.trim() !== '') {
      parseInteger(value, 'Page size', 1, 10000);
    }
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
  return null;
}

/**
 * Toggling SSL moves the port between the two well-known defaults.
 * SSL and StartTLS exclude each other.
 */
export function toggleField(form: ConnectionForm, field: ToggleField): ConnectionForm {
  if (field === 'useTLS') {
    if (form.useTLS) return { ...form, useTLS: false };
    const plain = form.useSSL ? toggleField(form, 'useSSL') : form;
    return { ...plain, useTLS: true };
  }
  const useSSL = !form.useSSL;
  const port =
    form.port.trim() === String(defaultPort(form.useSSL))
      ? String(defaultPort(useSSL))
      : form.port;
  return { ...form, useSSL, port, useTLS: useSSL ? false : form.useTLS };
}

export interface ResolvedConnection {
  params: ConnectionParams;
  pageSize: number;
}

export function toConnectionParams(
  form: ConnectionForm,
  settings: Settings
): ResolvedConnection {
  const host = form.host.trim();
  const baseDN = form.baseDN.trim();
  if (!host) throw new InvalidInputError('Host is required');
  if (!baseDN) throw new InvalidInputError('Base DN is required');
  const port =
    form.port.trim() === ''
      ? defaultPort(form.useSSL)
      : parseInteger(form.port, 'Port', 1, 65535);
  const pageSize =
    form.pageSize.trim() === ''
      ? settings.pageSize
      : parseInteger(form.pageSize, 'Page size', 1, 10000);
  const bindDN = form.bindUser.trim();

  return {
    params: freezeConnectionParams({
      host,
      port,
      baseDN,
      transport: form.useSSL ? 'ldaps' : form.useTLS ? 'starttls' : 'plain',
      bindDN: bindDN || undefined,
      bindPassword: bindDN ? form.bindPassword : undefined,
      tlsVerify: settings.tlsVerify,
      timeoutMs: settings.connectTimeoutMs,
      retry: settings.retry,
    }),
    pageSize,
  };
}
