import { expect } from 'chai';

import {
  formFromSettings,
  toConnectionParams,
  toggleField,
  validateField,
  type ConnectionForm,
} from '../../src/lib/connection';
import { InvalidInputError } from '../../src/lib/errors';
import { testSettings } from '../helpers/settings';

describe('Connection form', () => {
  const settings = testSettings();
  let form: ConnectionForm;

  beforeEach(() => {
    form = formFromSettings(settings);
  });

  it('should be filled from the settings', () => {
    expect(form).to.deep.equal({
      host: 'localhost',
      port: '389',
      baseDN: 'dc=example,dc=com',
      useSSL: false,
      useTLS: false,
      bindUser: '',
      bindPassword: '',
      pageSize: '50',
    });
  });

  describe('validateField', () => {
    it('should check port and page size ranges', () => {
      expect(validateField('port', '70000')).to.equal(
        'Port must be a number between 1 and 65535'
      );
      expect(validateField('port', 'abc')).to.equal(
        'Port must be a number between 1 and 65535'
      );
      expect(validateField('pageSize', '0')).to.equal(
        'Page size must be a number between 1 and 10000'
      );
    });

    it('should accept valid and empty values', () => {
      expect(validateField('port', '1389')).to.equal(null);
      expect(validateField('port', '')).to.equal(null);
      expect(validateField('host', 'ldap.example.com')).to.equal(null);
    });
  });

  describe('toggleField', () => {
    it('should move a default port along with SSL', () => {
      const ssl = toggleField(form, 'useSSL');
      expect(ssl.useSSL).to.be.true;
      expect(ssl.port).to.equal('636');
      expect(toggleField(ssl, 'useSSL').port).to.equal('389');
    });

    it('should keep a custom port', () => {
      expect(toggleField({ ...form, port: '1389' }, 'useSSL').port).to.equal('1389');
    });

    it('should keep SSL and StartTLS exclusive', () => {
      const tls = toggleField(toggleField(form, 'useSSL'), 'useTLS');
      expect(tls).to.include({ useSSL: false, useTLS: true, port: '389' });
      const ssl = toggleField(tls, 'useSSL');
      expect(ssl).to.include({ useSSL: true, useTLS: false, port: '636' });
    });
  });

  describe('toConnectionParams', () => {
    it('should build anonymous plain parameters from defaults', () => {
      const { params, pageSize } = toConnectionParams(form, settings);
      expect(params).to.deep.equal({
        host: 'localhost',
        port: 389,
        baseDN: 'dc=example,dc=com',
        transport: 'plain',
        bindDN: undefined,
        bindPassword: undefined,
        tlsVerify: true,
        timeoutMs: 5000,
        retry: {
          enabled: true,
          maxAttempts: 3,
          initialDelayMs: 500,
          maxDelayMs: 5000,
        },
      });
      expect(pageSize).to.equal(50);
      expect(Object.isFrozen(params)).to.be.true;
    });

    it('should use the SSL port when none is given', () => {
      const { params } = toConnectionParams(
        { ...form, useSSL: true, port: '' },
        settings
      );
      expect(params.port).to.equal(636);
      expect(params.transport).to.equal('ldaps');
    });

    it('should pass credentials and page size through', () => {
      const { params, pageSize } = toConnectionParams(
        {
          ...form,
          useTLS: true,
          bindUser: ' cn=admin,dc=example,dc=com ',
          bindPassword: 'test-secret',
          pageSize: '20',
        },
        settings
      );
      expect(params.transport).to.equal('starttls');
      expect(params.bindDN).to.equal('cn=admin,dc=example,dc=com');
      expect(params.bindPassword).to.equal('test-secret');
      expect(pageSize).to.equal(20);
    });

    it('should require a host and a base DN', () => {
      expect(() => toConnectionParams({ ...form, host: ' ' }, settings)).to.throw(
        InvalidInputError,
        'Host is required'
      );
      expect(() => toConnectionParams({ ...form, baseDN: '' }, settings)).to.throw(
        InvalidInputError,
        'Base DN is required'
      );
    });
  });
});
