import { fileURLToPath } from 'node:url';

import { expect } from 'chai';

import configArgs, { toConfig, type Config } from '../../src/config/args';
import { loadConfig, resolveSettings } from '../../src/config/settings';
import { ConfigParser } from '../../src/lib/parseConfig';
import { ConfigError } from '../../src/lib/errors';

const fixture = fileURLToPath(new URL('../fixtures/ldapnav.yaml', import.meta.url));

const config = (overrides: Partial<Config> = {}): Config => ({
  ...toConfig(new ConfigParser(configArgs).parse(['node', 'ldapnav'], {}, {})),
  ...overrides,
});

describe('Settings', () => {
  describe('resolveSettings', () => {
    it('should resolve defaults without warnings', () => {
      const { settings, warnings } = resolveSettings(config());
      expect(warnings).to.deep.equal([]);
      expect(settings).to.deep.equal({
        host: 'localhost',
        port: 389,
        baseDN: 'dc=example,dc=com',
        useSSL: false,
        useTLS: false,
        tlsVerify: true,
        bindUser: '',
        bindPassword: '',
        pageSize: 50,
        retry: {
          enabled: true,
          maxAttempts: 3,
          initialDelayMs: 500,
          maxDelayMs: 5000,
        },
        connectTimeoutMs: 5000,
        cacheMax: 1000,
        cacheTtl: 30,
        autoConnect: false,
      });
    });

    it('should default to the SSL port with SSL', () => {
      expect(resolveSettings(config({ ssl: true })).settings.port).to.equal(636);
      expect(
        resolveSettings(config({ ssl: true, port: 1636 })).settings.port
      ).to.equal(1636);
    });

    it('should prefer SSL over StartTLS', () => {
      const { settings, warnings } = resolveSettings(config({ ssl: true, tls: true }));
      expect(settings.useSSL).to.be.true;
      expect(settings.useTLS).to.be.false;
      expect(warnings).to.deep.equal(['SSL and StartTLS are exclusive, using SSL']);
    });

    it('should repair out of range values', () => {
      const { settings, warnings } = resolveSettings(
        config({ port: 70000, page_size: 0, retry_max_attempts: 1000 })
      );
      expect(settings.port).to.equal(389);
      expect(settings.pageSize).to.equal(50);
      expect(settings.retry.maxAttempts).to.equal(3);
      expect(warnings).to.deep.equal([
        'port=70000 is out of range, using 389',
        'page_size=0 is out of range, using 50',
        'retry_max_attempts=1000 is out of range, using 3',
      ]);
    });

    it('should raise the maximum delay to the initial one', () => {
      const { settings, warnings } = resolveSettings(
        config({ retry_initial_delay_ms: 500, retry_max_delay_ms: 100 })
      );
      expect(settings.retry.maxDelayMs).to.equal(500);
      expect(warnings).to.deep.equal([
        'retry_max_delay_ms=100 is below retry_initial_delay_ms, using 500',
      ]);
    });

    it('should map flags', () => {
      const { settings } = resolveSettings(
        config({ no_retry: true, tls_skip_verify: true, connect: true, host: ' h ' })
      );
      expect(settings.retry.enabled).to.be.false;
      expect(settings.tlsVerify).to.be.false;
      expect(settings.autoConnect).to.be.true;
      expect(settings.host).to.equal('h');
    });
  });

  describe('loadConfig', () => {
    it('should layer the file under environment and options', () => {
      const loaded = loadConfig(
        ['node', 'ldapnav', '--config', fixture, '--page-size', '30'],
        { LDAPNAV_HOST: 'env.example.org' }
      );
      expect(loaded.configFile).to.equal(fixture);
      expect(loaded.config.host).to.equal('env.example.org');
      expect(loaded.config.port).to.equal(1636);
      expect(loaded.config.ssl).to.be.true;
      expect(loaded.config.page_size).to.equal(30);
      expect(loaded.config.no_retry).to.be.true;
      expect(loaded.warnings).to.deep.equal([
        `${fixture}: unknown section "theme" ignored`,
      ]);
    });

    it('should fail on a missing explicit file', () => {
      expect(() =>
        loadConfig(['node', 'ldapnav', '--config', '/nonexistent/ldapnav.yaml'], {})
      ).to.throw(ConfigError, 'Configuration file not found: /nonexistent/ldapnav.yaml');
    });
  });
});
