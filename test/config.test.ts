import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  configPresets,
  defaultConfig,
  isLogLevel,
  mergeConfig,
  normalizeExtensions,
  validateConfig,
} from '../src/config/types.js';

describe('mergeConfig', () => {
  it('returns the defaults when given no layers', () => {
    assert.deepStrictEqual(mergeConfig(), defaultConfig);
  });

  it('keeps unspecified keys of a partially overridden section', () => {
    const config = mergeConfig({ server: { port: 9000 } });
    assert.deepStrictEqual(config.server, { port: 9000, host: 'localhost' });
    assert.equal(config.webdav.defaultLockTimeout, 600);
  });

  it('lets later layers win', () => {
    const config = mergeConfig(configPresets.production(), { logging: { level: 'debug' } });
    assert.equal(config.logging.level, 'debug');
    assert.equal(config.logging.locks, true);
    assert.equal(config.server.host, '0.0.0.0');
  });

  it('normalizes the extension allow-list', () => {
    const config = mergeConfig({ storage: { allowedFileExtensions: [' .TXT', 'md', '', '..Pdf'] } });
    assert.deepStrictEqual(config.storage.allowedFileExtensions, ['txt', 'md', 'pdf']);
    assert.deepStrictEqual(defaultConfig.storage.allowedFileExtensions, []);
  });
});

describe('normalizeExtensions', () => {
  it('drops entries that are only dots', () => {
    assert.deepStrictEqual(normalizeExtensions(['.', 'JSON']), ['json']);
  });
});

describe('configPresets', () => {
  it('production listens on every interface', () => {
    assert.deepStrictEqual(configPresets.production(8443).server, { port: 8443, host: '0.0.0.0' });
    assert.equal(configPresets.production().response?.enableDirectoryListing, false);
  });

  it('development marks its responses', () => {
    assert.deepStrictEqual(configPresets.development().response?.customHeaders, {
      'X-WebDAV-Server': 'Development Mode',
    });
  });
});

describe('validateConfig', () => {
  it('accepts an empty override set', () => {
    assert.deepStrictEqual(validateConfig({}), []);
  });

  it('accepts both presets', () => {
    assert.deepStrictEqual(validateConfig(configPresets.production()), []);
    assert.deepStrictEqual(validateConfig(configPresets.development()), []);
  });

  it('rejects ports that are not whole numbers', () => {
    assert.deepStrictEqual(validateConfig({ server: { port: Number.NaN } }), ['Server port must be between 0 and 65535']);
    assert.deepStrictEqual(validateConfig({ server: { port: 80.5 } }), ['Server port must be between 0 and 65535']);
  });

  it('reports every invalid setting', () => {
    const errors = validateConfig({
      server: { port: 70000 },
      timeouts: { request: 10 },
      webdav: { defaultLockTimeout: 7200, maxLockTimeout: 3600 },
      storage: { allowedFileExtensions: ['a/b'] },
    });
    assert.deepStrictEqual(errors, [
      'Server port must be between 0 and 65535',
      'Request timeout must be at least 1000ms',
      'Default lock timeout cannot exceed the maximum lock timeout',
      'Invalid file extension: a/b',
    ]);
  });

  it('rejects non-positive lock timeouts', () => {
    assert.deepStrictEqual(validateConfig({ webdav: { maxLockTimeout: 0 } }), [
      'Maximum lock timeout must be at least 1 second',
    ]);
  });
});

describe('isLogLevel', () => {
  it('recognizes the four levels', () => {
    assert.equal(isLogLevel('warn'), true);
    assert.equal(isLogLevel('verbose'), false);
  });
});
