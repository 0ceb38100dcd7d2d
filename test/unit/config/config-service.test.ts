import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigService, DEFAULT_CHANNEL_ALIAS } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

describe('ConfigService', () => {
  afterEach(() => {
    ConfigService.resetForTesting();
  });

  it('uses defaults when the environment is empty', () => {
    const config = ConfigService.configure({}, {});
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.cacheDir, null);
    assert.equal(config.rattlerBuildBin, 'rattler-build');
    assert.equal(config.channelAlias, DEFAULT_CHANNEL_ALIAS);
    assert.equal(config.manifestPath, 'pixi.toml');
  });

  it('reads every setting from the environment', () => {
    const config = ConfigService.configure(
      {},
      {
        LOG_LEVEL: 'debug',
        BUILD_BACKEND_CACHE_DIR: '/tmp/backend-cache',
        RATTLER_BUILD_BIN: '/opt/bin/rattler-build',
        CONDA_CHANNEL_ALIAS: 'https://mirror.example.test/conda',
        PIXI_PROJECT_MANIFEST: 'project/pixi.toml',
      }
    );
    assert.equal(config.logLevel, LogLevel.DEBUG);
    assert.equal(config.cacheDir, '/tmp/backend-cache');
    assert.equal(config.rattlerBuildBin, '/opt/bin/rattler-build');
    assert.equal(config.channelAlias, 'https://mirror.example.test/conda/');
    assert.equal(config.manifestPath, 'project/pixi.toml');
  });

  it('lets overrides win over the environment', () => {
    const config = ConfigService.configure(
      { logLevel: LogLevel.ERROR },
      { LOG_LEVEL: 'debug', BUILD_BACKEND_CACHE_DIR: '/tmp/backend-cache' }
    );
    assert.equal(config.logLevel, LogLevel.ERROR);
    assert.equal(config.cacheDir, '/tmp/backend-cache');
  });

  it('falls back to INFO for unknown level names', () => {
    assert.equal(ConfigService.configure({}, { LOG_LEVEL: 'verbose' }).logLevel, LogLevel.INFO);
  });

  it('keeps the configured instance as the singleton', () => {
    const config = ConfigService.configure({}, { RATTLER_BUILD_BIN: 'rb' });
    assert.equal(ConfigService.getInstance(), config);
  });

  describe('parseLogLevel', () => {
    it('accepts level names in any case', () => {
      assert.equal(ConfigService.parseLogLevel('Warning'), LogLevel.WARN);
      assert.equal(ConfigService.parseLogLevel(' TRACE '), LogLevel.DEBUG);
      assert.equal(ConfigService.parseLogLevel('error'), LogLevel.ERROR);
    });

    it('returns undefined for anything else', () => {
      assert.equal(ConfigService.parseLogLevel('loud'), undefined);
      assert.equal(ConfigService.parseLogLevel(undefined), undefined);
    });
  });
});
