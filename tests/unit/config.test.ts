import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { getConfig, getInstallTypePriority, loadConfig, resetConfig, validateConfig } from '../../src/config.js';
import type { Config } from '../../src/types.js';

const ENV_KEYS = ['OCS_CHECK_INSTALL_TYPES', 'INSTALL_TYPE_PRIORITY', 'PAGE_SIZE', 'LOG_TOOL_CALLS'];

function createValidConfig(overrides: Partial<Config> = {}): Config {
  return {
    checkInstallTypes: false,
    installTypePriority: ['personal_media', 'styling', 'wm_themes', 'desktop_assets', 'app_specific'],
    pageSize: 50,
    logToolCalls: false,
    ...overrides,
  };
}

describe('loadConfig', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfig();
  });

  it('uses defaults when nothing is set', () => {
    expect(loadConfig()).toEqual(createValidConfig());
  });

  it('reads values from the environment', () => {
    process.env['OCS_CHECK_INSTALL_TYPES'] = 'TRUE';
    process.env['INSTALL_TYPE_PRIORITY'] = ' styling, personal_media ,';
    process.env['PAGE_SIZE'] = '10';
    process.env['LOG_TOOL_CALLS'] = '1';

    expect(loadConfig()).toEqual({
      checkInstallTypes: true,
      installTypePriority: ['styling', 'personal_media'],
      pageSize: 10,
      logToolCalls: true,
    });
  });

  it('falls back to the default page size for non-numbers', () => {
    process.env['PAGE_SIZE'] = 'lots';
    expect(loadConfig().pageSize).toBe(50);
  });

  it('caches the config until reset', () => {
    const first = getConfig();
    process.env['PAGE_SIZE'] = '5';
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().pageSize).toBe(5);
  });
});

describe('validateConfig', () => {
  it('returns no errors for valid config', () => {
    expect(validateConfig(createValidConfig())).toEqual([]);
  });

  it('validates pageSize bounds', () => {
    expect(validateConfig(createValidConfig({ pageSize: 0 }))).toEqual(['PAGE_SIZE must be between 1 and 500']);
    expect(validateConfig(createValidConfig({ pageSize: 501 }))).toEqual(['PAGE_SIZE must be between 1 and 500']);
  });

  it('requires at least one family', () => {
    expect(validateConfig(createValidConfig({ installTypePriority: [] }))).toEqual([
      'INSTALL_TYPE_PRIORITY must name at least one family',
    ]);
  });

  it('rejects unknown families', () => {
    expect(validateConfig(createValidConfig({ installTypePriority: ['styling', 'qt_general'] }))).toEqual([
      'INSTALL_TYPE_PRIORITY contains unknown family "qt_general" (expected one of: personal_media, styling, wm_themes, desktop_assets, app_specific)',
    ]);
  });

  it('rejects repeated families', () => {
    expect(validateConfig(createValidConfig({ installTypePriority: ['styling', 'styling'] }))).toEqual([
      'INSTALL_TYPE_PRIORITY lists "styling" more than once',
    ]);
  });
});

describe('getInstallTypePriority', () => {
  it('keeps known families in the configured order', () => {
    const config = createValidConfig({ installTypePriority: ['bogus', 'wm_themes', 'personal_media'] });
    expect(getInstallTypePriority(config)).toEqual(['wm_themes', 'personal_media']);
  });
});
