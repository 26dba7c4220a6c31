/**
 * Tool executor unit tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { resetConfig } from '../../src/config.js';
import { executeParse } from '../../src/tools/parse.js';
import { executeRender } from '../../src/tools/render.js';
import { executeResolve } from '../../src/tools/resolve.js';

const GOOD_LINK =
  'ocs://install?url=https%3A%2F%2Ffake.download%2Flocation.png&type=plasma_look_and_feel&filename=location55.png';
const UNKNOWN_TYPE_LINK = 'ocs://install?url=https%3A%2F%2Ffake.download%2Fa.png&type=abc';

const ENV_KEYS = ['OCS_CHECK_INSTALL_TYPES', 'INSTALL_TYPE_PRIORITY'];
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

describe('executeParse', () => {
  it('returns the link, its canonical form and install path', () => {
    expect(executeParse({ link: GOOD_LINK })).toEqual({
      success: true,
      link: {
        raw_uri: GOOD_LINK,
        scheme: 'ocs',
        command: 'install',
        download_url: 'https://fake.download/location.png',
        install_type: 'plasma_look_and_feel',
        filename: 'location55.png',
      },
      canonical: GOOD_LINK,
      install: {
        family: 'desktop_assets',
        variant: 'PlasmaLookAndFeel',
        path_template: '$XDG_DATA_HOME/plasma/look-and-feel',
      },
    });
  });

  it('reports parse failures with a message', () => {
    const result = executeParse({ link: 'ocs://uninstall?url=https%3A%2F%2Ffake.download%2Fa.png&type=abc' });

    expect(result).toEqual({
      success: false,
      error: {
        code: 'UNRECOGNIZED_COMMAND',
        message: 'An unexpected OCS command was provided: `uninstall`. Ask for either `install` or `download`.',
      },
    });
  });

  it('accepts an unknown install type by default', () => {
    const result = executeParse({ link: UNKNOWN_TYPE_LINK });

    expect(result.success).toBe(true);
    expect(result.link?.install_type).toBe('abc');
    expect(result.canonical).toBe(UNKNOWN_TYPE_LINK);
    expect(result.install).toBeUndefined();
  });

  it('rejects an unknown install type when asked to', () => {
    const result = executeParse({ link: UNKNOWN_TYPE_LINK, options: { check_install_type: true } });

    expect(result.success).toBe(false);
    expect(result.canonical).toBe(UNKNOWN_TYPE_LINK);
    expect(result.error).toEqual({
      code: 'UNKNOWN_INSTALL_TYPE',
      message: 'An unknown install type was given: `abc`',
    });
  });

  it('takes the install type check from config', () => {
    process.env['OCS_CHECK_INSTALL_TYPES'] = 'true';
    resetConfig();

    expect(executeParse({ link: UNKNOWN_TYPE_LINK }).success).toBe(false);
    expect(executeParse({ link: UNKNOWN_TYPE_LINK, options: { check_install_type: false } }).success).toBe(true);
  });
});

describe('executeRender', () => {
  it('renders the canonical link', () => {
    expect(
      executeRender({
        link: {
          scheme: 'OCS',
          command: 'download',
          downloadUrl: 'https://fake.download/a.mp3',
          installType: 'music',
        },
      })
    ).toEqual({
      success: true,
      canonical: 'ocs://download?url=https%3A%2F%2Ffake.download%2Fa.mp3&type=music',
    });
  });

  it('rejects an unknown scheme', () => {
    expect(
      executeRender({
        link: { scheme: 'http', command: 'install', downloadUrl: 'https://fake.download/a.mp3', installType: 'music' },
      })
    ).toEqual({
      success: false,
      error: {
        code: 'UNRECOGNIZED_SCHEME',
        message: 'An unexpected OCS scheme was provided: `http`. Use `ocs://` or `ocss://`.',
      },
    });
  });

  it('rejects a filename that would change when parsed back', () => {
    expect(
      executeRender({
        link: {
          scheme: 'ocs',
          command: 'install',
          downloadUrl: 'https://fake.download/a.png',
          installType: 'wallpapers',
          filename: 'a#1.png',
        },
      })
    ).toEqual({
      success: false,
      error: {
        code: 'UNREPRESENTABLE_FIELD',
        message: 'The filename cannot be written into a link unchanged: `a#1.png`',
      },
    });
  });

  it('rejects a relative download URL', () => {
    expect(
      executeRender({
        link: { scheme: 'ocs', command: 'install', downloadUrl: 'not a url', installType: 'music' },
      })
    ).toEqual({
      success: false,
      error: {
        code: 'URI_SYNTAX_ERROR',
        message: 'Not an absolute URI (no scheme): `not a url`',
      },
    });
  });
});

describe('executeResolve', () => {
  it('resolves a token across families', () => {
    expect(executeResolve({ install_type: 'xfwm4_themes' })).toEqual({
      success: true,
      family: 'styling',
      variant: 'Themes',
      path_template: '$HOME/.themes',
    });
  });

  it('resolves within a named family', () => {
    expect(executeResolve({ install_type: 'music', family: 'styling' })).toEqual({
      success: false,
      error: {
        code: 'NO_MATCHING_INSTALL_TYPE',
        message: 'No known install type matched `music` in styling',
      },
    });
  });

  it('probes only the configured families', () => {
    process.env['INSTALL_TYPE_PRIORITY'] = 'styling,wm_themes';
    resetConfig();

    expect(executeResolve({ install_type: 'music' })).toEqual({
      success: false,
      error: {
        code: 'NO_MATCHING_INSTALL_TYPE',
        message: 'No known install type matched `music`',
      },
    });
  });
});
