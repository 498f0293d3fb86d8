import { join } from 'node:path';
import { describe, expect, test } from 'vitest';
import { type ConfigDirEnvironment, getConfigPath, getUserConfigDir } from '../../src/config/paths.js';
import { ConfigDirectoryError } from '../../src/errors.js';

function environment(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv = {},
  home = '/home/tester',
): ConfigDirEnvironment {
  return { platform, env, home: () => home };
}

describe('getUserConfigDir', () => {
  test('uses ~/.config on Linux', () => {
    expect(getUserConfigDir(environment('linux'))).toBe(join('/home/tester', '.config'));
  });

  test('prefers an absolute XDG_CONFIG_HOME', () => {
    expect(getUserConfigDir(environment('linux', { XDG_CONFIG_HOME: '/xdg' }))).toBe('/xdg');
  });

  test('ignores a relative XDG_CONFIG_HOME', () => {
    expect(getUserConfigDir(environment('linux', { XDG_CONFIG_HOME: 'rel/config' }))).toBe(
      join('/home/tester', '.config'),
    );
  });

  test('uses Application Support on macOS', () => {
    expect(getUserConfigDir(environment('darwin'))).toBe(
      join('/home/tester', 'Library', 'Application Support'),
    );
  });

  test('uses APPDATA on Windows', () => {
    expect(getUserConfigDir(environment('win32', { APPDATA: 'C:\\Users\\tester\\AppData' }))).toBe(
      'C:\\Users\\tester\\AppData',
    );
  });

  test('returns undefined without a home directory', () => {
    expect(getUserConfigDir(environment('linux', {}, ''))).toBeUndefined();
    expect(getUserConfigDir(environment('win32'))).toBeUndefined();
  });
});

describe('getConfigPath', () => {
  test('returns the override untouched', () => {
    expect(getConfigPath('./custom.json', environment('linux'))).toBe('./custom.json');
  });

  test('honours NAMEFMT_CONFIG_PATH', () => {
    const env = environment('linux', { NAMEFMT_CONFIG_PATH: '/etc/namefmt.json' });
    expect(getConfigPath(undefined, env)).toBe('/etc/namefmt.json');
  });

  test('places the file under the user config directory', () => {
    expect(getConfigPath(undefined, environment('linux', { XDG_CONFIG_HOME: '/xdg' }))).toBe(
      join('/xdg', 'namefmt', 'namefmt.json'),
    );
  });

  test('throws when the config directory is unknown', () => {
    expect(() => getConfigPath(undefined, environment('linux', {}, ''))).toThrow(ConfigDirectoryError);
    expect(() => getConfigPath(undefined, environment('linux', {}, ''))).toThrow(
      'Could not determine config directory',
    );
  });
});
