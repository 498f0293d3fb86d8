import { homedir } from 'node:os';
import { isAbsolute, join } from 'node:path';
import { ConfigDirectoryError } from '../errors.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './defaults.js';

export interface ConfigDirEnvironment {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  home: () => string;
}

const defaultEnvironment: ConfigDirEnvironment = {
  platform: process.platform,
  env: process.env,
  home: homedir,
};

function safeHome(environment: ConfigDirEnvironment): string | undefined {
  try {
    const home = environment.home();
    return home ? home : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Per-user configuration directory for the current platform
 *
 * - Linux and other Unix: $XDG_CONFIG_HOME (when absolute) or ~/.config
 * - macOS: ~/Library/Application Support
 * - Windows: %APPDATA%
 *
 * @returns The directory, or undefined when it cannot be determined
 */
export function getUserConfigDir(
  environment: ConfigDirEnvironment = defaultEnvironment,
): string | undefined {
  const { platform, env } = environment;

  if (platform === 'win32') {
    return env.APPDATA || undefined;
  }

  const home = safeHome(environment);

  if (platform === 'darwin') {
    return home ? join(home, 'Library', 'Application Support') : undefined;
  }

  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && isAbsolute(xdg)) {
    return xdg;
  }
  return home ? join(home, '.config') : undefined;
}

/**
 * Resolve the config file location
 *
 * An explicit override (the --config flag) wins, then NAMEFMT_CONFIG_PATH,
 * then <user config dir>/namefmt/namefmt.json.
 *
 * @throws ConfigDirectoryError when no user config directory exists
 */
export function getConfigPath(
  override?: string,
  environment: ConfigDirEnvironment = defaultEnvironment,
): string {
  if (override) return override;

  const fromEnv = environment.env.NAMEFMT_CONFIG_PATH;
  if (fromEnv) return fromEnv;

  const configDir = getUserConfigDir(environment);
  if (!configDir) {
    throw new ConfigDirectoryError();
  }
  return join(configDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}
