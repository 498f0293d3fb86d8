import type { DetectionRules, NamefmtConfig } from '../naming/types.js';

export const DEFAULT_EXE_EXTENSIONS: readonly string[] = ['exe', 'bin', 'app'];

export const DEFAULT_PACKAGE_DIRS: readonly string[] = ['package.json', 'Cargo.toml', 'pyproject.toml'];

export const CONFIG_DIR_NAME = 'namefmt';

export const CONFIG_FILE_NAME = 'namefmt.json';

export function defaultDetectionRules(): DetectionRules {
  return Object.freeze({
    exe_extensions: Object.freeze([...DEFAULT_EXE_EXTENSIONS]),
    package_dirs: Object.freeze([...DEFAULT_PACKAGE_DIRS]),
  });
}

export function defaultConfig(): NamefmtConfig {
  return Object.freeze({
    replace_spaces: true,
    behaviors: Object.freeze([]),
    detection: defaultDetectionRules(),
  });
}

/**
 * Contents written when no config file exists yet
 */
export function getDefaultConfigDocument(): string {
  const document = {
    replace_spaces: true,
    behaviors: [],
    detection: {
      exe_extensions: [...DEFAULT_EXE_EXTENSIONS],
      package_dirs: [...DEFAULT_PACKAGE_DIRS],
    },
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}
