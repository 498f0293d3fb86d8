import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { formatError } from '../errors.js';
import type { NamefmtConfig } from '../naming/types.js';
import { debugFormat, debugLog, debugVerbose } from '../utils/debug.js';
import { output } from '../utils/output.js';
import { defaultConfig, getDefaultConfigDocument } from './defaults.js';
import { type ConfigDocument, validateConfigDocument } from './schema.js';

/**
 * Freeze a validated document into the read-only run configuration
 */
export function toConfig(document: ConfigDocument): NamefmtConfig {
  return Object.freeze({
    replace_spaces: document.replace_spaces,
    behaviors: Object.freeze(
      document.behaviors.map((b) => Object.freeze({ pattern: b.pattern, style: b.style })),
    ),
    detection: Object.freeze({
      exe_extensions: Object.freeze([...document.detection.exe_extensions]),
      package_dirs: Object.freeze([...document.detection.package_dirs]),
    }),
  });
}

/**
 * Parse the text of a config file
 *
 * @throws Error with a single-line reason when the text is not valid JSON
 *   or does not have the expected shape
 */
export function parseConfig(content: string): NamefmtConfig {
  const data: unknown = JSON.parse(content);
  const result = validateConfigDocument(data);
  if (!result.valid) {
    throw new Error(result.errors.join('; '));
  }
  return toConfig(result.document);
}

function fallBackToDefaults(reason: string): NamefmtConfig {
  output.warn(`Warning: ${reason}`);
  output.warn('Using default configuration');
  return defaultConfig();
}

/**
 * Loads the configuration file, creating it with defaults on first run
 */
export class ConfigLoader {
  constructor(private readonly configPath: string) {}

  /**
   * Load the configuration
   *
   * Never throws: any failure to create, read or parse the file is
   * reported as a warning and the built-in defaults are used instead.
   */
  async load(): Promise<NamefmtConfig> {
    debugLog(`Loading config from ${this.configPath}`);

    if (!existsSync(this.configPath)) {
      const created = await this.createDefault();
      if (!created.ok) return fallBackToDefaults(created.reason);
    }

    let content: string;
    try {
      content = await readFile(this.configPath, 'utf-8');
    } catch (error) {
      return fallBackToDefaults(`Failed to read ${this.configPath}: ${formatError(error)}`);
    }

    try {
      const config = parseConfig(content);
      debugVerbose(`Resolved config: ${debugFormat(config)}`);
      return config;
    } catch (error) {
      return fallBackToDefaults(`Failed to parse ${this.configPath}: ${formatError(error)}`);
    }
  }

  /**
   * Write the default config document, creating parent directories
   */
  private async createDefault(): Promise<{ ok: true } | { ok: false; reason: string }> {
    const dir = dirname(this.configPath);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      return { ok: false, reason: `Failed to create config directory ${dir}: ${formatError(error)}` };
    }

    try {
      await writeFile(this.configPath, getDefaultConfigDocument(), 'utf-8');
    } catch (error) {
      return {
        ok: false,
        reason: `Failed to write default config to ${this.configPath}: ${formatError(error)}`,
      };
    }

    output.info(`Created default config at ${this.configPath}`);
    return { ok: true };
  }
}

export async function loadConfig(configPath: string): Promise<NamefmtConfig> {
  return new ConfigLoader(configPath).load();
}
