/**
 * Filename transformation engine.
 *
 * Decides, for a single file, whether it should be renamed and to what.
 * Decision order (first applicable branch only):
 *   1. executable or package file  → kebab-case
 *   2. first matching behavior     → its style
 *   3. replace_spaces              → spaces become underscores
 * then an optional YYYY_MM_DD__ prefix is prepended unconditionally.
 *
 * @example
 * const transformer = new NameTransformer(config);
 * const plan = transformer.format('./docs/My Cool File.txt');
 * // plan.to === './docs/My_Cool_File.txt'
 */

import { basename, dirname, join } from 'node:path';
import { applyStyle, toKebabCase } from './converters.js';
import { isExeOrPackage } from './detection.js';
import { matchesPattern } from './matcher.js';
import type { FormatOptions, NamefmtConfig, RenamePlan } from './types.js';

/**
 * Date prefix for the given instant, using its UTC calendar date
 *
 * @example
 * getTimestampPrefix(new Date('2024-03-07T23:30:00Z')) // '2024_03_07__'
 */
export function getTimestampPrefix(now: Date = new Date()): string {
  const year = String(now.getUTCFullYear()).padStart(4, '0');
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const day = String(now.getUTCDate()).padStart(2, '0');
  return `${year}_${month}_${day}__`;
}

/**
 * Compute the new base name for `name`, or null when nothing changes.
 *
 * `filePath` is only used for executable/package detection; `name` is
 * expected to be its base name.
 */
export function formatFilename(
  name: string,
  config: NamefmtConfig,
  filePath: string,
  timestamp: boolean,
  now: Date = new Date(),
): string | null {
  let result = name;

  if (isExeOrPackage(filePath, config)) {
    result = toKebabCase(name);
  } else {
    const behavior = config.behaviors.find((b) => matchesPattern(name, b.pattern));
    if (behavior) {
      result = applyStyle(name, behavior.style);
    } else if (config.replace_spaces) {
      result = name.replaceAll(' ', '_');
    }
  }

  if (timestamp) {
    result = getTimestampPrefix(now) + result;
  }

  return result !== name ? result : null;
}

/**
 * Swap the base name of a path, leaving the parent exactly as written
 */
function replaceBaseName(filePath: string, name: string, newName: string): string {
  if (filePath.endsWith(name)) {
    return filePath.slice(0, filePath.length - name.length) + newName;
  }
  return join(dirname(filePath), newName);
}

/**
 * Binds a configuration and a clock, and produces rename plans for paths
 */
export class NameTransformer {
  constructor(
    private readonly config: NamefmtConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Plan a rename for a single path
   *
   * @returns The plan, or null when the name is already in shape
   */
  format(filePath: string, options: FormatOptions = {}): RenamePlan | null {
    const name = basename(filePath);
    const newName = formatFilename(
      name,
      this.config,
      filePath,
      options.timestamp ?? false,
      this.clock(),
    );

    if (newName === null) return null;

    return Object.freeze({
      from: filePath,
      to: replaceBaseName(filePath, name, newName),
      name,
      newName,
    });
  }
}
