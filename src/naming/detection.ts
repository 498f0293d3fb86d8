import { existsSync, statSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { NamefmtConfig } from './types.js';

/**
 * Extension of a path without the dot, or undefined when there is none.
 * A leading dot alone (".bashrc") does not start an extension.
 */
export function getExtension(filePath: string): string | undefined {
  const name = basename(filePath);
  const index = name.lastIndexOf('.');
  if (index <= 0) return undefined;
  return name.slice(index + 1);
}

function isDirectory(filePath: string): boolean {
  try {
    return statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

function containsAny(dir: string, markers: readonly string[]): boolean {
  return markers.some((marker) => existsSync(join(dir, marker)));
}

/**
 * Decide whether a path is an executable or belongs to a package root.
 *
 * True when the extension is one of `exe_extensions` (case-insensitive),
 * when the path is a directory holding one of `package_dirs`, or when it
 * is anything else and its parent directory holds one. Only performs
 * read-only existence checks; a missing path simply yields false.
 */
export function isExeOrPackage(filePath: string, config: NamefmtConfig): boolean {
  const { exe_extensions, package_dirs } = config.detection;

  const ext = getExtension(filePath);
  if (ext !== undefined) {
    const lowered = ext.toLowerCase();
    if (exe_extensions.some((e) => e.toLowerCase() === lowered)) {
      return true;
    }
  }

  if (isDirectory(filePath)) {
    return containsAny(filePath, package_dirs);
  }

  return containsAny(dirname(filePath), package_dirs);
}
