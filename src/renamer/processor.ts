/**
 * Applies the NameTransformer to a file or a directory tree.
 *
 * Processing is strictly sequential. The first filesystem error aborts the
 * run; files already renamed stay renamed.
 */

import { rename, stat } from 'node:fs/promises';
import { PathNotFoundError, RenameError } from '../errors.js';
import type { NameTransformer } from '../naming/transformer.js';
import type { RenamePlan } from '../naming/types.js';
import { debugLog, debugVerbose } from '../utils/debug.js';
import { walkFiles } from './walker.js';

export type RenameAction = 'renamed' | 'would-rename';

export interface RenameEvent {
  readonly action: RenameAction;
  readonly plan: RenamePlan;
}

export type RenameReporter = (event: RenameEvent) => void;

export interface ProcessOptions {
  /** Perform renames on disk (default: dry run) */
  inplace?: boolean;

  /** Prepend a YYYY_MM_DD__ prefix to every name */
  timestamp?: boolean;

  /** Called once per affected file, after the rename when `inplace` */
  onRename?: RenameReporter;
}

export interface ProcessSummary {
  /** Files handed to the transformer */
  scanned: number;

  /** Files that were renamed, or would be in a dry run */
  planned: number;
}

/**
 * Stdout line for a rename event
 *
 * @example
 * formatRenameEvent({ action: 'would-rename', plan })
 * // 'Would rename: ./a b.txt -> ./a_b.txt'
 */
export function formatRenameEvent(event: RenameEvent): string {
  const label = event.action === 'renamed' ? 'Renamed' : 'Would rename';
  return `${label}: ${event.plan.from} -> ${event.plan.to}`;
}

async function kindOf(path: string): Promise<'file' | 'directory' | 'missing'> {
  try {
    const stats = await stat(path);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'missing';
  } catch {
    return 'missing';
  }
}

export class RenameProcessor {
  private readonly inplace: boolean;
  private readonly timestamp: boolean;
  private readonly onRename: RenameReporter;

  constructor(
    private readonly transformer: NameTransformer,
    options: ProcessOptions = {},
  ) {
    this.inplace = options.inplace ?? false;
    this.timestamp = options.timestamp ?? false;
    this.onRename = options.onRename ?? (() => {});
  }

  /**
   * Process a single file or every file beneath a directory
   *
   * @throws PathNotFoundError when `root` is neither a file nor a directory
   * @throws RenameError on the first failed read or rename
   */
  async process(root: string): Promise<ProcessSummary> {
    const summary: ProcessSummary = { scanned: 0, planned: 0 };

    const kind = await kindOf(root);
    debugLog(`Processing ${kind} ${root} (${this.inplace ? 'in place' : 'dry run'})`);

    if (kind === 'file') {
      await this.processFile(root, summary);
    } else if (kind === 'directory') {
      try {
        for await (const filePath of walkFiles(root)) {
          await this.processFile(filePath, summary);
        }
      } catch (error) {
        if (error instanceof RenameError) throw error;
        throw new RenameError(root, error);
      }
    } else {
      throw new PathNotFoundError(root);
    }

    return summary;
  }

  private async processFile(filePath: string, summary: ProcessSummary): Promise<void> {
    summary.scanned++;

    const plan = this.transformer.format(filePath, { timestamp: this.timestamp });
    if (!plan) {
      debugVerbose(`Unchanged: ${filePath}`);
      return;
    }

    summary.planned++;

    if (this.inplace) {
      try {
        await rename(plan.from, plan.to);
      } catch (error) {
        throw new RenameError(plan.from, error);
      }
      this.onRename({ action: 'renamed', plan });
    } else {
      this.onRename({ action: 'would-rename', plan });
    }
  }
}

export async function processPath(
  root: string,
  transformer: NameTransformer,
  options: ProcessOptions = {},
): Promise<ProcessSummary> {
  return new RenameProcessor(transformer, options).process(root);
}
