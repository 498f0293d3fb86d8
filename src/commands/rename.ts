import type { Command } from 'commander';
import { getConfigPath, loadConfig } from '../config/index.js';
import { formatError } from '../errors.js';
import { NameTransformer } from '../naming/index.js';
import { formatRenameEvent, processPath } from '../renamer/processor.js';
import { debugError } from '../utils/debug.js';
import { output } from '../utils/output.js';

export interface RenameCommandOptions {
  inplace?: boolean;
  config?: string;
  timestamp?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface RunRenameDeps {
  /** Clock used for the timestamp prefix */
  now?: () => Date;
}

/**
 * Resolve config, then rename (or plan renames for) everything under `target`
 *
 * @returns Process exit code: 0 on success, 1 on any fatal error
 */
export async function runRename(
  target: string | undefined,
  options: RenameCommandOptions,
  deps: RunRenameDeps = {},
): Promise<number> {
  if (options.quiet) {
    output.setLevel('quiet');
  } else if (options.verbose) {
    output.setLevel('verbose');
  }

  try {
    const configPath = getConfigPath(options.config);
    output.verbose(`Using config ${configPath}`);
    const config = await loadConfig(configPath);

    const transformer = new NameTransformer(config, deps.now);
    const summary = await processPath(target ?? '.', transformer, {
      inplace: options.inplace,
      timestamp: options.timestamp,
      onRename: (event) => output.result(formatRenameEvent(event)),
    });

    output.verbose(
      `${summary.planned} of ${summary.scanned} file(s) ${options.inplace ? 'renamed' : 'to rename'}`,
    );
    return 0;
  } catch (error) {
    debugError('Rename failed', error);
    output.error(`Error: ${formatError(error)}`);
    return 1;
  }
}

export function renameCommand(program: Command): void {
  program
    .argument('[path]', 'File or directory to process', '.')
    .option('-i, --inplace', 'Actually perform renames (default: dry run)')
    .option('-c, --config <file>', 'Override config file location')
    .option('--timestamp', 'Prefix YYYY_MM_DD__ (UTC date) to every file name')
    .option('-q, --quiet', 'Suppress non-critical output')
    .option('-v, --verbose', 'Show detailed output')
    .addHelpText(
      'after',
      `
Examples:
  $ namefmt                         # Dry run on the current directory
  $ namefmt ./downloads             # Dry run on a directory, recursively
  $ namefmt -i "./My Notes.txt"     # Rename a single file
  $ namefmt --timestamp -i ./scans  # Date-stamp and rename

Config:
  Read from <user config dir>/namefmt/namefmt.json (created on first run),
  or from --config / NAMEFMT_CONFIG_PATH.
`,
    )
    .action(async (path: string | undefined, options: RenameCommandOptions) => {
      const code = await runRename(path, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
