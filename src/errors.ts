/**
 * Error types surfaced by namefmt.
 *
 * Every fatal error reaches the command action, which prints
 * `Error: <message>` on stderr and exits with status 1.
 */

export class NamefmtError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The per-user config directory could not be determined
 */
export class ConfigDirectoryError extends NamefmtError {
  constructor() {
    super('Could not determine config directory');
  }
}

/**
 * The target given on the command line is neither a file nor a directory
 */
export class PathNotFoundError extends NamefmtError {
  constructor(readonly path: string) {
    super(`Path does not exist: ${path}`);
  }
}

/**
 * A filesystem operation failed while walking or renaming
 */
export class RenameError extends NamefmtError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
