/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors, warnings and rename lines
 * - normal: Adds informational messages (default)
 * - verbose: Adds the config path and a run summary
 *
 * Rename lines ("Renamed: a -> b") are the command's result and are
 * printed at every level.
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

class OutputManager {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';

  private constructor() {
    if (process.env.NAMEFMT_QUIET === '1') {
      this.level = 'quiet';
    } else if (process.env.NAMEFMT_VERBOSE === '1') {
      this.level = 'verbose';
    }
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  /**
   * Set output level (CLI flags override environment variables)
   */
  setLevel(level: OutputLevel): void {
    this.level = level;
  }

  /**
   * Command result line - always shown, on stdout
   */
  result(message: string): void {
    console.log(message);
  }

  /**
   * Info message - shown in normal and verbose modes, on stderr so that
   * stdout only carries rename lines
   */
  info(message: string): void {
    if (this.level !== 'quiet') {
      console.error(message);
    }
  }

  /**
   * Warning message - always shown
   */
  warn(message: string): void {
    console.warn(message);
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Verbose message - only shown in verbose mode
   */
  verbose(message: string): void {
    if (this.level === 'verbose') {
      console.error(message);
    }
  }
}

export const output = OutputManager.getInstance();
