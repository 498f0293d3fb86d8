/**
 * Debug utility for namefmt
 * Controlled by NAMEFMT_DEBUG environment variable:
 * - 0 or undefined: No debug output (default)
 * - 1: Basic debug information (config path, files visited)
 * - 2: Detailed debug information including every decision
 */

const DEBUG_LEVEL = parseInt(process.env.NAMEFMT_DEBUG || '0', 10);

export function debugLog(message: string, ...args: unknown[]): void {
  if (DEBUG_LEVEL > 0) {
    console.error(`[NAMEFMT] ${message}`, ...args);
  }
}

export function debugVerbose(message: string, ...args: unknown[]): void {
  if (DEBUG_LEVEL >= 2) {
    console.error(`[NAMEFMT:VERBOSE] ${message}`, ...args);
  }
}

export function debugError(message: string, error: unknown): void {
  if (DEBUG_LEVEL > 0) {
    console.error(`[NAMEFMT:ERROR] ${message}`);
    if (error instanceof Error) {
      console.error(`  Message: ${error.message}`);
      if (DEBUG_LEVEL >= 2 && error.stack) {
        console.error(`  Stack: ${error.stack}`);
      }
    } else {
      console.error(`  Error: ${String(error)}`);
    }
  }
}

/**
 * Format object for debug output
 */
export function debugFormat(obj: unknown): string {
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}
