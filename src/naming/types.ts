/**
 * Type definitions for the filename transformation engine.
 *
 * Field names follow the on-disk configuration document (snake_case keys),
 * so a validated config file maps onto these types without renaming.
 */

/**
 * Supported naming styles. Values are the strings written in the config file.
 */
export type NamingStyle = 'camelCase' | 'snake_case' | 'kebab-case';

export const NAMING_STYLES: readonly NamingStyle[] = ['camelCase', 'snake_case', 'kebab-case'];

/**
 * A (pattern, style) pair: names matching `pattern` are rewritten in `style`
 */
export interface Behavior {
  /** Substring, or a single-`*` prefix/suffix pattern: "*.log", "test_*" */
  readonly pattern: string;
  readonly style: NamingStyle;
}

/**
 * Heuristics identifying executables and package roots
 */
export interface DetectionRules {
  /** Extensions without the dot, compared case-insensitively: "exe" */
  readonly exe_extensions: readonly string[];

  /** Marker files whose presence makes a directory a package: "package.json" */
  readonly package_dirs: readonly string[];
}

export interface NamefmtConfig {
  /** Replace spaces with underscores when no behavior matched */
  readonly replace_spaces: boolean;

  /** Evaluated in declaration order; the first match wins */
  readonly behaviors: readonly Behavior[];

  readonly detection: DetectionRules;
}

/**
 * A rename the engine decided on for a single file
 */
export interface RenamePlan {
  /** Original path, as supplied by the caller */
  readonly from: string;

  /** Destination path: original parent directory joined with `newName` */
  readonly to: string;

  /** Original base name */
  readonly name: string;

  /** Transformed base name */
  readonly newName: string;
}

export interface FormatOptions {
  /** Prepend a YYYY_MM_DD__ prefix (UTC date) */
  readonly timestamp?: boolean;
}
