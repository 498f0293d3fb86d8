/**
 * Filename transformation engine
 *
 * @example
 * import { NameTransformer } from './naming/index.js';
 *
 * const transformer = new NameTransformer(config);
 * transformer.format('./src/MyComponent.ts');
 */

export { applyStyle, toCamelCase, toKebabCase, toSnakeCase } from './converters.js';
export { getExtension, isExeOrPackage } from './detection.js';
export { matchesPattern } from './matcher.js';
export { formatFilename, getTimestampPrefix, NameTransformer } from './transformer.js';
export type {
  Behavior,
  DetectionRules,
  FormatOptions,
  NamefmtConfig,
  NamingStyle,
  RenamePlan,
} from './types.js';
export { NAMING_STYLES } from './types.js';
