/**
 * Case-conversion functions for file names.
 *
 * All three are total and idempotent: applying one to its own output
 * returns that output unchanged.
 */

import type { NamingStyle } from './types.js';

const CAMEL_SEPARATORS = /[ _-]+/;
const UPPERCASE = /^\p{Lu}$/u;

function isUpperCase(ch: string): boolean {
  return UPPERCASE.test(ch);
}

function upperFirst(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('');
}

/**
 * Convert a name to camelCase
 *
 * Words are split on runs of spaces, underscores and hyphens. The first
 * word is lower-cased entirely, except a lone word that does not start with
 * an upper-case letter, which is already camelCase and stays as it is.
 * Later words get an upper-cased first character and keep the rest as-is.
 *
 * @example
 * toCamelCase('some-thing')       // 'someThing'
 * toCamelCase('My Cool file.txt') // 'myCoolFile.txt'
 * toCamelCase('README.md')        // 'readme.md'
 * toCamelCase('someThing')        // 'someThing'
 */
export function toCamelCase(str: string): string {
  const words = str.split(CAMEL_SEPARATORS).filter((w) => w.length > 0);
  const [first, ...rest] = words;
  if (first === undefined) return '';

  if (rest.length === 0 && !isUpperCase(Array.from(first)[0] ?? '')) {
    return first;
  }

  return first.toLowerCase() + rest.map(upperFirst).join('');
}

/**
 * Shared scanner for snake_case and kebab-case.
 *
 * Upper-case letters are lowered and preceded by the separator; every
 * character in `normalized` is replaced by the separator. An inserted
 * separator never comes first or right after another separator. Anything
 * else, including separators already in the name, passes through.
 */
function toSeparatedCase(str: string, separator: string, normalized: ReadonlySet<string>): string {
  let result = '';

  const pushSeparator = (): void => {
    if (result.length > 0 && !result.endsWith(separator)) {
      result += separator;
    }
  };

  for (const ch of str) {
    if (isUpperCase(ch)) {
      pushSeparator();
      result += ch.toLowerCase();
    } else if (normalized.has(ch)) {
      pushSeparator();
    } else {
      result += ch;
    }
  }

  return result;
}

const SNAKE_NORMALIZED: ReadonlySet<string> = new Set([' ', '-']);
const KEBAB_NORMALIZED: ReadonlySet<string> = new Set([' ', '_']);

/**
 * Convert a name to snake_case
 *
 * @example
 * toSnakeCase('MyComponent')     // 'my_component'
 * toSnakeCase('file with-dash')  // 'file_with_dash'
 */
export function toSnakeCase(str: string): string {
  return toSeparatedCase(str, '_', SNAKE_NORMALIZED);
}

/**
 * Convert a name to kebab-case
 *
 * @example
 * toKebabCase('My File.js')      // 'my-file.js'
 * toKebabCase('UPPERCASE_FILE')  // 'u-p-p-e-r-c-a-s-e-f-i-l-e'
 */
export function toKebabCase(str: string): string {
  return toSeparatedCase(str, '-', KEBAB_NORMALIZED);
}

export function applyStyle(name: string, style: NamingStyle): string {
  switch (style) {
    case 'camelCase':
      return toCamelCase(name);
    case 'snake_case':
      return toSnakeCase(name);
    case 'kebab-case':
      return toKebabCase(name);
  }
}
