/**
 * Configuration document schema and validator
 * Uses Ajv with `useDefaults` so missing fields are filled in while validating
 */

import AjvModule, { type ErrorObject } from 'ajv';
import { NAMING_STYLES, type NamingStyle } from '../naming/types.js';
import { DEFAULT_EXE_EXTENSIONS, DEFAULT_PACKAGE_DIRS } from './defaults.js';

const Ajv = AjvModule.default;

/**
 * Shape of a config document once defaults have been applied
 */
export interface ConfigDocument {
  replace_spaces: boolean;
  behaviors: Array<{ pattern: string; style: NamingStyle }>;
  detection: {
    exe_extensions: string[];
    package_dirs: string[];
  };
}

export const configSchema = {
  type: 'object',
  properties: {
    replace_spaces: { type: 'boolean', default: true },
    behaviors: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        properties: {
          pattern: { type: 'string' },
          style: { type: 'string', enum: [...NAMING_STYLES] },
        },
        required: ['pattern', 'style'],
      },
    },
    detection: {
      type: 'object',
      default: {},
      properties: {
        exe_extensions: {
          type: 'array',
          items: { type: 'string' },
          default: [...DEFAULT_EXE_EXTENSIONS],
        },
        package_dirs: {
          type: 'array',
          items: { type: 'string' },
          default: [...DEFAULT_PACKAGE_DIRS],
        },
      },
    },
  },
};

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  useDefaults: true,
});

const validate = ajv.compile<ConfigDocument>(configSchema);

export type ConfigValidationResult =
  | { valid: true; document: ConfigDocument }
  | { valid: false; errors: string[] };

/**
 * Validate a parsed document, filling in defaults in place
 */
export function validateConfigDocument(data: unknown): ConfigValidationResult {
  if (validate(data)) {
    return { valid: true, document: data };
  }
  return { valid: false, errors: formatValidationErrors(validate.errors ?? []) };
}

/**
 * Format Ajv validation errors into single-line messages
 */
function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'required':
        return `Missing required property: '${String(error.params.missingProperty)}' at ${path}`;

      case 'type':
        return `Property '${path}' must be of type ${String(error.params.type)}`;

      case 'enum': {
        const allowed: unknown = error.params.allowedValues;
        const list = Array.isArray(allowed) ? allowed.join(', ') : String(allowed);
        return `Property '${path}' must be one of: ${list}`;
      }

      default:
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
