/**
 * JSON Schema validation utilities using Ajv.
 *
 * Provides functions to load the bundled schemas and validate data against them.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/**
 * Raw AJV error object (subset of fields we care about).
 */
export interface RawAjvError {
  instancePath: string;
  schemaPath: string;
  keyword: string;
  params: Record<string, unknown>;
  message?: string;
}

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
  /** Raw AJV error objects for diagnostics */
  rawErrors?: RawAjvError[];
}

/** Schemas shipped in the package's `schemas/` directory. */
export type BundledSchema = 'config' | 'pad_request';

// Type assertion needed due to NodeNext module resolution
const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean; verbose?: boolean }) => {
  compile: (schema: object) => ValidateFunction;
};

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
});

// Compiled schemas keyed by $id (or the stringified schema)
const schemaCache = new Map<string, ValidateFunction>();

function schemaKey(schema: object): string {
  if ('$id' in schema && typeof schema.$id === 'string') {
    return schema.$id;
  }
  return JSON.stringify(schema);
}

/**
 * Path of a bundled schema file, resolved next to the package.
 */
export function bundledSchemaPath(name: BundledSchema): string {
  return fileURLToPath(new URL(`../../schemas/${name}.schema.json`, import.meta.url));
}

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema is not a JSON object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Validates data against a JSON schema using Ajv.
 *
 * Compiled schemas are cached by `$id`.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const key = schemaKey(schema);
  let validate = schemaCache.get(key);
  if (!validate) {
    validate = ajv.compile(schema);
    schemaCache.set(key, validate);
  }

  if (validate(data)) {
    return {
      valid: true,
      // Ajv has checked the shape described by the schema
      data: data as T,
      errors: [],
    };
  }

  const rawErrors: RawAjvError[] = (validate.errors ?? []).map((e) => ({
    instancePath: e.instancePath || '',
    schemaPath: e.schemaPath || '',
    keyword: e.keyword || '',
    params: e.params,
    message: e.message,
  }));

  const errors = rawErrors.map((error) => {
    const path = error.instancePath || error.schemaPath;
    return `${path ? `${path}: ` : ''}${error.message || 'Validation error'}`;
  });

  return {
    valid: false,
    data: null,
    errors,
    rawErrors,
  };
}
