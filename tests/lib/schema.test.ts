import { describe, it, expect } from 'vitest';
import { bundledSchemaPath, loadSchema, validateWithSchema } from '@/lib/schema.js';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('validateWithSchema', () => {
  it('should validate valid data against schema', () => {
    const schema = {
      type: 'object',
      properties: {
        width: { type: 'integer' },
        alignment: { type: 'string' },
      },
      required: ['width'],
    };

    const data = { width: 4, alignment: 'Left' };
    const result = validateWithSchema<typeof data>(data, schema);

    expect(result.valid).toBe(true);
    expect(result.data).toEqual(data);
    expect(result.errors).toEqual([]);
  });

  it('should reject invalid data with path-prefixed messages', () => {
    const schema = {
      type: 'object',
      properties: {
        width: { type: 'integer', minimum: 0 },
      },
      required: ['width'],
    };

    const result = validateWithSchema({ width: -3 }, schema);

    expect(result.valid).toBe(false);
    expect(result.data).toBeNull();
    expect(result.errors).toEqual(['/width: must be >= 0']);
    expect(result.rawErrors?.[0]?.keyword).toBe('minimum');
  });

  it('should reuse a compiled schema for the same $id', () => {
    const schema = {
      $id: 'test-width-schema',
      type: 'object',
      properties: {
        width: { type: 'integer' },
      },
    };

    expect(validateWithSchema({ width: 1 }, schema).valid).toBe(true);
    expect(validateWithSchema({ width: 'wide' }, { ...schema }).valid).toBe(false);
  });
});

describe('loadSchema', () => {
  it('should load the bundled schemas', async () => {
    const config = await loadSchema(bundledSchemaPath('config'));
    const request = await loadSchema(bundledSchemaPath('pad_request'));

    expect(config).toHaveProperty('$schema');
    expect(request).toHaveProperty('title', 'PadRequest');
  });

  it('should throw on unreadable or non-object schema files', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'padkit-schema-'));
    try {
      const path = join(dir, 'bad.schema.json');
      await writeFile(path, '"just a string"', 'utf-8');

      await expect(loadSchema(path)).rejects.toThrow('Failed to load schema');
      await expect(loadSchema(join(dir, 'missing.json'))).rejects.toThrow('Failed to load schema');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
