/**
 * Lightweight structural validation for Tracemark documents (graphs,
 * signature documents, configuration) without an external validator.
 * Handles the subset of JSON Schema those documents need.
 */

export interface SchemaValidationError {
  /** Dotted path of the offending field; empty for the document itself. */
  path: string;
  message: string;
  value?: unknown;
}

export interface SchemaValidationResult {
  valid: boolean;
  errors: SchemaValidationError[];
}

/** Schema for one field. `nullable` also admits `null`. */
export type FieldSchema =
  | { type: 'string'; minLength?: number; pattern?: RegExp; const?: string; nullable?: boolean }
  | { type: 'number'; minimum?: number; maximum?: number; nullable?: boolean }
  | { type: 'boolean'; nullable?: boolean }
  | { type: 'array'; items?: FieldSchema }
  | { type: 'object'; properties?: Readonly<Record<string, FieldSchema>>; required?: readonly string[] };

function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function validateField(value: unknown, schema: FieldSchema, path: string, errors: SchemaValidationError[]): void {
  if (value === null && 'nullable' in schema && schema.nullable) {
    return;
  }

  switch (schema.type) {
    case 'string': {
      if (typeof value !== 'string') {
        errors.push({ path, message: 'must be a string', value });
        return;
      }
      if (schema.minLength !== undefined && value.length < schema.minLength) {
        errors.push({ path, message: `must have minimum length ${schema.minLength}`, value });
      }
      if (schema.pattern && !schema.pattern.test(value)) {
        errors.push({ path, message: `must match pattern ${schema.pattern.source}`, value });
      }
      if (schema.const !== undefined && value !== schema.const) {
        errors.push({ path, message: `must be "${schema.const}"`, value });
      }
      return;
    }
    case 'number': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        errors.push({ path, message: 'must be a number', value });
        return;
      }
      if (schema.minimum !== undefined && value < schema.minimum) {
        errors.push({ path, message: `must be >= ${schema.minimum}`, value });
      }
      if (schema.maximum !== undefined && value > schema.maximum) {
        errors.push({ path, message: `must be <= ${schema.maximum}`, value });
      }
      return;
    }
    case 'boolean': {
      if (typeof value !== 'boolean') {
        errors.push({ path, message: 'must be a boolean', value });
      }
      return;
    }
    case 'array': {
      if (!Array.isArray(value)) {
        errors.push({ path, message: 'must be an array', value });
        return;
      }
      if (schema.items) {
        for (let i = 0; i < value.length; i++) {
          validateField(value[i], schema.items, `${path}[${i}]`, errors);
        }
      }
      return;
    }
    case 'object': {
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        errors.push({ path, message: 'must be an object', value });
        return;
      }
      const obj = new Map<string, unknown>(Object.entries(value));
      for (const key of schema.required ?? []) {
        if (obj.get(key) === undefined) {
          errors.push({ path: childPath(path, key), message: 'is required' });
        }
      }
      for (const [key, propSchema] of Object.entries(schema.properties ?? {})) {
        const member = obj.get(key);
        if (member !== undefined) {
          validateField(member, propSchema, childPath(path, key), errors);
        }
      }
      return;
    }
  }
}

/**
 * Validate a value against a {@link FieldSchema}, collecting every error.
 *
 * @example
 * ```typescript
 * const result = validateSchema(doc, { type: 'object', required: ['nodes'] });
 * if (!result.valid) console.error(formatSchemaErrors(result.errors));
 * ```
 */
export function validateSchema(value: unknown, schema: FieldSchema): SchemaValidationResult {
  const errors: SchemaValidationError[] = [];
  validateField(value, schema, '', errors);
  return { valid: errors.length === 0, errors };
}

/** Render errors as `path message` clauses joined by `; `. */
export function formatSchemaErrors(errors: readonly SchemaValidationError[]): string {
  return errors.map((e) => `${e.path || '(root)'} ${e.message}`).join('; ');
}
