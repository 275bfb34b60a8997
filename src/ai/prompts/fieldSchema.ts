import { OutputValidationError } from '../llm/errors';
import { isRecord, type JsonObject } from './outputSchema';

/** Nested description of an expected JSON reply. An array with `fields` is an array of objects. */
export interface FieldSchema {
  name: string;
  type: 'string' | 'number' | 'array' | 'object';
  description?: string;
  fields?: FieldSchema[];
}

function check(data: unknown, fields: FieldSchema[]): JsonObject {
  if (!isRecord(data)) {
    throw new OutputValidationError('top-level JSON is not an object');
  }

  for (const f of fields) {
    if (!Object.hasOwn(data, f.name)) {
      throw new OutputValidationError(`missing field: ${f.name}`);
    }
    const value = data[f.name];
    switch (f.type) {
      case 'string':
        if (typeof value !== 'string') throw new OutputValidationError(`field '${f.name}' should be string`);
        break;
      case 'number':
        if (typeof value !== 'number') throw new OutputValidationError(`field '${f.name}' should be number`);
        break;
      case 'array': {
        if (!Array.isArray(value)) throw new OutputValidationError(`field '${f.name}' should be array`);
        const itemFields = f.fields ?? [];
        if (itemFields.length === 0) break;
        for (const item of value) {
          try {
            check(item, itemFields);
          } catch (error) {
            throw new OutputValidationError(`array item in '${f.name}' invalid: ${(error as Error).message}`, { cause: error });
          }
        }
        break;
      }
      case 'object':
        try {
          check(value, f.fields ?? []);
        } catch (error) {
          throw new OutputValidationError(`object field '${f.name}' invalid: ${(error as Error).message}`, { cause: error });
        }
        break;
    }
  }
  return data;
}

/** Recursive presence/type check. Throws OutputValidationError naming the first bad field. */
export function validateAgainstFields(data: unknown, fields: FieldSchema[]): JsonObject {
  return check(data, fields);
}
