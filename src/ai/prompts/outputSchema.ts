/**
 * Minimal JSON Schema builder for chat output. A flat map of dot-notation paths
 * to type shorthands becomes a nested object schema:
 *
 *   schemaFromFields({ 'author.name': 'text', 'author.age': 'int=18' }, ['author.name'])
 */

interface SchemaNode {
  type: string;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  default?: unknown;
}

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const TYPE_ALIASES = new Map<string, string>([
  ['text', 'string'],
  ['string', 'string'],
  ['int', 'integer'],
  ['integer', 'integer'],
  ['float', 'number'],
  ['number', 'number'],
  ['bool', 'boolean'],
  ['boolean', 'boolean'],
  ['object', 'object'],
  ['array', 'array'],
]);

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/** Maps shorthands (text, int, float, bool) to JSON Schema types; unknown types pass through. */
export function normalizeType(type: string): string {
  return TYPE_ALIASES.get(type.toLowerCase()) ?? type;
}

function convertDefault(type: string, raw: string): unknown {
  switch (type.toLowerCase()) {
    case 'int':
    case 'integer':
      if (/^[+-]?\d+$/.test(raw)) return parseInt(raw, 10);
      break;
    case 'float':
    case 'number':
      if (raw !== '' && Number.isFinite(Number(raw))) return Number(raw);
      break;
    case 'bool':
    case 'boolean':
      if (TRUE_LITERALS.has(raw)) return true;
      if (FALSE_LITERALS.has(raw)) return false;
      break;
  }
  return raw;
}

/** "int=5" → { type: 'int', defaultValue: 5 }; an empty type means string. */
export function parseTypeAndDefault(spec: string): { type: string; defaultValue?: unknown } {
  const eq = spec.indexOf('=');
  const type = (eq === -1 ? spec : spec.slice(0, eq)).trim() || 'string';
  if (eq === -1) return { type };
  return { type, defaultValue: convertDefault(type, spec.slice(eq + 1).trim()) };
}

/** Property maps have no prototype, so field names like `__proto__` stay plain keys. */
function emptyProperties(): Record<string, SchemaNode> {
  return Object.create(null);
}

function addRequired(node: SchemaNode, field: string): void {
  node.required = node.required ?? [];
  if (!node.required.includes(field)) node.required.push(field);
}

export function schemaFromFields(props: Record<string, string>, required: string[] = []): string {
  const root: SchemaNode = { type: 'object', properties: emptyProperties() };
  const requiredPaths = new Set(required);

  for (const [key, spec] of Object.entries(props)) {
    const parts = key.split('.');
    const { type, defaultValue } = parseTypeAndDefault(spec);
    let current = root;

    for (let i = 0; i < parts.length; i++) {
      const part = parts[i];
      const properties = current.properties ?? (current.properties = emptyProperties());

      if (i === parts.length - 1) {
        const prop: SchemaNode = { type: normalizeType(type) };
        if (defaultValue !== undefined) prop.default = defaultValue;
        properties[part] = prop;
        // top-level requirements are collected below, in the order given
        if (parts.length > 1 && requiredPaths.has(key)) addRequired(current, part);
        break;
      }

      let next = properties[part];
      if (!next) {
        next = { type: 'object', properties: emptyProperties() };
        properties[part] = next;
      } else if (!next.properties) {
        next.type = 'object';
        next.properties = emptyProperties();
      }
      current = next;
    }
  }

  const topLevel = required.filter((r) => !r.includes('.'));
  if (topLevel.length > 0) root.required = topLevel;

  return JSON.stringify(root);
}

export function schemaFromMap(props: Record<string, string>): string {
  return schemaFromFields(props);
}

/** "author.name:text, author.age:int" → { 'author.name': 'text', 'author.age': 'int' } */
export function parseSchemaFieldSpec(spec: string): Record<string, string> {
  const props: Record<string, string> = Object.create(null);
  for (const entry of spec.split(',')) {
    const colon = entry.indexOf(':');
    const key = (colon === -1 ? entry : entry.slice(0, colon)).trim();
    if (!key) continue;
    props[key] = colon === -1 ? '' : entry.slice(colon + 1).trim();
  }
  return props;
}

function exampleForType(type: unknown, node: JsonObject): unknown {
  switch (type) {
    case 'string':
      return 'example';
    case 'number':
    case 'integer':
      return 0;
    case 'boolean':
      return true;
    case 'object':
      return {};
    case 'array': {
      const items = node.items;
      if (!isRecord(items)) return [];
      switch (items.type) {
        case 'string':
          return ['example'];
        case 'number':
        case 'integer':
          return [0];
        case 'boolean':
          return [true];
        default:
          return [];
      }
    }
    default:
      return null;
  }
}

/**
 * Best-effort example object from the schema's top-level properties.
 * Returns '' when the schema is not JSON or has no `properties` object.
 */
export function buildExampleFromSchema(schema: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(schema);
  } catch {
    return '';
  }
  if (!isRecord(parsed) || !isRecord(parsed.properties)) return '';

  const example: JsonObject = Object.create(null);
  for (const [key, value] of Object.entries(parsed.properties)) {
    example[key] = isRecord(value) && typeof value.type === 'string' ? exampleForType(value.type, value) : null;
  }
  return JSON.stringify(example);
}
