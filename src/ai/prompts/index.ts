export { SYSTEM_PROMPT_STRICT_JSON, generateSystemPromptFromJSONSchema, buildFieldSchemaPrompt } from './templates';
export {
  schemaFromFields,
  schemaFromMap,
  parseSchemaFieldSpec,
  parseTypeAndDefault,
  normalizeType,
  buildExampleFromSchema,
  isRecord,
} from './outputSchema';
export type { JsonObject } from './outputSchema';
export { validateAgainstFields } from './fieldSchema';
export type { FieldSchema } from './fieldSchema';
