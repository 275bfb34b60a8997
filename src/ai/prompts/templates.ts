/**
 * Prompt templates for structured (JSON) chat output. Rules: JSON only, no
 * surrounding prose or markdown, schema and example embedded verbatim.
 */
import type { FieldSchema } from './fieldSchema';
import { buildExampleFromSchema } from './outputSchema';

export const SYSTEM_PROMPT_STRICT_JSON = `You are a strict JSON generator.
Respond with a single JSON object that conforms exactly to the given JSON Schema.
Do NOT include any surrounding text, explanations, or markdown. Output MUST be valid JSON.
If you cannot produce a valid object, respond with an empty JSON object {}.`;

/** System instruction asking for JSON that follows `schema`, with a generated example when possible. */
export function generateSystemPromptFromJSONSchema(schema: string): string {
  const example = buildExampleFromSchema(schema);
  let prompt = `${SYSTEM_PROMPT_STRICT_JSON}\nJSON Schema:\n${schema}`;
  if (example) {
    prompt += `\nExample output:\n${example}`;
  }
  return prompt;
}

function describeFields(fields: FieldSchema[], indent: string): string {
  let out = '';
  for (const f of fields) {
    const nested = f.fields ?? [];
    if (f.type === 'object') {
      out += `${indent}"${f.name}": {\n`;
      out += describeFields(nested, indent + '  ');
      out += `${indent}},\n`;
    } else if (f.type === 'array' && nested.length > 0) {
      out += `${indent}"${f.name}": [\n${indent}  {\n`;
      out += describeFields(nested, indent + '    ');
      out += `${indent}  }\n${indent}],\n`;
    } else if (f.type === 'array') {
      out += `${indent}"${f.name}": ["${f.description ?? ''}"],\n`;
    } else {
      out += `${indent}"${f.name}": "${f.description ?? ''} (${f.type})",\n`;
    }
  }
  return out;
}

/** User prompt describing the expected JSON skeleton for `topic`. */
export function buildFieldSchemaPrompt(topic: string, fields: FieldSchema[], instructions: string[] = []): string {
  let prompt = `Please explain "${topic}" in JSON format with the following structure:\n{\n`;
  prompt += describeFields(fields, '  ');
  prompt += '}\n';
  if (instructions.length > 0) {
    prompt += 'Additional instructions:\n';
    prompt += instructions.map((ins) => `- ${ins}\n`).join('');
  }
  prompt += 'Ensure valid JSON only, no extra text.';
  return prompt;
}
