import { describe, it, expect } from 'vitest';
import {
  buildFieldSchemaPrompt,
  generateSystemPromptFromJSONSchema,
  SYSTEM_PROMPT_STRICT_JSON,
  type FieldSchema,
} from '../../../src/ai/prompts';

describe('generateSystemPromptFromJSONSchema', () => {
  it('embeds the schema and a generated example', () => {
    const schema = '{"type":"object","properties":{"name":{"type":"string"}}}';

    expect(generateSystemPromptFromJSONSchema(schema)).toBe(
      `${SYSTEM_PROMPT_STRICT_JSON}\nJSON Schema:\n${schema}\nExample output:\n{"name":"example"}`
    );
  });

  it('leaves out the example when none can be derived', () => {
    expect(generateSystemPromptFromJSONSchema('{}')).toBe(`${SYSTEM_PROMPT_STRICT_JSON}\nJSON Schema:\n{}`);
  });

  it('starts with the strict JSON rules', () => {
    expect(SYSTEM_PROMPT_STRICT_JSON.split('\n')[0]).toBe('You are a strict JSON generator.');
  });
});

describe('buildFieldSchemaPrompt', () => {
  const fields: FieldSchema[] = [
    { name: 'club', type: 'string', description: 'Club name' },
    {
      name: 'players',
      type: 'array',
      fields: [
        { name: 'name', type: 'string', description: 'Player name' },
        { name: 'goals', type: 'number', description: 'Goals scored' },
      ],
    },
    { name: 'tags', type: 'array', description: 'Tag' },
    { name: 'stadium', type: 'object', fields: [{ name: 'city', type: 'string', description: 'City' }] },
  ];

  it('describes nested fields as a JSON skeleton', () => {
    expect(buildFieldSchemaPrompt('premier league', fields, ['Use 2023 data'])).toBe(
      'Please explain "premier league" in JSON format with the following structure:\n' +
        '{\n' +
        '  "club": "Club name (string)",\n' +
        '  "players": [\n' +
        '    {\n' +
        '      "name": "Player name (string)",\n' +
        '      "goals": "Goals scored (number)",\n' +
        '    }\n' +
        '  ],\n' +
        '  "tags": ["Tag"],\n' +
        '  "stadium": {\n' +
        '    "city": "City (string)",\n' +
        '  },\n' +
        '}\n' +
        'Additional instructions:\n' +
        '- Use 2023 data\n' +
        'Ensure valid JSON only, no extra text.'
    );
  });

  it('omits the instructions block when there are none', () => {
    expect(buildFieldSchemaPrompt('x', [{ name: 'a', type: 'number' }])).toBe(
      'Please explain "x" in JSON format with the following structure:\n{\n  "a": " (number)",\n}\nEnsure valid JSON only, no extra text.'
    );
  });
});
