import { describe, it, expect } from 'vitest';
import { validateAgainstFields, type FieldSchema } from '../../../src/ai/prompts';
import { OutputValidationError } from '../../../src/ai/llm/errors';

const fields: FieldSchema[] = [
  { name: 'club', type: 'string' },
  { name: 'founded', type: 'number' },
  {
    name: 'players',
    type: 'array',
    fields: [
      { name: 'name', type: 'string' },
      { name: 'goals', type: 'number' },
    ],
  },
  { name: 'tags', type: 'array' },
  { name: 'stadium', type: 'object', fields: [{ name: 'city', type: 'string' }] },
];

const valid = {
  club: 'Example FC',
  founded: 1900,
  players: [{ name: 'A. Player', goals: 3 }],
  tags: ['one', 2],
  stadium: { city: 'Springfield', extra: true },
};

describe('validateAgainstFields', () => {
  it('returns the object when every field is present and typed', () => {
    expect(validateAgainstFields(valid, fields)).toBe(valid);
  });

  it('rejects a non-object root', () => {
    expect(() => validateAgainstFields([], fields)).toThrow('top-level JSON is not an object');
    expect(() => validateAgainstFields(null, fields)).toThrow(OutputValidationError);
  });

  it('names the first missing field', () => {
    const { founded: _founded, ...rest } = valid;
    expect(() => validateAgainstFields(rest, fields)).toThrow('missing field: founded');
  });

  it('does not count inherited names as present fields', () => {
    const builtIns: FieldSchema[] = [
      { name: 'constructor', type: 'string' },
      { name: 'toString', type: 'string' },
    ];

    expect(() => validateAgainstFields({}, builtIns)).toThrow('missing field: constructor');
    expect(() => validateAgainstFields({ constructor: 'x' }, builtIns)).toThrow('missing field: toString');
    const own = { constructor: 'x', toString: 'y' };
    expect(validateAgainstFields(own, builtIns)).toBe(own);
  });

  it('names a field of the wrong type', () => {
    expect(() => validateAgainstFields({ ...valid, club: 1 }, fields)).toThrow("field 'club' should be string");
    expect(() => validateAgainstFields({ ...valid, founded: '1900' }, fields)).toThrow("field 'founded' should be number");
    expect(() => validateAgainstFields({ ...valid, tags: 'a' }, fields)).toThrow("field 'tags' should be array");
  });

  it('checks every item of an array of objects', () => {
    const data = { ...valid, players: [{ name: 'ok', goals: 1 }, { name: 'bad', goals: 'x' }] };

    expect(() => validateAgainstFields(data, fields)).toThrow(
      "array item in 'players' invalid: field 'goals' should be number"
    );
  });

  it('checks nested objects', () => {
    expect(() => validateAgainstFields({ ...valid, stadium: {} }, fields)).toThrow(
      "object field 'stadium' invalid: missing field: city"
    );
    expect(() => validateAgainstFields({ ...valid, stadium: 'Wembley' }, fields)).toThrow(
      "object field 'stadium' invalid: top-level JSON is not an object"
    );
  });
});
