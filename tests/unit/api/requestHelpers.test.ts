import { describe, it, expect } from 'vitest';
import {
  parseOptionalFloat,
  parseOptionalInt,
  readBodyField,
  readChatOptions,
  resolveMessage,
  serializeChatResult,
} from '../../../src/api/requestHelpers';

describe('resolveMessage', () => {
  it('prefers the message field', () => {
    expect(resolveMessage({ body: { message: 'from field' } })).toBe('from field');
  });

  it('falls back to a raw text body', () => {
    expect(resolveMessage({ body: '===CRITERIA===\n' })).toBe('===CRITERIA===\n');
  });

  it('is empty for a JSON body without message', () => {
    expect(resolveMessage({ body: { text: 'x' } })).toBe('');
    expect(resolveMessage({ body: undefined })).toBe('');
  });
});

describe('readBodyField', () => {
  it('accepts strings and numbers only', () => {
    const req = { body: { a: 'x', b: 3, c: true, d: ['y'] } };
    expect(readBodyField(req, 'a')).toBe('x');
    expect(readBodyField(req, 'b')).toBe('3');
    expect(readBodyField(req, 'c')).toBe('');
    expect(readBodyField(req, 'd')).toBe('');
  });
});

describe('optional numbers', () => {
  it('parses floats from numbers and strings', () => {
    expect(parseOptionalFloat(0.3)).toBe(0.3);
    expect(parseOptionalFloat('1.2')).toBe(1.2);
    expect(parseOptionalFloat('')).toBeUndefined();
    expect(parseOptionalFloat('warm')).toBeUndefined();
    expect(parseOptionalFloat(undefined)).toBeUndefined();
  });

  it('parses whole numbers only as integers', () => {
    expect(parseOptionalInt('256')).toBe(256);
    expect(parseOptionalInt(64)).toBe(64);
    expect(parseOptionalInt('12.5')).toBeUndefined();
    expect(parseOptionalInt(12.5)).toBeUndefined();
    expect(parseOptionalInt('12abc')).toBeUndefined();
  });
});

describe('readChatOptions', () => {
  it('reads system, temperature and max_tokens from form values', () => {
    expect(readChatOptions({ body: { system: 'Be brief', temperature: '0.2', max_tokens: '100' } })).toEqual({
      system: 'Be brief',
      temperature: 0.2,
      maxTokens: 100,
    });
  });

  it('ignores values that do not parse', () => {
    expect(readChatOptions({ body: { temperature: 'hot', max_tokens: 'lots' } })).toEqual({});
    expect(readChatOptions({ body: 'raw text' })).toEqual({});
  });
});

describe('serializeChatResult', () => {
  it('uses wire names and omits empty metadata', () => {
    expect(serializeChatResult({ text: 'hi', model: 'gpt-test', finishReason: 'stop', tokens: 9 })).toEqual({
      text: 'hi',
      model: 'gpt-test',
      finish_reason: 'stop',
      tokens: 9,
    });
    expect(serializeChatResult({ text: '', model: '', finishReason: '', tokens: 0 })).toEqual({ text: '' });
  });
});
