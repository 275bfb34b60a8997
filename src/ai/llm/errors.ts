/**
 * Chat agent error taxonomy. Callers (routes) branch on the class to tell
 * "the call failed" apart from "the call succeeded but the output didn't parse".
 */
import type { ChatResult } from './types';

export type LLMErrorKind = 'configuration' | 'transport' | 'empty_response' | 'schema' | 'output_parse' | 'output_validation';

export abstract class LLMError extends Error {
  abstract readonly kind: LLMErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid agent configuration. Fatal at construction; never retried. */
export class ConfigurationError extends LLMError {
  readonly kind = 'configuration';
}

/** Network failure, remote API error or timeout. */
export class TransportError extends LLMError {
  readonly kind = 'transport';
}

/** The API answered but returned zero choices. */
export class EmptyResponseError extends LLMError {
  readonly kind = 'empty_response';

  constructor() {
    super('empty response choices');
  }
}

/** The supplied output schema is not valid JSON. */
export class SchemaError extends LLMError {
  readonly kind = 'schema';
}

/** The model's reply is not valid JSON. Carries the raw result. */
export class OutputParseError extends LLMError {
  readonly kind = 'output_parse';

  constructor(
    message: string,
    readonly result: ChatResult,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The reply parsed but does not match the requested field schema. */
export class OutputValidationError extends LLMError {
  readonly kind = 'output_validation';
}
