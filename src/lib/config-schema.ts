import { DOCUMENT_TYPES, OUTPUT_MODES } from './document-types.js';

const perDocumentType = (valueSchema: Record<string, unknown>) => ({
  type: 'object',
  propertyNames: { enum: [...DOCUMENT_TYPES] },
  additionalProperties: valueSchema,
});

/**
 * Schema for `.revdoc/config.yaml`. Every key is optional; unknown keys are
 * rejected so typos surface instead of being ignored.
 */
export const configFileSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    api: {
      type: 'object',
      additionalProperties: false,
      properties: {
        url: { type: 'string', minLength: 1 },
        key: { type: 'string' },
        model: { type: 'string', minLength: 1 },
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        maxTokens: { type: 'integer', minimum: 1 },
        timeoutMs: { type: 'integer', minimum: 1000 },
      },
    },
    cache: {
      type: 'object',
      additionalProperties: false,
      properties: {
        dir: { type: 'string', minLength: 1 },
      },
    },
    output: {
      type: 'object',
      additionalProperties: false,
      properties: {
        modes: perDocumentType({ enum: [...OUTPUT_MODES] }),
        files: perDocumentType({ type: 'string', minLength: 1 }),
      },
    },
    project: {
      type: 'object',
      additionalProperties: false,
      properties: {
        title: { type: 'string' },
        version: { type: 'string' },
        rules: { type: 'string' },
        example: { type: 'string' },
      },
    },
  },
} as const;
