const metadataFilterSchema = {
  type: 'object',
  additionalProperties: {
    anyOf: [
      { type: 'string' },
      {
        type: 'object',
        additionalProperties: false,
        minProperties: 1,
        properties: {
          gt: { type: 'number' },
          gte: { type: 'number' },
          lt: { type: 'number' },
          lte: { type: 'number' },
        },
      },
    ],
  },
} as const;

export const questionRequestSchema = {
  type: 'object',
  required: ['question'],
  additionalProperties: false,
  properties: {
    question: { type: 'string', minLength: 1 },
    k: { type: 'integer', minimum: 1, maximum: 100 },
    filter: metadataFilterSchema,
  },
} as const;
