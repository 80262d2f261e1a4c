// Strict JSON Schema for the gate report written by the harness

export const gateReportSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['checks', 'overall'],
  additionalProperties: false,
  properties: {
    checks: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'status', 'message'],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          status: { type: 'string', enum: ['pass', 'fail'] },
          message: { type: 'string' }
        }
      }
    },
    overall: { type: 'string', enum: ['pass', 'fail'] },
    base_ref: { type: 'string', minLength: 1 },
    generated_at_utc: { type: 'string', format: 'date-time' }
  }
} as const;
