import { convertSchema } from './schema.util';

describe('convertSchema', () => {
  it('upper-cases types and keeps the supported keywords', () => {
    const result = convertSchema({
      type: 'object',
      description: 'Search options',
      required: ['query', 3],
      properties: {
        query: { type: 'string', description: 'Text to find' },
        mode: { type: 'string', enum: ['fast', 'exact'] },
        tags: { type: 'array', items: { type: 'string' } },
      },
    });

    expect(result).toEqual({
      type: 'OBJECT',
      description: 'Search options',
      required: ['query'],
      properties: {
        query: { type: 'STRING', description: 'Text to find' },
        mode: { type: 'STRING', enum: ['fast', 'exact'] },
        tags: { type: 'ARRAY', items: { type: 'STRING' } },
      },
    });
  });

  it('drops unsupported keywords', () => {
    const result = convertSchema({
      $schema: 'http://json-schema.org/draft-07/schema#',
      type: 'integer',
      exclusiveMinimum: 0,
      additionalProperties: false,
    });

    expect(result).toEqual({ type: 'INTEGER' });
  });

  it('prefers the array branch of a union and carries the description over', () => {
    const result = convertSchema({
      description: 'One path or several',
      anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
    });

    expect(result).toEqual({
      type: 'ARRAY',
      description: 'One path or several',
      items: { type: 'STRING' },
    });
  });

  it('takes the first oneOf branch when none is an array', () => {
    const result = convertSchema({
      oneOf: [{ type: 'number', description: 'seconds' }, { type: 'string' }],
    });

    expect(result).toEqual({ type: 'NUMBER', description: 'seconds' });
  });

  it('keeps the branch description when it has one', () => {
    const result = convertSchema({
      description: 'outer',
      anyOf: [{ type: 'boolean', description: 'inner' }],
    });

    expect(result).toEqual({ type: 'BOOLEAN', description: 'inner' });
  });

  it('returns undefined for non-object input', () => {
    expect(convertSchema(undefined)).toBeUndefined();
    expect(convertSchema('string')).toBeUndefined();
    expect(convertSchema([{ type: 'string' }])).toBeUndefined();
  });
});
