import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { booleanFlagSchema, csvListSchema, parseBody, parseConfig, probabilitySchema } from '../validation';

describe('validation helpers', () => {
  describe('booleanFlagSchema', () => {
    it.each([
      ['true', true],
      ['1', true],
      ['YES', true],
      ['off', false],
      ['0', false],
    ])('parses %s', (input, expected) => {
      expect(booleanFlagSchema.parse(input)).toBe(expected);
    });

    it('rejects other strings', () => {
      expect(booleanFlagSchema.safeParse('maybe').success).toBe(false);
    });
  });

  it('splits and trims comma-separated lists', () => {
    expect(csvListSchema.parse(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
  });

  it('bounds probabilities to [0, 1]', () => {
    expect(probabilitySchema.parse('0.3')).toBe(0.3);
    expect(probabilitySchema.safeParse(1.2).success).toBe(false);
  });

  describe('parseConfig', () => {
    const schema = z.object({ PORT: z.coerce.number().int().default(8000) });

    it('returns parsed values', () => {
      expect(parseConfig(schema, { PORT: '9001' })).toEqual({ PORT: 9001 });
    });

    it('names every invalid key in the error', () => {
      try {
        parseConfig(schema, { PORT: 'abc' });
        throw new Error('expected parseConfig to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error instanceof ValidationError && error.details).toEqual(['PORT: Expected number, received nan']);
      }
    });
  });

  it('raises a 400 validation error for bad bodies', () => {
    const schema = z.object({ query: z.string() });

    expect(() => parseBody(schema, {})).toThrow(ValidationError);
    expect(parseBody(schema, { query: 'hi' })).toEqual({ query: 'hi' });
  });
});
