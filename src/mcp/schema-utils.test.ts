import { describe, it, expect } from 'vitest';
import { jsonSchemaToZod, toPathSegment, toSchemaIssues, toSummary } from './schema-utils.js';

describe('toPathSegment', () => {
  it('keeps names that are already URL safe', () => {
    expect(toPathSegment('get_weather')).toBe('get_weather');
    expect(toPathSegment('list-files')).toBe('list-files');
  });

  it('collapses runs of unsafe characters into one underscore', () => {
    expect(toPathSegment('files/read file')).toBe('files_read_file');
    expect(toPathSegment('git.log::short')).toBe('git_log_short');
  });

  it('trims leading and trailing underscores', () => {
    expect(toPathSegment('  echo  ')).toBe('echo');
    expect(toPathSegment('__private__')).toBe('private');
  });

  it('returns null when nothing usable remains', () => {
    expect(toPathSegment('')).toBeNull();
    expect(toPathSegment('///')).toBeNull();
    expect(toPathSegment('日本')).toBeNull();
  });
});

describe('toSummary', () => {
  it('title-cases words split on underscores, dashes and spaces', () => {
    expect(toSummary('get_current_weather')).toBe('Get Current Weather');
    expect(toSummary('list-ALL files')).toBe('List All Files');
  });
});

describe('jsonSchemaToZod', () => {
  it('requires listed properties and allows the rest to be omitted', () => {
    const schema = jsonSchemaToZod({
      type: 'object',
      properties: { text: { type: 'string' }, count: { type: 'integer' } },
      required: ['text'],
    });

    expect(schema.safeParse({ text: 'hi' }).success).toBe(true);
    expect(schema.safeParse({ text: 'hi', count: 2 }).success).toBe(true);
    expect(schema.safeParse({ count: 2 }).success).toBe(false);
    expect(schema.safeParse({ text: 'hi', count: 2.5 }).success).toBe(false);
  });

  it('allows additional properties unless they are forbidden', () => {
    const open = jsonSchemaToZod({ type: 'object', properties: { a: { type: 'string' } } });
    const closed = jsonSchemaToZod({ type: 'object', properties: { a: { type: 'string' } }, additionalProperties: false });

    expect(open.safeParse({ a: 'x', b: 1 }).success).toBe(true);
    expect(closed.safeParse({ a: 'x', b: 1 }).success).toBe(false);
  });

  it('validates additionalProperties given as a schema', () => {
    const schema = jsonSchemaToZod({ type: 'object', additionalProperties: { type: 'number' } });

    expect(schema.safeParse({ a: 1, b: 2 }).success).toBe(true);
    expect(schema.safeParse({ a: 'one' }).success).toBe(false);
  });

  it('applies string, number and array constraints', () => {
    const schema = jsonSchemaToZod({
      type: 'object',
      properties: {
        code: { type: 'string', pattern: '^[A-Z]{3}$' },
        score: { type: 'number', minimum: 0, maximum: 10 },
        tags: { type: 'array', items: { type: 'string' }, maxItems: 2 },
      },
    });

    expect(schema.safeParse({ code: 'ABC', score: 10, tags: ['a', 'b'] }).success).toBe(true);
    expect(schema.safeParse({ code: 'abc' }).success).toBe(false);
    expect(schema.safeParse({ score: 11 }).success).toBe(false);
    expect(schema.safeParse({ tags: ['a', 'b', 'c'] }).success).toBe(false);
  });

  it('handles enum, const and anyOf', () => {
    expect(jsonSchemaToZod({ enum: ['celsius', 'fahrenheit'] }).safeParse('kelvin').success).toBe(false);
    expect(jsonSchemaToZod({ enum: ['celsius', 'fahrenheit'] }).safeParse('celsius').success).toBe(true);
    expect(jsonSchemaToZod({ const: 3 }).safeParse(3).success).toBe(true);
    expect(jsonSchemaToZod({ const: 3 }).safeParse(4).success).toBe(false);

    const union = jsonSchemaToZod({ anyOf: [{ type: 'string' }, { type: 'null' }] });
    expect(union.safeParse(null).success).toBe(true);
    expect(union.safeParse(1).success).toBe(false);
  });

  it('requires listed properties whose schema has no type', () => {
    const schema = jsonSchemaToZod({
      type: 'object',
      properties: { value: {}, note: { description: 'free text' } },
      required: ['value', 'note'],
    });

    const missing = schema.safeParse({});

    expect(missing.success).toBe(false);
    if (!missing.success) {
      expect(toSchemaIssues(missing.error)).toEqual([
        { path: 'value', message: 'Required' },
        { path: 'note', message: 'Required' },
      ]);
    }
    expect(schema.safeParse({ value: null, note: 3 }).success).toBe(true);
  });

  it('validates a property named __proto__ like any other', () => {
    const schema = jsonSchemaToZod(
      JSON.parse('{"type":"object","properties":{"__proto__":{"type":"string"}},"required":["__proto__"]}')
    );

    expect(schema.safeParse(JSON.parse('{"__proto__":"x"}')).success).toBe(true);
    expect(schema.safeParse(JSON.parse('{"__proto__":5}')).success).toBe(false);
  });

  it('applies type keywords alongside enum and anyOf', () => {
    const unit = jsonSchemaToZod({ type: 'string', enum: ['celsius', 1] });
    const schema = jsonSchemaToZod({
      type: 'object',
      properties: { a: { type: 'string' } },
      required: ['a'],
      anyOf: [{ required: ['b'] }, { required: ['c'] }],
    });

    expect(unit.safeParse('celsius').success).toBe(true);
    expect(unit.safeParse(1).success).toBe(false);
    expect(schema.safeParse({ a: 'x', b: 1 }).success).toBe(true);
    expect(schema.safeParse({ b: 1 }).success).toBe(false);
    expect(schema.safeParse({ a: 1, c: 1 }).success).toBe(false);
    expect(schema.safeParse({ a: 'x' }).success).toBe(false);
  });

  it('requires oneOf to match exactly one alternative', () => {
    const schema = jsonSchemaToZod({ oneOf: [{ type: 'number' }, { type: 'integer' }] });

    expect(schema.safeParse(1.5).success).toBe(true);
    expect(schema.safeParse('x').success).toBe(false);

    const both = schema.safeParse(2);
    expect(both.success).toBe(false);
    if (!both.success) {
      expect(toSchemaIssues(both.error)).toEqual([
        { path: '(root)', message: 'Value matches 2 schemas where exactly one is allowed' },
      ]);
    }
  });

  it('combines allOf members with the surrounding keywords', () => {
    const schema = jsonSchemaToZod({
      type: 'object',
      required: ['id'],
      allOf: [{ properties: { id: { type: 'integer' } } }, { properties: { name: { type: 'string' } } }],
    });

    expect(schema.safeParse({ id: 1, name: 'x' }).success).toBe(true);
    expect(schema.safeParse({ name: 'x' }).success).toBe(false);
    expect(schema.safeParse({ id: 'one' }).success).toBe(false);
  });

  it('accepts type arrays such as ["string", "null"]', () => {
    const schema = jsonSchemaToZod({ type: ['string', 'null'] });

    expect(schema.safeParse('x').success).toBe(true);
    expect(schema.safeParse(null).success).toBe(true);
    expect(schema.safeParse(5).success).toBe(false);
  });

  it('treats an empty schema as accepting anything', () => {
    expect(jsonSchemaToZod({}).safeParse({ anything: [1, 2] }).success).toBe(true);
  });

  it('throws on schemas that cannot be compiled', () => {
    expect(() => jsonSchemaToZod({ type: 'tuple' })).toThrow('Unsupported JSON Schema type "tuple"');
    expect(() => jsonSchemaToZod({ type: 'string', pattern: '([' })).toThrow();
    expect(() => jsonSchemaToZod({ type: 42 })).toThrow("Schema 'type' must be a string or an array of strings");
    expect(() => jsonSchemaToZod('object')).toThrow('Schema must be an object or boolean');
  });
});

describe('toSchemaIssues', () => {
  it('reports dotted paths, with (root) for the value itself', () => {
    const schema = jsonSchemaToZod({
      type: 'object',
      properties: { items: { type: 'array', items: { type: 'object', properties: { name: { type: 'string' } } } } },
    });

    const nested = schema.safeParse({ items: [{ name: 1 }] });
    const root = schema.safeParse('not an object');

    expect(nested.success).toBe(false);
    expect(root.success).toBe(false);
    if (!nested.success) {
      expect(toSchemaIssues(nested.error).map((issue) => issue.path)).toEqual(['items.0.name']);
    }
    if (!root.success) {
      expect(toSchemaIssues(root.error).map((issue) => issue.path)).toEqual(['(root)']);
    }
  });
});
