import { describe, it, expect } from 'vitest';
import { CompilationError } from '../../src/errors.js';
import { defineModel, resolveField, type FieldDefinition } from '../../src/model/schema.js';

describe('defineModel', () => {
  it('adds an implicit id stored as _id', () => {
    const model = defineModel('users', { name: { type: 'string' } });
    expect(model.fields['id']).toEqual({ type: 'id', storageName: '_id' });
    expect(Object.keys(model.fields)).toEqual(['name', 'id']);
  });

  it('keeps a caller-declared id field', () => {
    const model = defineModel('users', { id: { type: 'string', storageName: '_id' } });
    expect(model.fields['id']).toEqual({ type: 'string', storageName: '_id' });
  });

  it('freezes the schema', () => {
    const model = defineModel('users', { name: { type: 'string' } });
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.fields)).toBe(true);
  });

  it('rejects an empty collection name', () => {
    expect(() => defineModel(' ', {})).toThrow(CompilationError);
  });

  it('rejects invalid field names', () => {
    expect(() => defineModel('users', { 'first name': { type: 'string' } })).toThrow(
      'defineModel: invalid field name "first name" in "users"',
    );
  });

  it('rejects unknown field types', () => {
    const fields = { name: { type: 'text' } } as unknown as Record<string, FieldDefinition>;
    expect(() => defineModel('users', fields)).toThrow('has unknown type "text"');
  });

  it('rejects two fields sharing a storage name', () => {
    expect(() =>
      defineModel('users', { a: { type: 'string', storageName: 'x' }, b: { type: 'string', storageName: 'x' } }),
    ).toThrow('defineModel: storage name "x" is used twice in "users"');
  });
});

describe('resolveField', () => {
  const model = defineModel('orders', {
    total: { type: 'decimal', storageName: 'amount' },
    meta: { type: 'json', storageName: 'm' },
  });

  it('resolves declared fields to their storage path', () => {
    expect(resolveField(model, 'total')).toMatchObject({ name: 'total', type: 'decimal', storagePath: 'amount' });
  });

  it('resolves dotted paths below a json field', () => {
    expect(resolveField(model, 'meta.source.channel')).toMatchObject({
      type: 'json',
      storagePath: 'm.source.channel',
    });
  });

  it('rejects dotted paths below non-json fields', () => {
    expect(() => resolveField(model, 'total.cents')).toThrow('Unknown field "total.cents" in "orders"');
  });
});
