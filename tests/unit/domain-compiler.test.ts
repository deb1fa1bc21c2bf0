import { describe, it, expect } from 'vitest';
import { Decimal128, ObjectId } from 'mongodb';
import { compileDomain, likeToRegex } from '../../src/domain/compiler.js';
import { normalizeDomain } from '../../src/domain/normalizer.js';
import { assertOperatorApplies, nativeOperator, OPERATOR_TABLE } from '../../src/domain/operators.js';
import type { DomainExpression } from '../../src/domain/types.js';
import { MalformedDomainError, UnsupportedOperatorError, CompilationError } from '../../src/errors.js';
import { defineModel, resolveField } from '../../src/model/schema.js';

const users = defineModel('users', {
  name: { type: 'string' },
  age: { type: 'integer' },
  status: { type: 'string' },
  role: { type: 'string' },
  balance: { type: 'decimal' },
  active: { type: 'boolean', storageName: 'is_active' },
  tags: { type: 'list', elementType: 'string' },
  scores: { type: 'list', elementType: 'integer' },
  createdAt: { type: 'datetime', storageName: 'created_at' },
  profile: { type: 'json' },
  managerId: { type: 'id', storageName: 'manager_id' },
});

function compile(domain: DomainExpression) {
  return compileDomain(normalizeDomain(domain), users);
}

describe('operator table', () => {
  it('maps every token to a MongoDB operator', () => {
    expect(nativeOperator('eq')).toBe('$eq');
    expect(nativeOperator('neq')).toBe('$ne');
    expect(nativeOperator('not_in')).toBe('$nin');
    expect(nativeOperator('ilike')).toBe('$regex');
    expect(nativeOperator('is_not_null')).toBe('$ne');
  });

  it('describes the value shape of each operator', () => {
    expect(OPERATOR_TABLE.in.shape).toBe('list');
    expect(OPERATOR_TABLE.like.shape).toBe('pattern');
    expect(OPERATOR_TABLE.is_null.shape).toBe('none');
    expect(OPERATOR_TABLE.gte.shape).toBe('scalar');
  });

  it('rejects like on a non-text field', () => {
    expect(() => assertOperatorApplies('like', resolveField(users, 'age'))).toThrow(UnsupportedOperatorError);
    expect(() => assertOperatorApplies('like', resolveField(users, 'age'))).toThrow(
      'Operator "like" cannot be applied to integer field "age"',
    );
  });

  it('rejects like on a list of integers', () => {
    expect(() => assertOperatorApplies('like', resolveField(users, 'scores'))).toThrow(
      'Operator "like" cannot be applied to list<integer> field "scores"',
    );
  });

  it('rejects ordering comparisons on booleans', () => {
    expect(() => assertOperatorApplies('gt', resolveField(users, 'active'))).toThrow(UnsupportedOperatorError);
  });

  it('allows like on a list of strings', () => {
    expect(() => assertOperatorApplies('like', resolveField(users, 'tags'))).not.toThrow();
  });
});

describe('likeToRegex', () => {
  it('translates wildcards and anchors the pattern', () => {
    expect(likeToRegex('Jo%')).toBe('^Jo[\\s\\S]*$');
    expect(likeToRegex('J_n')).toBe('^J[\\s\\S]n$');
  });

  it('lets wildcards match line breaks', () => {
    expect(new RegExp(likeToRegex('a%')).test('a\nb')).toBe(true);
    expect(new RegExp(likeToRegex('a_b')).test('a\nb')).toBe(true);
    expect(new RegExp(likeToRegex('a_b')).test('ab')).toBe(false);
  });

  it('escapes regular expression metacharacters', () => {
    expect(likeToRegex('a.b*c')).toBe('^a\\.b\\*c$');
    expect(likeToRegex('(x)')).toBe('^\\(x\\)$');
  });
});

describe('compileDomain', () => {
  it('compiles the identity node to an empty filter', () => {
    expect(compile([])).toEqual({});
  });

  it('conjoins both conditions of an implicit AND', () => {
    expect(
      compile([
        ['age', 'gte', 18],
        ['status', 'eq', 'active'],
      ]),
    ).toEqual({ $and: [{ age: { $gte: 18 } }, { status: { $eq: 'active' } }] });
  });

  it('compiles OR to a disjunction of the two equality conditions', () => {
    expect(compile(['|', ['role', 'eq', 'admin'], ['role', 'eq', 'manager']])).toEqual({
      $or: [{ role: { $eq: 'admin' } }, { role: { $eq: 'manager' } }],
    });
  });

  it('compiles NOT with $nor', () => {
    expect(compile(['!', ['status', 'eq', 'archived']])).toEqual({
      $nor: [{ status: { $eq: 'archived' } }],
    });
  });

  it('uses storage names', () => {
    expect(compile([['active', 'eq', true]])).toEqual({ is_active: { $eq: true } });
  });

  it('compiles like and ilike to anchored regexes', () => {
    expect(compile([['name', 'like', 'Jo%']])).toEqual({ name: { $regex: '^Jo[\\s\\S]*$', $options: '' } });
    expect(compile([['name', 'ilike', '%son']])).toEqual({ name: { $regex: '^[\\s\\S]*son$', $options: 'i' } });
  });

  it('compiles null checks', () => {
    expect(compile([['createdAt', 'is_null']])).toEqual({ created_at: { $eq: null } });
    expect(compile([['createdAt', 'is_not_null']])).toEqual({ created_at: { $ne: null } });
  });

  it('coerces each element of an in list', () => {
    const hex = '65a1f0c2e4b0a1b2c3d4e5f6';
    const filter = compile([['managerId', 'in', [hex]]]);
    expect(filter).toEqual({ manager_id: { $in: [new ObjectId(hex)] } });
  });

  it('coerces decimals and datetimes', () => {
    expect(compile([['balance', 'gt', '10.5']])).toEqual({ balance: { $gt: Decimal128.fromString('10.5') } });
    expect(compile([['createdAt', 'lt', '2024-01-01T00:00:00.000Z']])).toEqual({
      created_at: { $lt: new Date('2024-01-01T00:00:00.000Z') },
    });
  });

  it('resolves dotted paths below json fields', () => {
    expect(compile([['profile.city', 'eq', 'Oslo']])).toEqual({ 'profile.city': { $eq: 'Oslo' } });
  });

  it('names the field when a value cannot be coerced', () => {
    expect(() => compile([['age', 'eq', 'eighteen']])).toThrow(MalformedDomainError);
    expect(() => compile([['age', 'eq', 'eighteen']])).toThrow(
      'Field "age": Value "eighteen" is not a valid integer',
    );
  });

  it('rejects unknown fields', () => {
    expect(() => compile([['nickname', 'eq', 'x']])).toThrow(CompilationError);
    expect(() => compile([['nickname', 'eq', 'x']])).toThrow('Unknown field "nickname" in "users"');
  });

  it('rejects an operator the field type does not support', () => {
    expect(() => compile([['age', 'like', '1%']])).toThrow(UnsupportedOperatorError);
  });

  it('produces identical filters for identical input', () => {
    const domain: DomainExpression = ['|', ['age', 'lt', 30], '!', ['tags', 'in', ['vip']]];
    expect(compile(domain)).toEqual(compile(domain));
  });
});
