import type { Document } from 'mongodb';
import { MalformedDomainError } from '../errors.js';
import { resolveField, type ModelSchema, type ResolvedField } from '../model/schema.js';
import { coerce } from './coercion.js';
import { assertOperatorApplies, nativeOperator, OPERATOR_TABLE, type BackendKind } from './operators.js';
import type { DomainNode, LeafNode } from './types.js';

/**
 * Translates a SQL-style LIKE pattern into an anchored regular expression:
 * `%` matches any run of characters, `_` exactly one, line breaks
 * included; everything else is literal.
 */
export function likeToRegex(pattern: string): string {
  let source = '';
  for (const ch of pattern) {
    if (ch === '%') source += '[\\s\\S]*';
    else if (ch === '_') source += '[\\s\\S]';
    else source += ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  }
  return `^${source}$`;
}

function compileLeaf(leaf: LeafNode, model: ModelSchema, backend: BackendKind): Document {
  const field: ResolvedField = resolveField(model, leaf.field);
  assertOperatorApplies(leaf.operator, field);
  const op = nativeOperator(leaf.operator, backend);
  const shape = OPERATOR_TABLE[leaf.operator].shape;

  if (shape === 'none') {
    return { [field.storagePath]: { [op]: null } };
  }

  if (shape === 'pattern') {
    if (typeof leaf.value !== 'string') {
      throw new MalformedDomainError(`Operator "${leaf.operator}" on "${leaf.field}" expects a string pattern`);
    }
    return {
      [field.storagePath]: {
        [op]: likeToRegex(leaf.value),
        $options: leaf.operator === 'ilike' ? 'i' : '',
      },
    };
  }

  if (shape === 'list') {
    if (!Array.isArray(leaf.value)) {
      throw new MalformedDomainError(`Operator "${leaf.operator}" on "${leaf.field}" expects a list value`);
    }
    const values = leaf.value.map((item: unknown) => coerceFor(field, item));
    return { [field.storagePath]: { [op]: values } };
  }

  return { [field.storagePath]: { [op]: coerceFor(field, leaf.value) } };
}

function coerceFor(field: ResolvedField, value: unknown): unknown {
  try {
    return coerce(value, field.type, field.definition);
  } catch (err) {
    if (err instanceof MalformedDomainError) {
      throw new MalformedDomainError(`Field "${field.name}": ${err.message}`, null, err);
    }
    throw err;
  }
}

/**
 * Compiles a normalised tree into a MongoDB filter document. Pure: the same
 * tree and model always produce an identical filter.
 */
export function compileDomain(
  node: DomainNode,
  model: ModelSchema,
  backend: BackendKind = 'mongodb',
): Document {
  switch (node.kind) {
    case 'true':
      return {};
    case 'leaf':
      return compileLeaf(node, model, backend);
    case 'and':
      return { $and: [compileDomain(node.left, model, backend), compileDomain(node.right, model, backend)] };
    case 'or':
      return { $or: [compileDomain(node.left, model, backend), compileDomain(node.right, model, backend)] };
    case 'not':
      // $not only applies to a single field; $nor negates a whole expression.
      return { $nor: [compileDomain(node.operand, model, backend)] };
  }
}
