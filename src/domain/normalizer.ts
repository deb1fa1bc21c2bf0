import { MalformedDomainError } from '../errors.js';
import {
  TRUE_NODE,
  type Combinator,
  type DomainExpression,
  type DomainNode,
  type DomainTerm,
  type DomainValue,
  type LeafNode,
  type OperatorToken,
} from './types.js';

export interface NormalizeOptions {
  /** Reject an empty domain instead of returning the identity node. */
  required?: boolean;
}

type ParsedTerm =
  | { kind: 'leaf'; node: LeafNode; position: number }
  | { kind: 'combinator'; op: Combinator; position: number | null };

const ARITY: Record<Combinator, number> = { '&': 2, '|': 2, '!': 1 };

const OPERATORS = new Map<string, OperatorToken>([
  ['eq', 'eq'],
  ['neq', 'neq'],
  ['gt', 'gt'],
  ['gte', 'gte'],
  ['lt', 'lt'],
  ['lte', 'lte'],
  ['in', 'in'],
  ['not_in', 'not_in'],
  ['like', 'like'],
  ['ilike', 'ilike'],
  ['is_null', 'is_null'],
  ['is_not_null', 'is_not_null'],
  ['=', 'eq'],
  ['!=', 'neq'],
  ['>', 'gt'],
  ['>=', 'gte'],
  ['<', 'lt'],
  ['<=', 'lte'],
  ['not in', 'not_in'],
  ['is null', 'is_null'],
  ['is not null', 'is_not_null'],
]);

export function toOperatorToken(input: string): OperatorToken | null {
  return OPERATORS.get(input) ?? null;
}

function isCombinator(term: unknown): term is Combinator {
  return term === '&' || term === '|' || term === '!';
}

function checkValueShape(
  operator: OperatorToken,
  field: string,
  value: DomainValue | undefined,
  position: number,
): void {
  const fail = (expected: string): never => {
    throw new MalformedDomainError(`Operator "${operator}" on "${field}" expects ${expected}`, position);
  };

  switch (operator) {
    case 'in':
    case 'not_in':
      if (!Array.isArray(value)) fail('a list value');
      return;
    case 'is_null':
    case 'is_not_null':
      if (value !== undefined && value !== null) fail('no value');
      return;
    case 'like':
    case 'ilike':
      if (typeof value !== 'string') fail('a string pattern');
      return;
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      if (value === undefined || value === null || Array.isArray(value)) fail('a scalar value');
      return;
    case 'eq':
    case 'neq':
      if (value === undefined) fail('a value');
      return;
  }
}

function parseLeaf(term: readonly unknown[], position: number): LeafNode {
  if (term.length !== 2 && term.length !== 3) {
    throw new MalformedDomainError(
      `A leaf must be [field, operator, value], got ${term.length} element(s)`,
      position,
    );
  }
  const [field, operatorInput] = term;
  if (typeof field !== 'string' || field.trim() === '') {
    throw new MalformedDomainError('Leaf field must be a non-empty string', position);
  }
  const operator = typeof operatorInput === 'string' ? toOperatorToken(operatorInput) : null;
  if (operator === null) {
    throw new MalformedDomainError(`Unknown operator ${JSON.stringify(operatorInput)}`, position);
  }
  const value = leafValue(term);
  checkValueShape(operator, field, value, position);
  return { kind: 'leaf', field, operator, value: value ?? null };
}

function leafValue(term: readonly unknown[]): DomainValue | undefined {
  if (term.length < 3) return undefined;
  const value = term[2];
  if (value === undefined || value === null) return value;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'object'
  ) {
    return value;
  }
  throw new MalformedDomainError(`Unsupported leaf value of type ${typeof value}`);
}

function parseTerms(domain: readonly DomainTerm[]): ParsedTerm[] {
  return domain.map((term, position): ParsedTerm => {
    if (isCombinator(term)) return { kind: 'combinator', op: term, position };
    if (Array.isArray(term)) return { kind: 'leaf', node: parseLeaf(term, position), position };
    throw new MalformedDomainError(`Unknown domain term ${JSON.stringify(term)}`, position);
  });
}

/**
 * Splits the terms into consecutive complete top-level expressions and
 * chains them as `& E1 & E2 ... En`, so bare leaves nest to the right:
 * `[a, b, c]` becomes `AND(a, AND(b, c))`. The last chunk may be incomplete;
 * the reduction reports it.
 */
function insertImplicitAnd(terms: readonly ParsedTerm[]): ParsedTerm[] {
  const chunks: ParsedTerm[][] = [];
  let current: ParsedTerm[] = [];
  let expected = 1;

  for (const term of terms) {
    if (expected === 0) {
      chunks.push(current);
      current = [];
      expected = 1;
    }
    current.push(term);
    expected += term.kind === 'leaf' ? -1 : ARITY[term.op] - 1;
  }
  chunks.push(current);

  const sequence: ParsedTerm[] = [];
  chunks.forEach((chunk, index) => {
    if (index < chunks.length - 1) sequence.push({ kind: 'combinator', op: '&', position: null });
    sequence.push(...chunk);
  });
  return sequence;
}

function reduce(sequence: readonly ParsedTerm[]): DomainNode {
  const stack: DomainNode[] = [];

  const pop = (term: { op: Combinator; position: number | null }): DomainNode => {
    const node = stack.pop();
    if (node === undefined) {
      throw new MalformedDomainError(
        `"${term.op}" requires ${ARITY[term.op]} operand(s)`,
        term.position,
      );
    }
    return node;
  };

  for (let i = sequence.length - 1; i >= 0; i--) {
    const term = sequence[i];
    if (term === undefined) continue;
    if (term.kind === 'leaf') {
      stack.push(term.node);
      continue;
    }
    if (term.op === '!') {
      stack.push({ kind: 'not', operand: pop(term) });
      continue;
    }
    const left = pop(term);
    const right = pop(term);
    stack.push({ kind: term.op === '&' ? 'and' : 'or', left, right });
  }

  const [root] = stack;
  if (stack.length !== 1 || root === undefined) {
    throw new MalformedDomainError(
      `Domain reduces to ${stack.length} top-level expressions, expected exactly one`,
    );
  }
  return root;
}

/**
 * Parses a flat prefix-notation domain into a binary expression tree.
 * An empty domain yields the identity node unless `required` is set.
 */
export function normalizeDomain(
  domain: DomainExpression,
  options: NormalizeOptions = {},
): DomainNode {
  if (!Array.isArray(domain)) {
    throw new MalformedDomainError('Domain must be an array of terms');
  }
  if (domain.length === 0) {
    if (options.required) {
      throw new MalformedDomainError('A non-empty domain is required');
    }
    return TRUE_NODE;
  }
  return reduce(insertImplicitAnd(parseTerms(domain)));
}

/** Renders a tree back to prefix notation with explicit combinators. */
export function toPrefix(node: DomainNode): DomainTerm[] {
  switch (node.kind) {
    case 'true':
      return [];
    case 'leaf':
      return [[node.field, node.operator, node.value]];
    case 'not':
      return ['!', ...toPrefix(node.operand)];
    case 'and':
      return ['&', ...toPrefix(node.left), ...toPrefix(node.right)];
    case 'or':
      return ['|', ...toPrefix(node.left), ...toPrefix(node.right)];
  }
}
