export type OperatorToken =
  | 'eq'
  | 'neq'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'in'
  | 'not_in'
  | 'like'
  | 'ilike'
  | 'is_null'
  | 'is_not_null';

/** Symbolic spellings accepted on input and normalised to an OperatorToken. */
export type OperatorAlias =
  | '='
  | '!='
  | '>'
  | '>='
  | '<'
  | '<='
  | 'not in'
  | 'is null'
  | 'is not null';

export type OperatorInput = OperatorToken | OperatorAlias;

/** `&` is AND, `|` is OR, `!` is NOT. */
export type Combinator = '&' | '|' | '!';

export type DomainScalar = string | number | boolean | Date | null | object;

export type DomainValue = DomainScalar | readonly DomainScalar[];

export type DomainLeafTuple =
  | readonly [field: string, operator: OperatorInput, value: DomainValue]
  | readonly [field: string, operator: 'is_null' | 'is_not_null' | 'is null' | 'is not null'];

export type DomainTerm = DomainLeafTuple | Combinator;

/** Flat prefix-notation filter, e.g. `['|', ['role', 'eq', 'admin'], ['role', 'eq', 'manager']]`. */
export type DomainExpression = readonly DomainTerm[];

export interface LeafNode {
  readonly kind: 'leaf';
  readonly field: string;
  readonly operator: OperatorToken;
  readonly value: DomainValue;
}

export type DomainNode =
  | LeafNode
  | { readonly kind: 'and'; readonly left: DomainNode; readonly right: DomainNode }
  | { readonly kind: 'or'; readonly left: DomainNode; readonly right: DomainNode }
  | { readonly kind: 'not'; readonly operand: DomainNode }
  | { readonly kind: 'true' };

export const TRUE_NODE: DomainNode = Object.freeze({ kind: 'true' });
