import type { DomainExpression, DomainScalar, DomainTerm, DomainValue } from '../domain/types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function cloneScalar(value: DomainScalar): DomainScalar {
  if (value instanceof Date) return new Date(value.getTime());
  if (isPlainObject(value)) return clonePlain(value);
  return value;
}

function clonePlain(value: Record<string, unknown>): Readonly<Record<string, unknown>> {
  return Object.freeze(Object.fromEntries(Object.entries(value).map(([key, item]) => [key, cloneUnknown(item)])));
}

function cloneValue(value: DomainValue): DomainValue {
  return Array.isArray(value) ? Object.freeze(value.map(cloneScalar)) : cloneScalar(value);
}

function cloneTerm(term: DomainTerm): DomainTerm {
  if (typeof term === 'string') return term;
  if (term.length === 2) return Object.freeze([term[0], term[1]] as const);
  return Object.freeze([term[0], term[1], cloneValue(term[2])] as const);
}

/**
 * Frozen copy of a domain. Dates and plain objects are copied so that
 * later caller mutations cannot reach a built snapshot.
 */
export function cloneDomain(domain: readonly DomainTerm[]): DomainExpression {
  return Object.freeze(domain.map(cloneTerm));
}

export function cloneUnknown(value: unknown): unknown {
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return Object.freeze(value.map((item: unknown) => cloneUnknown(item)));
  if (isPlainObject(value)) return clonePlain(value);
  return value;
}

/** Freezes plain objects and arrays in place. BSON values and dates are left alone. */
export function deepFreeze(value: unknown): void {
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    for (const item of items) deepFreeze(item);
    Object.freeze(value);
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) deepFreeze(item);
    Object.freeze(value);
  }
}
