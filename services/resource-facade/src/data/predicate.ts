import { UnsupportedPushdown } from '../errors/index.js';
import type { StoreCapabilities } from './data-store.js';
import type { AggregateOp, ComparisonPredicate, Predicate, Row, Scalar, ScalarFunction } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Throw UnsupportedPushdown for the first operator or function in the
 * predicate the store cannot evaluate.
 */
export function assertPredicatePushdown(storeName: string, capabilities: StoreCapabilities, predicate?: Predicate): void {
  if (!predicate) return;
  switch (predicate.kind) {
    case 'compare':
      if (predicate.fn && !capabilities.functions.has(predicate.fn)) {
        throw new UnsupportedPushdown(storeName, `function ${predicate.fn}(${predicate.field})`);
      }
      if (!capabilities.operators.has(predicate.op)) {
        throw new UnsupportedPushdown(storeName, `operator ${predicate.op} on ${predicate.field}`);
      }
      return;
    case 'and':
    case 'or':
      predicate.clauses.forEach((clause) => assertPredicatePushdown(storeName, capabilities, clause));
      return;
    case 'not':
      assertPredicatePushdown(storeName, capabilities, predicate.clause);
      return;
  }
}

export function assertAggregatePushdown(storeName: string, capabilities: StoreCapabilities, op: AggregateOp): void {
  if (!capabilities.aggregates.has(op.fn)) {
    throw new UnsupportedPushdown(storeName, `aggregate ${op.fn}(${op.field ?? '*'})`);
  }
}

/** Combine predicates with AND, dropping absent ones. */
export function allOf(...predicates: Array<Predicate | undefined>): Predicate | undefined {
  const clauses = predicates.filter((predicate): predicate is Predicate => predicate !== undefined);
  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { kind: 'and', clauses };
}

// In-process evaluation, used only by stores that hold their rows in memory.

export function toComparable(value: unknown): string | number | boolean | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

function toTime(value: unknown): number | null {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string' || typeof value === 'number') {
    const time = new Date(value).getTime();
    return Number.isNaN(time) ? null : time;
  }
  return null;
}

export function applyFunction(fn: ScalarFunction, value: unknown, now: number): Scalar {
  if (value === null || value === undefined) return null;
  switch (fn) {
    case 'lower':
      return String(value).toLowerCase();
    case 'upper':
      return String(value).toUpperCase();
    case 'length':
      return String(value).length;
    case 'year': {
      const time = toTime(value);
      return time === null ? null : new Date(time).getUTCFullYear();
    }
    case 'month': {
      const time = toTime(value);
      return time === null ? null : new Date(time).getUTCMonth() + 1;
    }
    case 'daysSince': {
      const time = toTime(value);
      return time === null ? null : Math.floor((now - time) / DAY_MS);
    }
  }
}

function compareValues(left: string | number | boolean, right: string | number | boolean): number {
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

function likeToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/%/g, '.*').replace(/_/g, '.');
  return new RegExp(`^${escaped}$`, 's');
}

function normalizeOperand(operand: Scalar, sample: unknown): string | number | boolean | null {
  // Dates in rows compare against ISO strings or epoch numbers in predicates
  if (sample instanceof Date && operand !== null && typeof operand !== 'boolean') {
    return toTime(operand);
  }
  return operand;
}

// null is SQL's unknown: a comparison against a null operand neither matches nor fails
type Truth = boolean | null;

function evaluateComparison(predicate: ComparisonPredicate, row: Row, now: number): Truth {
  const raw = row[predicate.field];
  const subject = predicate.fn ? applyFunction(predicate.fn, raw, now) : raw;
  const left = toComparable(subject);

  if (predicate.op === 'isNull') {
    const wantsNull = predicate.value === undefined ? true : predicate.value !== false;
    return wantsNull ? left === null : left !== null;
  }
  if (left === null) return null;

  if (predicate.op === 'in') {
    const values = Array.isArray(predicate.value) ? predicate.value : [];
    const candidates = values.map((candidate) => normalizeOperand(candidate, subject));
    if (candidates.some((right) => right !== null && compareValues(left, right) === 0)) return true;
    return candidates.includes(null) ? null : false;
  }

  const operand = Array.isArray(predicate.value) ? null : predicate.value ?? null;
  const right = normalizeOperand(operand, subject);
  if (right === null) return null;

  switch (predicate.op) {
    case 'eq':
      return compareValues(left, right) === 0;
    case 'neq':
      return compareValues(left, right) !== 0;
    case 'gt':
      return compareValues(left, right) > 0;
    case 'gte':
      return compareValues(left, right) >= 0;
    case 'lt':
      return compareValues(left, right) < 0;
    case 'lte':
      return compareValues(left, right) <= 0;
    case 'like':
      return likeToRegExp(String(right)).test(String(left));
    default:
      return false;
  }
}

function evaluateTruth(predicate: Predicate, row: Row, now: number): Truth {
  switch (predicate.kind) {
    case 'compare':
      return evaluateComparison(predicate, row, now);
    case 'and': {
      const results = predicate.clauses.map((clause) => evaluateTruth(clause, row, now));
      if (results.includes(false)) return false;
      return results.includes(null) ? null : true;
    }
    case 'or': {
      const results = predicate.clauses.map((clause) => evaluateTruth(clause, row, now));
      if (results.includes(true)) return true;
      return results.includes(null) ? null : false;
    }
    case 'not': {
      const result = evaluateTruth(predicate.clause, row, now);
      return result === null ? null : !result;
    }
  }
}

/** A row matches only when the predicate is true; unknown filters it out as SQL's WHERE does. */
export function evaluatePredicate(predicate: Predicate | undefined, row: Row, now: number): boolean {
  if (!predicate) return true;
  return evaluateTruth(predicate, row, now) === true;
}
