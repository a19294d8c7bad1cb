/**
 * Stream as seen by the query builder: one row of a cluster snapshot.
 */
export interface StreamSummary {
  name: string;
  subjects: string[];
  /** Time of the first stored message. */
  firstTime: Date;
  messages: bigint;
  bytes: bigint;
  consumers: number;
}

export const AGE_OPS = ['any', '>', '<', '='] as const;
export const COUNT_OPS = ['any', '=', '>', '<'] as const;
export const AGE_UNITS = ['m', 'h'] as const;

export type AgeOp = typeof AGE_OPS[number];
export type CountOp = typeof COUNT_OPS[number];
export type AgeUnit = typeof AGE_UNITS[number];

export interface AgeClause {
  op: AgeOp;
  /** As typed by the operator; parsed at evaluation time. */
  value: string;
  unit: AgeUnit;
}

export interface CountClause {
  op: CountOp;
  value: string;
}

/**
 * Filter form state. Clause values stay as text so an unparseable entry can
 * be represented (and evaluated) instead of being lost on input.
 */
export interface Predicate {
  namePattern: string;
  age: AgeClause;
  consumers: CountClause;
  messages: CountClause;
}

export interface PredicatePatch {
  namePattern?: string;
  age?: Partial<AgeClause>;
  consumers?: Partial<CountClause>;
  messages?: Partial<CountClause>;
}

export function defaultPredicate(): Predicate {
  return {
    namePattern: '*',
    age: { op: 'any', value: '', unit: 'h' },
    consumers: { op: 'any', value: '' },
    messages: { op: 'any', value: '' },
  };
}

export function applyPatch(predicate: Predicate, patch: PredicatePatch): Predicate {
  return {
    namePattern: patch.namePattern ?? predicate.namePattern,
    age: { ...predicate.age, ...patch.age },
    consumers: { ...predicate.consumers, ...patch.consumers },
    messages: { ...predicate.messages, ...patch.messages },
  };
}

export function clonePredicate(predicate: Predicate): Predicate {
  return applyPatch(predicate, {});
}

export function isCountOp(v: string): v is CountOp {
  return COUNT_OPS.some(op => op === v);
}

export function isAgeUnit(v: string): v is AgeUnit {
  return AGE_UNITS.some(unit => unit === v);
}

const LEADING_INT = /^\s*([+-]?\d+)/;

/**
 * scanf("%d")-style parse: leading whitespace and sign, then the leading run
 * of digits. `"12h"` is 12, `"abc"` is undefined.
 */
export function parseLeadingInt(text: string): bigint | undefined {
  const m = LEADING_INT.exec(text);
  return m ? BigInt(m[1]) : undefined;
}

/** A clause takes part in matching only with a real operator and a non-empty value. */
export function isClauseActive(clause: { op: string; value: string }): boolean {
  return clause.op !== 'any' && clause.value !== '';
}

/**
 * Compiles a glob into an anchored, case-sensitive matcher. `*` is the only
 * wildcard; every other character is literal.
 */
export function compileGlob(pattern: string): (name: string) => boolean {
  if (pattern === '' || pattern === '*') return () => true;

  const source = pattern
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  const re = new RegExp(`^${source}$`, 's');
  return (name) => re.test(name);
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export function ageUnitMs(unit: AgeUnit): number {
  return unit === 'm' ? MINUTE_MS : HOUR_MS;
}

/** `=` on age means within 10% of the target, bounds inclusive. */
export function compareAge(ageMs: number, op: AgeOp, targetMs: number): boolean {
  switch (op) {
    case '>': return ageMs > targetMs;
    case '<': return ageMs < targetMs;
    case '=': return ageMs >= Math.floor(targetMs * 9 / 10) && ageMs <= Math.floor(targetMs * 11 / 10);
    case 'any': return true;
  }
}

export function compareCount(actual: bigint, op: CountOp, target: bigint): boolean {
  switch (op) {
    case '=': return actual === target;
    case '>': return actual > target;
    case '<': return actual < target;
    case 'any': return true;
  }
}
