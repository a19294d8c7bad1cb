import { InvalidFilterValueError } from '../errors';
import {
  ageUnitMs,
  compareAge,
  compareCount,
  compileGlob,
  isClauseActive,
  parseLeadingInt,
  type Predicate,
  type StreamSummary,
} from './predicate';

/**
 * What to do with a clause whose value does not parse as an integer.
 * - `match`: the clause matches every stream (fail-open).
 * - `reject`: evaluation throws {@link InvalidFilterValueError}.
 */
export type InvalidValuePolicy = 'match' | 'reject';

export interface EvaluateOptions {
  now?: Date;
  invalidValues?: InvalidValuePolicy;
}

type Test = (stream: StreamSummary) => boolean;

const MATCH_ALL: Test = () => true;

function resolveValue(field: string, clause: { value: string }, policy: InvalidValuePolicy): bigint | undefined {
  const parsed = parseLeadingInt(clause.value);
  if (parsed === undefined && policy === 'reject') {
    throw new InvalidFilterValueError(field, clause.value);
  }
  return parsed;
}

/**
 * Turns a predicate into one test per clause. Parsing happens once here,
 * not once per stream.
 */
function compilePredicate(predicate: Predicate, options: EvaluateOptions = {}): Test[] {
  const policy = options.invalidValues ?? 'match';
  const nowMs = (options.now ?? new Date()).getTime();
  const tests: Test[] = [];

  const matchesName = compileGlob(predicate.namePattern);
  tests.push(s => matchesName(s.name));

  const { age, consumers, messages } = predicate;

  if (isClauseActive(age)) {
    const value = resolveValue('age', age, policy);
    if (value === undefined) {
      tests.push(MATCH_ALL);
    } else {
      const targetMs = Number(value) * ageUnitMs(age.unit);
      tests.push(s => compareAge(nowMs - s.firstTime.getTime(), age.op, targetMs));
    }
  }

  if (isClauseActive(consumers)) {
    const value = resolveValue('consumers', consumers, policy);
    tests.push(value === undefined ? MATCH_ALL : s => compareCount(BigInt(s.consumers), consumers.op, value));
  }

  if (isClauseActive(messages)) {
    const value = resolveValue('messages', messages, policy);
    tests.push(value === undefined ? MATCH_ALL : s => compareCount(s.messages, messages.op, value));
  }

  return tests;
}

/**
 * Returns the streams of `snapshot` that satisfy every active clause, in
 * snapshot order. Pure for a fixed `options.now`.
 */
export function evaluate(
  predicate: Predicate,
  snapshot: readonly StreamSummary[],
  options: EvaluateOptions = {}
): StreamSummary[] {
  const tests = compilePredicate(predicate, options);
  return snapshot.filter(stream => tests.every(test => test(stream)));
}
