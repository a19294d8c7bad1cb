import type { StreamSummary } from './predicate';

export enum SortColumn {
  NAME = 0,
  AGE = 1,
  MESSAGES = 2,
  CONSUMERS = 3,
}

export interface SortState {
  column: SortColumn;
  ascending: boolean;
}

export const SORT_COLUMN_NAMES: Record<SortColumn, string> = {
  [SortColumn.NAME]: 'name',
  [SortColumn.AGE]: 'age',
  [SortColumn.MESSAGES]: 'messages',
  [SortColumn.CONSUMERS]: 'consumers',
};

function cmp<T extends string | number | bigint>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const COMPARATORS: Record<SortColumn, (a: StreamSummary, b: StreamSummary) => number> = {
  [SortColumn.NAME]: (a, b) => cmp(a.name, b.name),
  // Older first: age ascending means first-message time ascending.
  [SortColumn.AGE]: (a, b) => cmp(a.firstTime.getTime(), b.firstTime.getTime()),
  [SortColumn.MESSAGES]: (a, b) => cmp(a.messages, b.messages),
  [SortColumn.CONSUMERS]: (a, b) => cmp(a.consumers, b.consumers),
};

/**
 * Stable reorder of an already matched set. Never mutates the input.
 * Ties keep their incoming order in both directions.
 */
export function sortStreams(matched: readonly StreamSummary[], state: SortState): StreamSummary[] {
  const compare = COMPARATORS[state.column];
  const dir = state.ascending ? 1 : -1;
  return [...matched].sort((a, b) => dir * compare(a, b));
}

/** Same column flips direction; any other column starts ascending. */
export function nextSortState(current: SortState | null, column: SortColumn): SortState {
  if (current && current.column === column) {
    return { column, ascending: !current.ascending };
  }
  return { column, ascending: true };
}

const SORT_COLUMNS: readonly SortColumn[] = [
  SortColumn.NAME,
  SortColumn.AGE,
  SortColumn.MESSAGES,
  SortColumn.CONSUMERS,
];

/** Accepts a column name (`messages`) or its index (`2`). */
export function parseSortColumn(input: string): SortColumn | undefined {
  const needle = input.trim().toLowerCase();
  return SORT_COLUMNS.find(c => SORT_COLUMN_NAMES[c] === needle || String(c) === needle);
}
