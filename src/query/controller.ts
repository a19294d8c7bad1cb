import { EventEmitter } from 'events';
import type { BulkAction, BulkActionReport, SnapshotProvider, StreamMutator } from '../protocol';
import {
  EmptySelectionError,
  ReadOnlyError,
  StalePreviewError,
  WorkflowStateError,
  errorMessage,
} from '../errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { evaluate, type InvalidValuePolicy } from './evaluate';
import { executeBulkAction } from './executor';
import { applyPatch, clonePredicate, defaultPredicate, type Predicate, type PredicatePatch, type StreamSummary } from './predicate';
import { fromPreset, toPreset, type PresetStore, type SavedFilterPreset } from './presets';
import { nextSortState, sortStreams, type SortColumn, type SortState } from './sort';

export type WorkflowState = 'editing' | 'previewed' | 'confirming' | 'executing';

export interface QueryBuilderOptions {
  snapshot: SnapshotProvider;
  mutator: StreamMutator;
  presets: PresetStore;
  readOnly?: boolean;
  invalidValues?: InvalidValuePolicy;
  clock?: () => Date;
  logger?: Logger;
}

/** Plain data for the presentation layer. */
export interface QueryBuilderView {
  state: WorkflowState;
  predicate: Predicate;
  matched: readonly StreamSummary[];
  sortState: SortState | null;
  pendingAction: BulkAction | null;
  lastReport: BulkActionReport | null;
  readOnly: boolean;
}

export interface ConfirmationSummary {
  action: BulkAction;
  total: number;
  /** First few names, for the confirmation prompt. */
  sample: string[];
  remaining: number;
}

const CONFIRM_SAMPLE_SIZE = 5;

export interface QueryBuilderController {
  on(event: 'state', listener: (state: WorkflowState, previous: WorkflowState) => void): this;
  on(event: 'report', listener: (report: BulkActionReport) => void): this;
  on(event: 'preview-failed', listener: (err: unknown) => void): this;
  once(event: 'state', listener: (state: WorkflowState, previous: WorkflowState) => void): this;
  once(event: 'report', listener: (report: BulkActionReport) => void): this;
  once(event: 'preview-failed', listener: (err: unknown) => void): this;
}

/**
 * Bulk operations workflow: edit filter -> preview -> confirm -> execute.
 *
 * All mutation goes through the named transitions below. Destructive actions
 * need a fresh, non-empty preview and a writable session; only one batch
 * runs at a time.
 */
export class QueryBuilderController extends EventEmitter {
  private _state: WorkflowState = 'editing';
  private predicate: Predicate = defaultPredicate();
  private matched: StreamSummary[] = [];
  private sortState: SortState | null = null;
  private pendingAction: BulkAction | null = null;
  private lastReport: BulkActionReport | null = null;
  private hasPreviewed = false;

  private readonly snapshot: SnapshotProvider;
  private readonly mutator: StreamMutator;
  private readonly presets: PresetStore;
  private readonly invalidValues: InvalidValuePolicy;
  private readonly clock: () => Date;
  private readonly log: Logger;
  public readonly readOnly: boolean;

  constructor(options: QueryBuilderOptions) {
    super();
    this.snapshot = options.snapshot;
    this.mutator = options.mutator;
    this.presets = options.presets;
    this.readOnly = options.readOnly ?? false;
    this.invalidValues = options.invalidValues ?? 'match';
    this.clock = options.clock ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child('query');
  }

  get state(): WorkflowState {
    return this._state;
  }

  view(): QueryBuilderView {
    return {
      state: this._state,
      predicate: clonePredicate(this.predicate),
      matched: [...this.matched],
      sortState: this.sortState,
      pendingAction: this.pendingAction,
      lastReport: this.lastReport,
      readOnly: this.readOnly,
    };
  }

  // --- EDITING ---

  updatePredicate(patch: PredicatePatch): void {
    this.assertNotExecuting('edit the filter');
    this.predicate = applyPatch(this.predicate, patch);
    this.invalidate();
  }

  /** Back to the default filter with nothing matched. */
  clear(): void {
    this.assertNotExecuting('clear the filter');
    this.predicate = defaultPredicate();
    this.invalidate();
    this.hasPreviewed = false;
  }

  // --- PREVIEW / SORT ---

  async preview(): Promise<readonly StreamSummary[]> {
    if (this._state !== 'editing' && this._state !== 'previewed') {
      throw new WorkflowStateError('preview', this._state);
    }

    const matched = await this.fetchMatches();

    // The snapshot fetch yields; someone may have moved the workflow on.
    if (this._state !== 'editing' && this._state !== 'previewed') {
      throw new WorkflowStateError('apply a preview', this._state);
    }

    this.applyMatches(matched);
    this.log.debug(`Preview matched ${matched.length} streams`);
    return [...matched];
  }

  sortBy(column: SortColumn): SortState {
    this.assertNotExecuting('sort');
    this.sortState = nextSortState(this.sortState, column);
    this.matched = sortStreams(this.matched, this.sortState);
    return this.sortState;
  }

  // --- BULK ACTIONS ---

  requestAction(action: BulkAction): ConfirmationSummary {
    if (this.readOnly) throw new ReadOnlyError(action);

    switch (this._state) {
      case 'executing':
        throw new WorkflowStateError(`start a ${action}`, 'a bulk action is running');
      case 'confirming':
        throw new WorkflowStateError(`start a ${action}`, `confirming a ${this.pendingAction ?? action}`);
      case 'editing':
        throw this.hasPreviewed ? new StalePreviewError() : new EmptySelectionError();
      case 'previewed':
        break;
    }

    if (this.matched.length === 0) throw new EmptySelectionError();

    this.pendingAction = action;
    this.setState('confirming');
    return this.confirmation(action);
  }

  cancel(): void {
    if (this._state !== 'confirming') {
      throw new WorkflowStateError('cancel', this._state);
    }
    this.pendingAction = null;
    this.setState('previewed');
  }

  /**
   * Runs the pending action over the matched set in its current order, then
   * re-previews so the held set reflects the cluster after the change.
   * Resolves with the report once the batch finishes.
   */
  async confirm(): Promise<BulkActionReport> {
    const action = this.pendingAction;
    if (this._state !== 'confirming' || action === null) {
      throw new WorkflowStateError('confirm', this._state);
    }

    const targets = [...this.matched];
    this.pendingAction = null;
    this.setState('executing');

    try {
      const report = await executeBulkAction(action, targets, this.mutator);
      this.lastReport = report;
      this.emit('report', report);

      try {
        this.applyMatches(await this.fetchMatches());
      } catch (e) {
        this.log.error(`Refresh after bulk ${action} failed: ${errorMessage(e)}`);
        this.dropMatches();
        this.emit('preview-failed', e);
      }
      return report;
    } finally {
      // Still executing only when a listener threw.
      if (this.state === 'executing') this.dropMatches();
    }
  }

  confirmation(action: BulkAction): ConfirmationSummary {
    return {
      action,
      total: this.matched.length,
      sample: this.matched.slice(0, CONFIRM_SAMPLE_SIZE).map(s => s.name),
      remaining: Math.max(0, this.matched.length - CONFIRM_SAMPLE_SIZE),
    };
  }

  // --- PRESETS ---

  async listPresets(): Promise<SavedFilterPreset[]> {
    return this.presets.loadPresets();
  }

  /** Stores the current filter. Allowed in any state; the workflow does not move. */
  async savePreset(name: string): Promise<SavedFilterPreset> {
    const preset = toPreset(name, this.predicate);
    await this.presets.savePreset(preset);
    this.log.info(`Saved filter '${preset.name}'`);
    return preset;
  }

  /**
   * Replaces the filter with a saved one and previews it. An unknown name is
   * not an error: resolves to null and nothing changes.
   */
  async loadPreset(name: string): Promise<SavedFilterPreset | null> {
    if (this._state !== 'editing' && this._state !== 'previewed') {
      throw new WorkflowStateError('load a filter', this._state);
    }

    const preset = (await this.presets.loadPresets()).find(p => p.name === name);
    if (this._state !== 'editing' && this._state !== 'previewed') {
      throw new WorkflowStateError('apply a filter', this._state);
    }
    if (!preset) return null;

    this.predicate = fromPreset(preset);
    this.invalidate();
    await this.preview();
    return preset;
  }

  // --- INTERNALS ---

  private async fetchMatches(): Promise<StreamSummary[]> {
    let snapshot: StreamSummary[];
    try {
      snapshot = await this.snapshot.listStreams();
    } catch (e) {
      this.log.error(`Failed to list streams: ${errorMessage(e)}`);
      throw e;
    }
    return evaluate(this.predicate, snapshot, {
      now: this.clock(),
      invalidValues: this.invalidValues,
    });
  }

  private applyMatches(matched: StreamSummary[]): void {
    this.matched = matched;
    this.sortState = null;
    this.hasPreviewed = true;
    this.setState('previewed');
  }

  private dropMatches(): void {
    this.matched = [];
    this.sortState = null;
    this.setState('editing');
  }

  private invalidate(): void {
    this.matched = [];
    this.sortState = null;
    this.pendingAction = null;
    this.setState('editing');
  }

  private assertNotExecuting(operation: string): void {
    if (this._state === 'executing') {
      throw new WorkflowStateError(operation, 'a bulk action is running');
    }
  }

  private setState(next: WorkflowState): void {
    const previous = this._state;
    this._state = next;
    if (previous !== next) {
      this.log.debug(`${previous} -> ${next}`);
      this.emit('state', next, previous);
    }
  }
}
