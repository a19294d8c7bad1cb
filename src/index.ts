export { StreamOpsClient } from './client';
export { StreamHandle, StreamDirectory, toStreamSummary } from './brokers/stream';

export type {
  StreamOpsOptions,
  SnapshotProvider,
  StreamMutator,
  BulkAction,
  BulkActionReport,
  BulkFailure
} from './protocol';

export * from './errors';

export {
  defaultPredicate,
  applyPatch,
  compileGlob,
  parseLeadingInt
} from './query/predicate';
export type {
  StreamSummary,
  Predicate,
  PredicatePatch,
  AgeClause,
  CountClause,
  AgeOp,
  CountOp,
  AgeUnit
} from './query/predicate';

export { evaluate } from './query/evaluate';
export type { EvaluateOptions, InvalidValuePolicy } from './query/evaluate';
export { SortColumn, sortStreams, nextSortState } from './query/sort';
export type { SortState } from './query/sort';
export { executeBulkAction } from './query/executor';
export { FilePresetStore, MemoryPresetStore, toPreset, fromPreset } from './query/presets';
export type { PresetStore, SavedFilterPreset } from './query/presets';
export { QueryBuilderController } from './query/controller';
export type {
  WorkflowState,
  QueryBuilderOptions,
  QueryBuilderView,
  ConfirmationSummary
} from './query/controller';

export { loadConfig, StreamOpsConfig } from './config/config';
export type { ConfigSource, LoadConfigOptions } from './config/config';
export { Logger, LogLevel, logger } from './utils/logger';
