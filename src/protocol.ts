import type { StreamSummary } from './query/predicate';

export interface StreamOpsOptions {
  /** One or more server URLs, e.g. `nats://localhost:4222`. */
  servers: string | string[];
  token?: string;
  /** Path to a `.creds` file (JWT + nkey seed). */
  credsFile?: string;
  /** Deadline for every request, snapshot fetch included. Default 15000. */
  requestTimeoutMs?: number;
  name?: string;
}

/** Full, consistent list of streams or an error; never a partial list. */
export interface SnapshotProvider {
  listStreams(): Promise<StreamSummary[]>;
}

export interface StreamMutator {
  deleteStream(name: string): Promise<void>;
  purgeStream(name: string): Promise<void>;
}

export type BulkAction = 'delete' | 'purge';

export interface BulkFailure {
  name: string;
  reason: string;
}

export interface BulkActionReport {
  action: BulkAction;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: BulkFailure[];
}
