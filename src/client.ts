import type { SnapshotProvider, StreamMutator, StreamOpsOptions } from './protocol';
import type { StreamSummary } from './query/predicate';
import { StreamOpsConnection, type AdminTransport } from './connection';
import { StreamDirectory, StreamHandle, type AdminRunner, type StreamAdmin } from './brokers/stream';
import { logger } from './utils/logger';

/**
 * STREAM OPS CLIENT: entry point for talking to the cluster.
 * Serves the query builder both as snapshot provider and as mutator.
 */
export class StreamOpsClient implements SnapshotProvider, StreamMutator {
  public readonly streams: StreamDirectory;
  private readonly handles = new Map<string, StreamHandle>();
  private readonly run: AdminRunner;

  constructor(private readonly transport: AdminTransport) {
    this.run = <T>(request: (admin: StreamAdmin) => Promise<T>) => this.transport.run(request);
    this.streams = new StreamDirectory(this.run);
  }

  static async connect(options: StreamOpsOptions): Promise<StreamOpsClient> {
    const conn = await StreamOpsConnection.open(options, logger.child('client'));
    return new StreamOpsClient(conn);
  }

  public get connected(): boolean {
    return this.transport.isConnected;
  }

  public async disconnect(): Promise<void> {
    this.handles.clear();
    await this.transport.disconnect();
  }

  public stream(name: string): StreamHandle {
    let handle = this.handles.get(name);
    if (!handle) {
      handle = new StreamHandle(this.run, name);
      this.handles.set(name, handle);
    }
    return handle;
  }

  // --- SnapshotProvider / StreamMutator ---

  async listStreams(): Promise<StreamSummary[]> {
    return this.streams.list();
  }

  async deleteStream(name: string): Promise<void> {
    await this.stream(name).delete();
    this.handles.delete(name);
  }

  async purgeStream(name: string): Promise<void> {
    await this.stream(name).purge();
  }
}
