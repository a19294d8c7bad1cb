import { promises as fs } from 'fs';
import {
  connect,
  credsAuthenticator,
  Events,
  type ConnectionOptions,
  type JetStreamManager,
  type NatsConnection,
} from 'nats';
import type { StreamOpsOptions } from './protocol';
import type { StreamAdmin } from './brokers/stream';
import { ConnectionClosedError, NotConnectedError, RequestTimeoutError } from './errors';
import { Logger } from './utils/logger';

export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;

/**
 * Rejects with {@link RequestTimeoutError} if `work` has not settled after
 * `timeoutMs`. The pending work is not cancelled, only abandoned.
 */
export function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RequestTimeoutError(timeoutMs)), timeoutMs);
    timer.unref();
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

/** Whatever carries admin requests to the cluster. */
export interface AdminTransport {
  readonly isConnected: boolean;
  run<T>(request: (admin: StreamAdmin) => Promise<T>): Promise<T>;
  disconnect(): Promise<void>;
}

/** @internal */
export class StreamOpsConnection implements AdminTransport {
  private isClosed = false;

  constructor(
    private readonly nc: NatsConnection,
    public readonly jsm: JetStreamManager,
    public readonly requestTimeoutMs: number,
    private readonly logger: Logger
  ) {
    this.watchStatus().catch(err => {
      this.logger.error('[Connection] Status monitor stopped', err);
    });
  }

  static async open(options: StreamOpsOptions, logger: Logger): Promise<StreamOpsConnection> {
    const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    const opts: ConnectionOptions = {
      servers: options.servers,
      name: options.name ?? 'stream-ops',
      timeout: 10000,
      maxReconnectAttempts: 5,
      reconnectTimeWait: 2000,
    };
    if (options.token) opts.token = options.token;
    if (options.credsFile) {
      opts.authenticator = credsAuthenticator(await fs.readFile(options.credsFile));
    }

    const nc = await connect(opts);
    try {
      const jsm = await nc.jetstreamManager({ timeout: requestTimeoutMs });
      logger.info(`Connected to ${nc.getServer()}`);
      return new StreamOpsConnection(nc, jsm, requestTimeoutMs, logger);
    } catch (e) {
      await nc.close();
      throw e;
    }
  }

  get isConnected(): boolean {
    return !this.isClosed && !this.nc.isClosed();
  }

  /** Runs one request under the connection deadline. */
  async run<T>(request: (admin: StreamAdmin) => Promise<T>): Promise<T> {
    if (this.isClosed) throw new NotConnectedError();
    if (this.nc.isClosed()) throw new ConnectionClosedError();
    return withDeadline(request(this.jsm.streams), this.requestTimeoutMs);
  }

  async disconnect(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    await this.nc.drain();
  }

  private async watchStatus(): Promise<void> {
    for await (const status of this.nc.status()) {
      switch (status.type) {
        case Events.Disconnect:
          this.logger.warn(`Connection lost (${status.data}). Attempting to reconnect...`);
          break;
        case Events.Reconnect:
          this.logger.info(`Reconnected to ${status.data}`);
          break;
        case Events.Error:
          this.logger.error(`Connection error: ${status.data}`);
          break;
        default:
          break;
      }
    }
  }
}
