import type { StreamSummary } from '../query/predicate';

/**
 * The subset of JetStream's `StreamInfo` the tool reads. `jsm.streams`
 * from the `nats` package satisfies {@link StreamAdmin} as is.
 */
export interface StreamInfoLike {
  config: {
    name: string;
    subjects?: string[];
  };
  state: {
    messages: number;
    bytes: number;
    first_ts: string;
    consumer_count: number;
  };
}

export interface StreamAdmin {
  list(): AsyncIterable<StreamInfoLike>;
  info(name: string): Promise<StreamInfoLike>;
  delete(name: string): Promise<boolean>;
  purge(name: string): Promise<unknown>;
}

export function toStreamSummary(info: StreamInfoLike): StreamSummary {
  return {
    name: info.config.name,
    subjects: info.config.subjects ?? [],
    firstTime: new Date(info.state.first_ts),
    messages: BigInt(info.state.messages),
    bytes: BigInt(info.state.bytes),
    consumers: info.state.consumer_count,
  };
}

export const StreamCommands = {
  list: async (admin: StreamAdmin): Promise<StreamSummary[]> => {
    const streams: StreamSummary[] = [];
    for await (const info of admin.list()) {
      streams.push(toStreamSummary(info));
    }
    return streams;
  },

  info: async (admin: StreamAdmin, name: string): Promise<StreamSummary> =>
    toStreamSummary(await admin.info(name)),

  delete: async (admin: StreamAdmin, name: string): Promise<void> => {
    const ok = await admin.delete(name);
    if (!ok) throw new Error(`Failed to delete stream '${name}'`);
  },

  purge: async (admin: StreamAdmin, name: string): Promise<void> => {
    await admin.purge(name);
  },
};

/** Runs a request against the stream admin API, under whatever deadline the caller imposes. */
export type AdminRunner = <T>(request: (admin: StreamAdmin) => Promise<T>) => Promise<T>;

export class StreamHandle {
  constructor(
    private readonly run: AdminRunner,
    public readonly name: string
  ) { }

  async info(): Promise<StreamSummary> {
    return this.run(admin => StreamCommands.info(admin, this.name));
  }

  async delete(): Promise<void> {
    await this.run(admin => StreamCommands.delete(admin, this.name));
  }

  /** Drops every message; the stream and its consumers stay. */
  async purge(): Promise<void> {
    await this.run(admin => StreamCommands.purge(admin, this.name));
  }
}

export class StreamDirectory {
  constructor(private readonly run: AdminRunner) { }

  async list(): Promise<StreamSummary[]> {
    return this.run(admin => StreamCommands.list(admin));
  }
}
