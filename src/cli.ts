import { Command } from 'commander';
import type { StreamHandle } from './brokers/stream';
import { StreamOpsClient } from './client';
import { defaultConfigPath, loadConfig, type LoadConfigOptions, type StreamOpsConfig } from './config/config';
import { InvalidPresetError, StreamOpsError, errorMessage } from './errors';
import type { SnapshotProvider, StreamMutator, StreamOpsOptions } from './protocol';
import { QueryBuilderController } from './query/controller';
import { isAgeUnit, isCountOp, type AgeClause, type CountClause, type PredicatePatch } from './query/predicate';
import { FilePresetStore, type PresetStore } from './query/presets';
import { SortColumn, parseSortColumn } from './query/sort';
import { formatConfirmation, formatReport, formatStreamDetail, formatStreamTable } from './utils/format';
import { VERSION } from './version';

/** What a command needs from the cluster; {@link StreamOpsClient} in production. */
export interface ClusterSession extends SnapshotProvider, StreamMutator {
  stream(name: string): Pick<StreamHandle, 'info'>;
  disconnect(): Promise<void>;
}

export interface CliDeps {
  loadConfig(options: LoadConfigOptions): Promise<StreamOpsConfig>;
  connect(options: StreamOpsOptions): Promise<ClusterSession>;
  presets(): PresetStore;
  clock(): Date;
  out(text: string): void;
}

const defaultDeps: CliDeps = {
  loadConfig,
  connect: options => StreamOpsClient.connect(options),
  presets: () => new FilePresetStore(),
  clock: () => new Date(),
  out: text => console.log(text),
};

type GlobalFlags = {
  server?: string;
  config?: string;
  context?: string;
  readOnly?: boolean;
};

interface BulkFlags {
  pattern?: string;
  age?: string;
  consumers?: string;
  messages?: string;
  filter?: string;
  sort?: string;
  desc?: boolean;
  save?: string;
  delete?: boolean;
  purge?: boolean;
  yes?: boolean;
}

/** `>2h`, `<30m`, `=1`. The unit defaults to hours. */
export function parseAgeFlag(text: string): AgeClause {
  const m = /^\s*([<>=])\s*(.*?)\s*([mh])?\s*$/.exec(text);
  if (!m || !m[2]) throw new StreamOpsError(`Invalid --age '${text}': expected <op><n>[m|h], e.g. >2h`);

  const unit = m[3] ?? 'h';
  if (!isAgeUnit(unit)) throw new StreamOpsError(`Invalid --age unit '${unit}'`);
  const op = m[1];
  if (op !== '>' && op !== '<' && op !== '=') throw new StreamOpsError(`Invalid --age operator '${op}'`);
  return { op, value: m[2], unit };
}

/** `>0`, `<100`, `=0`. */
export function parseCountFlag(flag: string, text: string): CountClause {
  const m = /^\s*([<>=])\s*(.+?)\s*$/.exec(text);
  const op = m?.[1] ?? '';
  if (!m || !isCountOp(op)) {
    throw new StreamOpsError(`Invalid --${flag} '${text}': expected <op><n>, e.g. >0`);
  }
  return { op, value: m[2] };
}

function predicatePatch(flags: BulkFlags): PredicatePatch {
  const patch: PredicatePatch = {};
  if (flags.pattern !== undefined) patch.namePattern = flags.pattern;
  if (flags.age !== undefined) patch.age = parseAgeFlag(flags.age);
  if (flags.consumers !== undefined) patch.consumers = parseCountFlag('consumers', flags.consumers);
  if (flags.messages !== undefined) patch.messages = parseCountFlag('messages', flags.messages);
  return patch;
}

async function withSession<T>(
  deps: CliDeps,
  globals: GlobalFlags,
  work: (session: ClusterSession, config: StreamOpsConfig) => Promise<T>
): Promise<T> {
  const config = await deps.loadConfig({ configPath: globals.config, server: globals.server });
  if (globals.context !== undefined) config.setContext(globals.context);
  const session = await deps.connect(config.toClientOptions());
  try {
    return await work(session, config);
  } finally {
    await session.disconnect();
  }
}

/** Context edits go back to the file they came from, else to the default config path. */
async function updateContexts(
  deps: CliDeps,
  globals: GlobalFlags,
  edit: (config: StreamOpsConfig) => string
): Promise<void> {
  const config = await deps.loadConfig({ configPath: globals.config });
  const message = edit(config);
  await config.save(config.source === 'config-file' ? config.sourcePath : globals.config ?? defaultConfigPath());
  deps.out(message);
}

async function runBulk(deps: CliDeps, globals: GlobalFlags, flags: BulkFlags): Promise<void> {
  if (flags.delete && flags.purge) {
    throw new StreamOpsError('Choose one of --delete or --purge');
  }
  const patch = predicatePatch(flags);

  await withSession(deps, globals, async (session, config) => {
    const controller = new QueryBuilderController({
      snapshot: session,
      mutator: session,
      presets: deps.presets(),
      readOnly: Boolean(globals.readOnly) || config.readOnly,
      invalidValues: config.strictFilters ? 'reject' : 'match',
      clock: deps.clock,
    });

    if (flags.filter !== undefined) {
      const preset = await controller.loadPreset(flags.filter);
      if (!preset) throw new InvalidPresetError(`Filter '${flags.filter}' not found`);
    }
    if (Object.keys(patch).length > 0 || flags.filter === undefined) {
      controller.updatePredicate(patch);
      await controller.preview();
    }

    if (flags.save !== undefined) {
      const saved = await controller.savePreset(flags.save);
      deps.out(`Saved filter '${saved.name}'`);
    }

    if (flags.sort !== undefined || flags.desc) {
      const column = flags.sort === undefined ? SortColumn.NAME : parseSortColumn(flags.sort);
      if (column === undefined) {
        throw new StreamOpsError(`Unknown sort column '${flags.sort}': use name, age, messages or consumers`);
      }
      controller.sortBy(column);
      if (flags.desc) controller.sortBy(column);
    }

    const { matched } = controller.view();
    deps.out(`Context: ${config.currentContextName()} (${config.describeSource()})`);
    deps.out(`Matched ${matched.length} streams`);
    if (matched.length > 0) deps.out(formatStreamTable(matched, deps.clock()));

    const action = flags.delete ? 'delete' : flags.purge ? 'purge' : undefined;
    if (!action) return;

    deps.out('');
    deps.out(formatConfirmation(controller.requestAction(action)));
    if (!flags.yes) {
      controller.cancel();
      deps.out('');
      deps.out('Dry run. Re-run with --yes to apply.');
      return;
    }

    const report = await controller.confirm();
    deps.out('');
    deps.out(formatReport(report));
  });
}

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command('stream-ops')
    .description('Bulk operations for JetStream streams')
    .option('-s, --server <url>', 'NATS server URL (overrides every config source)')
    .option('-c, --config <path>', 'config file path')
    .option('--context <name>', 'use this context instead of the default one')
    .option('-r, --read-only', 'refuse delete and purge');

  const streams = program
    .command('streams')
    .description('List streams')
    .action(async (_options: unknown, cmd: Command) => {
      await withSession(deps, cmd.optsWithGlobals<GlobalFlags>(), async session => {
        const list = await session.listStreams();
        deps.out(formatStreamTable(list, deps.clock()));
      });
    });

  streams
    .command('info <name>')
    .description('Show one stream: subjects, first message, size and consumers')
    .action(async (name: string, _options: unknown, cmd: Command) => {
      await withSession(deps, cmd.optsWithGlobals<GlobalFlags>(), async session => {
        const stream = await session.stream(name).info();
        deps.out(formatStreamDetail(stream, deps.clock()));
      });
    });

  const contexts = program
    .command('contexts')
    .description('List configured contexts; * marks the one in use (--server does not apply)')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalFlags>();
      const config = await deps.loadConfig({ configPath: globals.config });
      if (globals.context !== undefined) config.setContext(globals.context);

      const current = config.currentContextName();
      const width = Math.max(0, ...config.contexts.map(c => c.name.length));
      deps.out(config.contexts
        .map(c => `${c.name === current ? '*' : ' '} ${c.name.padEnd(width)}  ${c.server}`)
        .join('\n'));
    });

  contexts
    .command('use <name>')
    .description('Make a context the default')
    .action(async (name: string, _options: unknown, cmd: Command) => {
      await updateContexts(deps, cmd.optsWithGlobals<GlobalFlags>(), config => {
        config.setContext(name);
        return `Using context '${name}'`;
      });
    });

  contexts
    .command('add <name> <server>')
    .description('Add a context')
    .action(async (name: string, server: string, _options: unknown, cmd: Command) => {
      await updateContexts(deps, cmd.optsWithGlobals<GlobalFlags>(), config => {
        config.addContext(name, server);
        return `Added context '${name}'`;
      });
    });

  contexts
    .command('remove <name>')
    .description('Remove a context')
    .action(async (name: string, _options: unknown, cmd: Command) => {
      await updateContexts(deps, cmd.optsWithGlobals<GlobalFlags>(), config => {
        config.removeContext(name);
        return `Removed context '${name}'`;
      });
    });

  program
    .command('bulk')
    .description('Filter streams, preview the matches, then delete or purge them')
    .addHelpText('after', `
Without --yes the command only previews, even with --delete or --purge.

Examples:
  stream-ops bulk --pattern 'orders-*' --age '>24h' --consumers '=0'
  stream-ops bulk --filter stale --purge --yes
  stream-ops bulk --messages '=0' --save empty --sort age --desc`)
    .option('-p, --pattern <glob>', "name pattern, '*' is the only wildcard")
    .option('-a, --age <expr>', 'age since first message: <op><n>[m|h]')
    .option('--consumers <expr>', 'consumer count: <op><n>')
    .option('--messages <expr>', 'message count: <op><n>')
    .option('-f, --filter <name>', 'start from a saved filter')
    .option('--sort <column>', 'name, age, messages or consumers')
    .option('--desc', 'sort descending')
    .option('--save <name>', 'save the filter under a name')
    .option('--delete', 'delete every matched stream')
    .option('--purge', 'purge messages from every matched stream')
    .option('-y, --yes', 'apply the action without a dry run')
    .action(async (flags: BulkFlags, cmd: Command) => {
      await runBulk(deps, cmd.optsWithGlobals<GlobalFlags>(), flags);
    });

  program
    .command('filters')
    .description('List saved filters')
    .action(async () => {
      const presets = await deps.presets().loadPresets();
      if (presets.length === 0) {
        deps.out('No saved filters');
        return;
      }
      for (const p of presets) {
        const clauses = [`name=${p.namePattern}`];
        if (p.ageOp !== 'any') clauses.push(`age${p.ageOp}${p.ageValue}${p.ageUnit}`);
        if (p.consumerOp !== 'any') clauses.push(`consumers${p.consumerOp}${p.consumerValue}`);
        if (p.messagesOp !== 'any') clauses.push(`messages${p.messagesOp}${p.messagesValue}`);
        deps.out(`${p.name}: ${clauses.join(' ')}`);
      }
    });

  program
    .command('version')
    .description('Print the version')
    .action(() => {
      deps.out(`stream-ops ${VERSION}`);
    });

  return program;
}

/** Entry point: errors print as one line and exit 1. */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}
