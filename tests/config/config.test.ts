import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StreamOpsConfig, defaultConfigPath, loadConfig } from '../../src/config/config';
import { ConfigError } from '../../src/errors';
import type { PathEnv } from '../../src/config/paths';

async function writeJson(file: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(value));
}

describe('CONFIG', () => {
    let home: string;
    let pathEnv: PathEnv;
    let configFile: string;

    beforeEach(async () => {
        home = await fs.mkdtemp(path.join(os.tmpdir(), 'stream-ops-home-'));
        pathEnv = { env: {}, homeDir: home };
        configFile = path.join(home, '.config', 'stream-ops', 'config.json');
    });

    afterEach(async () => {
        await fs.rm(home, { recursive: true, force: true });
    });

    it('should use --server over every file', async () => {
        await writeJson(configFile, { contexts: [{ name: 'prod', server: 'nats://prod:4222' }] });

        const cfg = await loadConfig({ server: 'nats://cli:4222', pathEnv });

        expect(cfg.source).toBe('cli');
        expect(cfg.currentContextName()).toBe('cli');
        expect(cfg.describeSource()).toBe('Command line: nats://cli:4222');
        expect(cfg.toClientOptions()).toEqual({ servers: 'nats://cli:4222' });
    });

    it('should read the config file and expand creds and tokens', async () => {
        pathEnv.env = { OPS_TOKEN: 'test-secret' };
        await writeJson(configFile, {
            contexts: [
                { name: 'dev', server: 'nats://dev:4222' },
                { name: 'prod', server: 'nats://prod:4222', creds: 'creds/prod.creds', token: '${OPS_TOKEN}' },
            ],
            default_context: 'prod',
            read_only: true,
        });

        const cfg = await loadConfig({ pathEnv });

        expect(cfg.source).toBe('config-file');
        expect(cfg.describeSource()).toBe(`Config file: ${configFile}`);
        expect(cfg.currentContextName()).toBe('prod');
        expect(cfg.readOnly).toBe(true);
        expect(cfg.strictFilters).toBe(false);
        expect(cfg.toClientOptions()).toEqual({
            servers: 'nats://prod:4222',
            token: 'test-secret',
            credsFile: path.join(home, '.config', 'stream-ops', 'creds', 'prod.creds'),
        });
    });

    it('should take the first context when the default is unknown', async () => {
        await writeJson(configFile, {
            contexts: [{ name: 'dev', server: 'nats://dev:4222' }],
            default_context: 'gone',
        });

        expect((await loadConfig({ pathEnv })).currentContextName()).toBe('dev');
    });

    it('should drop keys it does not use when writing back', async () => {
        await writeJson(configFile, {
            contexts: [{ name: 'dev', server: 'nats://dev:4222' }],
            default_context: 'dev',
            refresh_interval: '500ms',
        });

        const cfg = await loadConfig({ pathEnv });

        expect(cfg.toFile()).toEqual({
            contexts: [{ name: 'dev', server: 'nats://dev:4222' }],
            default_context: 'dev',
            read_only: false,
            strict_filters: false,
        });
    });

    it('should honour an explicit --config path', async () => {
        const custom = path.join(home, 'elsewhere.json');
        await writeJson(custom, { contexts: [{ name: 'other', server: 'nats://other:4222' }], strict_filters: true });

        const cfg = await loadConfig({ configPath: custom, pathEnv });

        expect(cfg.sourcePath).toBe(custom);
        expect(cfg.strictFilters).toBe(true);
    });

    it('should fail on an unreadable or invalid config file', async () => {
        await fs.mkdir(path.dirname(configFile), { recursive: true });

        await fs.writeFile(configFile, '{ broken');
        await expect(loadConfig({ pathEnv })).rejects.toThrow(ConfigError);

        await writeJson(configFile, { contexts: [{ name: 'x' }] });
        await expect(loadConfig({ pathEnv })).rejects.toThrow('contexts.0.server');
    });

    it('should fall back to NATS CLI contexts', async () => {
        const ctxDir = path.join(home, '.config', 'nats', 'context');
        await writeJson(path.join(ctxDir, 'a.json'), { url: 'nats://a:4222' });
        await writeJson(path.join(ctxDir, 'b.json'), { url: 'nats://b:4222', creds: '~/keys/b.creds' });
        await fs.writeFile(path.join(ctxDir, 'broken.json'), 'nope');
        await fs.writeFile(path.join(home, '.config', 'nats', 'context.txt'), 'b\n');

        const cfg = await loadConfig({ pathEnv });

        expect(cfg.source).toBe('nats-context');
        expect(cfg.contexts.map(c => c.name)).toEqual(['a', 'b']);
        expect(cfg.currentContextName()).toBe('b');
        expect(cfg.describeSource()).toBe('NATS context: b');
        expect(cfg.toClientOptions()).toEqual({
            servers: 'nats://b:4222',
            credsFile: path.join(home, 'keys', 'b.creds'),
        });
    });

    it('should write the built-in default when nothing is configured', async () => {
        const cfg = await loadConfig({ pathEnv });

        expect(cfg.source).toBe('default');
        expect(cfg.describeSource()).toBe('Built-in default (no config found)');
        expect(cfg.toClientOptions()).toEqual({ servers: 'nats://localhost:4222' });

        const written: unknown = JSON.parse(await fs.readFile(configFile, 'utf8'));
        expect(written).toEqual({
            contexts: [{ name: 'local', server: 'nats://localhost:4222' }],
            default_context: 'local',
            read_only: false,
            strict_filters: false,
        });

        expect((await loadConfig({ pathEnv })).source).toBe('config-file');
    });

    it('should take the config path from STREAM_OPS_CONFIG', () => {
        expect(defaultConfigPath({ env: { STREAM_OPS_CONFIG: '/etc/stream-ops.json' }, homeDir: home }))
            .toBe('/etc/stream-ops.json');
        expect(defaultConfigPath(pathEnv)).toBe(configFile);
    });

    describe('contexts', () => {
        it('should add, switch and remove contexts', () => {
            const cfg = StreamOpsConfig.defaults();
            cfg.addContext('prod', 'nats://prod:4222');
            expect(() => cfg.addContext('prod', 'nats://x:4222')).toThrow(ConfigError);

            cfg.setContext('prod');
            expect(cfg.currentContext()).toEqual({ name: 'prod', server: 'nats://prod:4222' });
            expect(() => cfg.setContext('nope')).toThrow("context 'nope' not found");

            cfg.removeContext('prod');
            expect(cfg.currentContextName()).toBe('local');
            expect(cfg.defaultContext).toBe('local');
        });
    });
});
