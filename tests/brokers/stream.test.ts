import { describe, it, expect, vi } from 'vitest';
import { toStreamSummary } from '../../src/brokers/stream';
import { withDeadline } from '../../src/connection';
import { NotConnectedError, RequestTimeoutError } from '../../src/errors';
import { fakeClient, hoursAgo, NOW } from '../utils/fake-cluster';

describe('STREAM', () => {
    it('should map JetStream stream info onto a summary', () => {
        expect(toStreamSummary({
            config: { name: 'orders', subjects: ['orders.>'] },
            state: { messages: 42, bytes: 4096, first_ts: '2024-06-01T10:00:00Z', consumer_count: 3 },
        })).toEqual({
            name: 'orders',
            subjects: ['orders.>'],
            firstTime: new Date('2024-06-01T10:00:00Z'),
            messages: 42n,
            bytes: 4096n,
            consumers: 3,
        });
    });

    it('should default missing subjects to an empty list', () => {
        const s = toStreamSummary({
            config: { name: 'mirror' },
            state: { messages: 0, bytes: 0, first_ts: '0001-01-01T00:00:00Z', consumer_count: 0 },
        });
        expect(s.subjects).toEqual([]);
    });

    it('should list every stream through the directory', async () => {
        const { client } = fakeClient([
            { name: 'a', firstTime: hoursAgo(2), messages: 5, consumers: 1, bytes: 512 },
            { name: 'b', firstTime: NOW, messages: 0, consumers: 0 },
        ]);

        const streams = await client.streams.list();

        expect(streams.map(s => s.name)).toEqual(['a', 'b']);
        expect(streams[0]).toMatchObject({ messages: 5n, bytes: 512n, consumers: 1, subjects: ['a.>'] });
        expect(streams[0].firstTime.getTime()).toBe(hoursAgo(2).getTime());
    });

    it('should cache one handle per stream name', () => {
        const { client } = fakeClient();
        expect(client.stream('orders')).toBe(client.stream('orders'));
        expect(client.stream('orders')).not.toBe(client.stream('events'));
    });

    it('should read, purge and delete through a handle', async () => {
        const { client, cluster } = fakeClient([{ name: 'orders', firstTime: NOW, messages: 9, consumers: 2 }]);

        expect((await client.stream('orders').info()).messages).toBe(9n);

        await client.purgeStream('orders');
        expect(cluster.get('orders')).toMatchObject({ messages: 0, consumers: 2 });

        const before = client.stream('orders');
        await client.deleteStream('orders');
        expect(cluster.has('orders')).toBe(false);
        expect(client.stream('orders')).not.toBe(before);
    });

    it('should surface a missing stream on purge', async () => {
        const { client } = fakeClient();
        await expect(client.purgeStream('ghost')).rejects.toThrow('stream not found');
    });

    it('should refuse requests after disconnect', async () => {
        const { client } = fakeClient();
        expect(client.connected).toBe(true);

        await client.disconnect();

        expect(client.connected).toBe(false);
        await expect(client.listStreams()).rejects.toThrow(NotConnectedError);
    });

    describe('withDeadline', () => {
        it('should pass through work that settles in time', async () => {
            await expect(withDeadline(Promise.resolve(7), 100)).resolves.toBe(7);
            await expect(withDeadline(Promise.reject(new Error('nope')), 100)).rejects.toThrow('nope');
        });

        it('should reject with a timeout when the work hangs', async () => {
            vi.useFakeTimers();
            const pending = withDeadline(new Promise<never>(() => { }), 100);
            const assertion = expect(pending).rejects.toThrow(RequestTimeoutError);

            await vi.advanceTimersByTimeAsync(100);

            await assertion;
            await expect(pending).rejects.toThrow('Request timeout after 100ms');
        });
    });
});
