import { describe, it, expect } from 'vitest';
import { evaluate } from '../../src/query/evaluate';
import { applyPatch, defaultPredicate } from '../../src/query/predicate';
import { InvalidFilterValueError } from '../../src/errors';
import { NOW, summary } from '../utils/fake-cluster';

const HOUR_MS = 3_600_000;

const snapshot = [
    summary({ name: 'order-processing', messages: 150n, consumers: 2 }),
    summary({ name: 'order-archive', messages: 50n, consumers: 0 }),
    summary({ name: 'user-events', messages: 300n, consumers: 1 }),
];

function names(list: { name: string }[]): string[] {
    return list.map(s => s.name);
}

describe('EVALUATE', () => {
    it('should return the full snapshot in order when every clause is any', () => {
        expect(names(evaluate(defaultPredicate(), snapshot, { now: NOW }))).toEqual([
            'order-processing',
            'order-archive',
            'user-events',
        ]);
    });

    it('should match an exact name and nothing else', () => {
        const predicate = applyPatch(defaultPredicate(), { namePattern: 'order-archive' });
        expect(names(evaluate(predicate, snapshot, { now: NOW }))).toEqual(['order-archive']);

        const wrongCase = applyPatch(defaultPredicate(), { namePattern: 'Order-archive' });
        expect(evaluate(wrongCase, snapshot, { now: NOW })).toEqual([]);
    });

    it('should AND the name and message clauses', () => {
        const predicate = applyPatch(defaultPredicate(), {
            namePattern: 'order-*',
            messages: { op: '>', value: '100' },
        });
        expect(names(evaluate(predicate, snapshot, { now: NOW }))).toEqual(['order-processing']);
    });

    it('should filter on consumer count', () => {
        const predicate = applyPatch(defaultPredicate(), { consumers: { op: '=', value: '0' } });
        expect(names(evaluate(predicate, snapshot, { now: NOW }))).toEqual(['order-archive']);
    });

    describe('age', () => {
        const target = 2 * HOUR_MS;
        const aged = (name: string, ageMs: number) =>
            summary({ name, firstTime: new Date(NOW.getTime() - ageMs) });

        const streams = [
            aged('exact', target),
            aged('plus-9pct', target * 1.09),
            aged('plus-11pct', target * 1.11),
            aged('young', 30 * 60_000),
        ];

        it('should treat = as within 10% of the target', () => {
            const predicate = applyPatch(defaultPredicate(), { age: { op: '=', value: '2', unit: 'h' } });
            expect(names(evaluate(predicate, streams, { now: NOW }))).toEqual(['exact', 'plus-9pct']);
        });

        it('should compare > and < strictly', () => {
            const older = applyPatch(defaultPredicate(), { age: { op: '>', value: '2', unit: 'h' } });
            expect(names(evaluate(older, streams, { now: NOW }))).toEqual(['plus-9pct', 'plus-11pct']);

            const younger = applyPatch(defaultPredicate(), { age: { op: '<', value: '60', unit: 'm' } });
            expect(names(evaluate(younger, streams, { now: NOW }))).toEqual(['young']);
        });

        it('should read the value like scanf, ignoring trailing text', () => {
            const predicate = applyPatch(defaultPredicate(), { age: { op: '>', value: '2h', unit: 'h' } });
            expect(names(evaluate(predicate, streams, { now: NOW }))).toEqual(['plus-9pct', 'plus-11pct']);
        });
    });

    describe('unparseable values', () => {
        const predicate = applyPatch(defaultPredicate(), {
            namePattern: 'order-*',
            messages: { op: '>', value: 'lots' },
        });

        it('should fail open by default, leaving the other clauses in force', () => {
            expect(names(evaluate(predicate, snapshot, { now: NOW }))).toEqual([
                'order-processing',
                'order-archive',
            ]);
        });

        it('should throw in reject mode, naming the field', () => {
            expect(() => evaluate(predicate, snapshot, { now: NOW, invalidValues: 'reject' }))
                .toThrow(InvalidFilterValueError);

            try {
                evaluate(predicate, snapshot, { now: NOW, invalidValues: 'reject' });
            } catch (e) {
                expect(e).toBeInstanceOf(InvalidFilterValueError);
                expect(e).toMatchObject({ field: 'messages', value: 'lots' });
            }
        });

        it('should ignore an empty value in either mode', () => {
            const empty = applyPatch(defaultPredicate(), { consumers: { op: '>', value: '' } });
            expect(evaluate(empty, snapshot, { now: NOW, invalidValues: 'reject' })).toHaveLength(3);
        });
    });

    it('should not mutate the snapshot', () => {
        const copy = [...snapshot];
        evaluate(applyPatch(defaultPredicate(), { namePattern: 'user-*' }), snapshot, { now: NOW });
        expect(snapshot).toEqual(copy);
    });
});
