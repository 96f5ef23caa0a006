import { describe, expect, it } from 'vitest';
import { DEFAULT_CATEGORY_LIMITS } from '../src/core/config.js';
import { GateConfigurationError, TaskCancelledError } from '../src/core/errors.js';
import { CancellationToken } from '../src/task/cancellationToken.js';
import { CategoryGate } from '../src/task/categoryGate.js';
import { captureLogs, flush } from './helpers.js';

describe('CategoryGate', () => {
    captureLogs();

    it('applies the default ceilings', () => {
        const gate = new CategoryGate(DEFAULT_CATEGORY_LIMITS);
        expect(gate.snapshot()).toEqual([
            { category: 'desktop', capacity: 1, inUse: 0, waiting: 0 },
            { category: 'file', capacity: 3, inUse: 0, waiting: 0 },
            { category: 'query', capacity: 5, inUse: 0, waiting: 0 },
            { category: 'shell', capacity: 2, inUse: 0, waiting: 0 },
            { category: 'network', capacity: 3, inUse: 0, waiting: 0 }
        ]);
    });

    it.each([0, -1, 1.5, Number.NaN])('rejects capacity %s at construction', (capacity) => {
        expect(() => new CategoryGate({ ...DEFAULT_CATEGORY_LIMITS, shell: capacity })).toThrow(
            GateConfigurationError
        );
    });

    it('rejects categories outside the enumeration', () => {
        const limits = { ...DEFAULT_CATEGORY_LIMITS, printer: 1 };
        expect(() => new CategoryGate(limits)).toThrow('Unknown category in gate limits: printer');
    });

    it('admits up to the capacity and queues the rest', async () => {
        const gate = new CategoryGate({ ...DEFAULT_CATEGORY_LIMITS, shell: 2 });
        const admitted: number[] = [];
        for (const n of [1, 2, 3]) {
            void gate.acquire('shell', new CancellationToken()).then(() => admitted.push(n));
        }
        await flush();
        expect(admitted).toEqual([1, 2]);
        expect(gate.inUse('shell')).toBe(2);
        expect(gate.waiting('shell')).toBe(1);
    });

    it('hands slots to waiters in FIFO order', async () => {
        const gate = new CategoryGate({ ...DEFAULT_CATEGORY_LIMITS, file: 1 });
        const first = await gate.acquire('file', new CancellationToken());
        const order: string[] = [];
        const second = gate.acquire('file', new CancellationToken()).then((release) => {
            order.push('second');
            return release;
        });
        const third = gate.acquire('file', new CancellationToken()).then((release) => {
            order.push('third');
            return release;
        });
        first();
        (await second)();
        (await third)();
        expect(order).toEqual(['second', 'third']);
        expect(gate.inUse('file')).toBe(0);
    });

    it('keeps categories independent', async () => {
        const gate = new CategoryGate(DEFAULT_CATEGORY_LIMITS);
        await gate.acquire('desktop', new CancellationToken());
        const release = await gate.acquire('query', new CancellationToken());
        expect(gate.inUse('query')).toBe(1);
        release();
        expect(gate.inUse('desktop')).toBe(1);
    });

    it('removes a waiter whose token fires and rejects it', async () => {
        const gate = new CategoryGate(DEFAULT_CATEGORY_LIMITS);
        const holder = await gate.acquire('desktop', new CancellationToken());
        const token = new CancellationToken();
        const waiting = gate.acquire('desktop', token);
        expect(gate.waiting('desktop')).toBe(1);
        token.cancel();
        await expect(waiting).rejects.toThrow(TaskCancelledError);
        expect(gate.waiting('desktop')).toBe(0);
        holder();
        expect(gate.inUse('desktop')).toBe(0);
    });

    it('rejects an already-cancelled token without queueing', async () => {
        const gate = new CategoryGate(DEFAULT_CATEGORY_LIMITS);
        const token = new CancellationToken();
        token.cancel();
        await expect(gate.acquire('query', token)).rejects.toThrow('Cancelled before admission');
        expect(gate.inUse('query')).toBe(0);
        expect(gate.waiting('query')).toBe(0);
    });

    it('ignores a second call to the same release', async () => {
        const gate = new CategoryGate({ ...DEFAULT_CATEGORY_LIMITS, network: 2 });
        const release = await gate.acquire('network', new CancellationToken());
        await gate.acquire('network', new CancellationToken());
        release();
        release();
        expect(gate.inUse('network')).toBe(1);
    });

    it('releases the slot when the scoped body throws', async () => {
        const gate = new CategoryGate(DEFAULT_CATEGORY_LIMITS);
        await expect(
            gate.withSlot('desktop', new CancellationToken(), async () => {
                expect(gate.inUse('desktop')).toBe(1);
                throw new Error('body failed');
            })
        ).rejects.toThrow('body failed');
        expect(gate.inUse('desktop')).toBe(0);
    });

    it('returns the scoped body result', async () => {
        const gate = new CategoryGate(DEFAULT_CATEGORY_LIMITS);
        await expect(gate.withSlot('file', new CancellationToken(), async () => 42)).resolves.toBe(42);
        expect(gate.inUse('file')).toBe(0);
    });
});
