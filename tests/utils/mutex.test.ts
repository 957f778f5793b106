/**
 * Tests for the promise-chain mutex.
 */

import { describe, it, expect } from 'vitest';
import { Mutex } from '../../src/utils/mutex.js';

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Mutex', () => {
    it('runs tasks one at a time in call order', async () => {
        const mutex = new Mutex();
        const log: string[] = [];

        await Promise.all([
            mutex.runExclusive(async () => {
                log.push('a:start');
                await delay(10);
                log.push('a:end');
            }),
            mutex.runExclusive(() => {
                log.push('b');
            }),
            mutex.runExclusive(async () => {
                log.push('c:start');
                await delay(1);
                log.push('c:end');
            }),
        ]);

        expect(log).toEqual(['a:start', 'a:end', 'b', 'c:start', 'c:end']);
    });

    it('returns the task result', async () => {
        const mutex = new Mutex();
        await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
    });

    it('keeps working after a task throws', async () => {
        const mutex = new Mutex();
        await expect(mutex.runExclusive(() => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
    });
});
