import assert from 'assert';
import { describe, it } from 'node:test';
import { setTimeout as delay } from 'timers/promises';

import ProcessingQueue from '../src/processingQueue.js';

describe('ProcessingQueue', () => {
    it('runs tasks one at a time in submission order', async () => {
        const queue = new ProcessingQueue();
        const trace: string[] = [];
        const first = queue.run(async () => {
            trace.push('a-start');
            await delay(20);
            trace.push('a-end');
            return 'a';
        });
        const second = queue.run(async () => {
            trace.push('b-start');
            trace.push('b-end');
            return 'b';
        });
        assert.deepStrictEqual(await Promise.all([first, second]), ['a', 'b']);
        assert.deepStrictEqual(trace, ['a-start', 'a-end', 'b-start', 'b-end']);
    });

    it('keeps going after a failed task', async () => {
        const queue = new ProcessingQueue();
        const failing = queue.run(async () => {
            throw new Error('boom');
        });
        const next = queue.run(async () => 42);
        await assert.rejects(failing, /boom/);
        assert.strictEqual(await next, 42);
        assert.strictEqual(queue.pending, 0);
        assert.strictEqual(queue.processing, false);
    });
});
