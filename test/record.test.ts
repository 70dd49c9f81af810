import assert from 'assert';
import { describe, it } from 'node:test';

import { ownValue, setOwn } from '../src/utils/record.js';

describe('account-keyed records', () => {
    it('ignores inherited members on read', () => {
        const record: Record<string, number[]> = {};
        assert.strictEqual(ownValue(record, 'constructor'), undefined);
        assert.strictEqual(ownValue(record, 'toString'), undefined);
    });

    it('stores __proto__ as a plain key', () => {
        const record: Record<string, number> = {};
        setOwn(record, '__proto__', 7);
        assert.strictEqual(ownValue(record, '__proto__'), 7);
        assert.strictEqual(Object.getPrototypeOf(record), Object.prototype);
        assert.deepStrictEqual(Object.keys(record), ['__proto__']);
    });

    it('overwrites an existing key', () => {
        const record: Record<string, number> = { alice: 1 };
        setOwn(record, 'alice', 2);
        assert.strictEqual(record.alice, 2);
    });
});
