import assert from 'assert';
import { describe, it } from 'node:test';

import { applyExit, applyJoin, PoolRegistry } from '../src/staking/pool-registry.js';
import { PoolData } from '../src/staking/staking-interfaces.js';
import { rejectsWith } from './helpers.js';

function pool(overrides: Partial<PoolData> = {}): PoolData {
    return { id: 0, apr: 1000, aprDeficit: 0, periodInDays: 30, totalStakers: 0, enabled: true, ...overrides };
}

describe('APR drift', () => {
    it('lowers APR on join and restores it on exit', () => {
        const joined = applyJoin(pool(), 10);
        assert.strictEqual(joined.apr, 990);
        assert.strictEqual(joined.totalStakers, 1);
        const left = applyExit(joined, 10);
        assert.strictEqual(left.apr, 1000);
        assert.strictEqual(left.totalStakers, 0);
    });

    it('keeps the part below zero as a deficit', () => {
        const joined = applyJoin(pool({ apr: 5 }), 10);
        assert.strictEqual(joined.apr, 0);
        assert.strictEqual(joined.aprDeficit, 5);
    });

    it('repays the deficit before raising APR', () => {
        const left = applyExit(pool({ apr: 0, aprDeficit: 15, totalStakers: 2 }), 10);
        assert.strictEqual(left.apr, 0);
        assert.strictEqual(left.aprDeficit, 5);
        const again = applyExit(left, 10);
        assert.strictEqual(again.apr, 5);
        assert.strictEqual(again.aprDeficit, 0);
    });

    it('never takes totalStakers below zero', () => {
        assert.strictEqual(applyExit(pool(), 10).totalStakers, 0);
    });
});

describe('PoolRegistry', () => {
    it('assigns sequential ids', () => {
        const registry = new PoolRegistry([]);
        assert.strictEqual(registry.create(1000, 30).id, 0);
        assert.strictEqual(registry.create(2000, 180).id, 1);
        assert.deepStrictEqual(registry.aprs(), [1000, 2000]);
        assert.strictEqual(registry.size, 2);
    });

    it('rejects unknown pool ids', async () => {
        const registry = new PoolRegistry([pool()]);
        await rejectsWith(Promise.resolve().then(() => registry.get(1)), 'InvalidPoolId');
        await rejectsWith(Promise.resolve().then(() => registry.get(-1)), 'InvalidPoolId');
    });

    it('clears the deficit on a direct APR override', () => {
        const registry = new PoolRegistry([pool({ apr: 0, aprDeficit: 40 })]);
        const updated = registry.setApr(0, 700);
        assert.strictEqual(updated.apr, 700);
        assert.strictEqual(updated.aprDeficit, 0);
        assert.strictEqual(registry.get(0).apr, 700);
    });

    it('toggles the enabled flag', () => {
        const registry = new PoolRegistry([pool()]);
        assert.strictEqual(registry.setEnabled(0, false).enabled, false);
        assert.strictEqual(registry.get(0).enabled, false);
    });
});
