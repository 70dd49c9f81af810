import assert from 'assert';
import { describe, it } from 'node:test';

import { depositFromDoc, DepositDoc, depositToDoc, paramsToDoc, PoolDoc, snapshotFromDocs, StateDoc } from '../src/mongo.js';
import { defaultParams } from '../src/staking/state.js';

describe('mongo documents', () => {
    it('stores amounts as zero-padded strings', () => {
        const doc = depositToDoc({
            depositId: 3,
            poolId: 1,
            owner: 'alice',
            amount: 25n,
            compounded: 0n,
            startDate: 10,
            endDate: 20,
            ended: false,
        });
        assert.strictEqual(doc._id, 3);
        assert.strictEqual(doc.amount, '00000000000000000000000000000025');
        assert.strictEqual(doc.compounded, '0'.repeat(32));
        assert.strictEqual('closedAt' in doc, false);
    });

    it('reads deposits back with their exit details', () => {
        const deposit = depositFromDoc({
            _id: 4,
            poolId: 0,
            owner: 'bob',
            amount: '0'.repeat(32),
            compounded: '00000000000000000000000000000120',
            startDate: 1,
            endDate: 2,
            ended: true,
            closedAt: 2,
            exitMode: 'normal',
        });
        assert.deepStrictEqual(deposit, {
            depositId: 4,
            poolId: 0,
            owner: 'bob',
            amount: 0n,
            compounded: 120n,
            startDate: 1,
            endDate: 2,
            ended: true,
            closedAt: 2,
            exitMode: 'normal',
        });
    });

    it('rebuilds the owner index in deposit order', () => {
        const deposit = (id: number, owner: string): DepositDoc => ({
            _id: id,
            poolId: 0,
            owner,
            amount: '00000000000000000000000000000001',
            compounded: '0'.repeat(32),
            startDate: 0,
            endDate: 1,
            ended: false,
        });
        const pools: PoolDoc[] = [
            { _id: 1, apr: 2000, aprDeficit: 0, periodInDays: 180, totalStakers: 0, enabled: true },
            { _id: 0, apr: 990, aprDeficit: 0, periodInDays: 30, totalStakers: 3, enabled: true },
        ];
        const state: StateDoc = {
            _id: 0,
            params: paramsToDoc(defaultParams({ stakingSupply: 77n })),
            bonusAccounts: ['carol'],
            lastCompound: { alice: 5 },
            updatedAt: '2024-01-01T00:00:00.000Z',
        };

        const snapshot = snapshotFromDocs(pools, [deposit(2, 'alice'), deposit(0, 'alice'), deposit(1, 'bob')], state);

        assert.deepStrictEqual(snapshot.pools.map(pool => pool.id), [0, 1]);
        assert.deepStrictEqual(snapshot.deposits.map(d => d.depositId), [0, 1, 2]);
        assert.deepStrictEqual(snapshot.depositsByOwner, { alice: [0, 2], bob: [1] });
        assert.deepStrictEqual(snapshot.bonusAccounts, { carol: true });
        assert.strictEqual(snapshot.params.stakingSupply, 77n);
        assert.deepStrictEqual(snapshot.lastCompound, { alice: 5 });
    });

    it('rebuilds indexes for owners named like Object.prototype members', () => {
        const doc: DepositDoc = {
            _id: 0,
            poolId: 0,
            owner: 'constructor',
            amount: '00000000000000000000000000000025',
            compounded: '0'.repeat(32),
            startDate: 0,
            endDate: 1,
            ended: false,
        };
        const state: StateDoc = {
            _id: 0,
            params: paramsToDoc(defaultParams()),
            bonusAccounts: ['constructor'],
            lastCompound: {},
            updatedAt: '2024-01-01T00:00:00.000Z',
        };

        const snapshot = snapshotFromDocs([], [doc], state);
        assert.deepStrictEqual(Object.keys(snapshot.depositsByOwner), ['constructor']);
        assert.deepStrictEqual(snapshot.depositsByOwner.constructor, [0]);
        assert.strictEqual(snapshot.bonusAccounts.constructor, true);
    });
});
