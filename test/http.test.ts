import assert from 'assert';
import { Server } from 'http';
import { AddressInfo } from 'net';
import { after, before, describe, it } from 'node:test';

import { createApp } from '../src/modules/http/index.js';
import { DAY, OWNER, setup } from './helpers.js';

describe('HTTP API', () => {
    const { engine, token, clock } = setup();
    token.mint('alice', 1500n);
    let server: Server;
    let baseUrl = '';

    before(async () => {
        server = createApp(engine).listen(0, '127.0.0.1');
        await new Promise<void>(resolve => server.once('listening', () => resolve()));
        const address: AddressInfo | string | null = server.address();
        assert.ok(address && typeof address !== 'string');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    async function request(path: string, body?: string) {
        const res = await fetch(`${baseUrl}${path}`, {
            method: body === undefined ? 'GET' : 'POST',
            headers: body === undefined ? undefined : { 'content-type': 'application/json' },
            body,
        });
        return { status: res.status, body: JSON.parse(await res.text()) };
    }

    function post(path: string, payload: object) {
        return request(path, JSON.stringify(payload));
    }

    it('lists the pools', async () => {
        const { status, body } = await request('/pools');
        assert.strictEqual(status, 200);
        assert.deepStrictEqual(body.data.map((pool: { apr: number }) => pool.apr), [1000, 2000, 3000]);
        assert.strictEqual(body.total, 3);
    });

    it('answers 404 for unknown pools', async () => {
        assert.strictEqual((await request('/pools/9')).status, 404);
        const { status, body } = await request('/pools/abc');
        assert.strictEqual(status, 404);
        assert.strictEqual(body.code, 'InvalidPoolId');
    });

    it('stakes through a named transaction', async () => {
        const { status, body } = await post('/transactions', {
            type: 'staking_stake',
            sender: 'alice',
            data: { poolId: 0, amount: '1000' },
        });
        assert.strictEqual(status, 200);
        assert.strictEqual(body.type, 'staking_stake');
        assert.strictEqual(body.result.amount, '1000');
        assert.strictEqual(body.result.depositId, 0);
    });

    it('shows the deposit and the account', async () => {
        const deposit = await request('/deposits/0');
        assert.strictEqual(deposit.status, 200);
        assert.strictEqual(deposit.body.deposit.amount, '1000');
        assert.strictEqual(deposit.body.pendingReward, '0');

        const account = await request('/accounts/alice');
        assert.strictEqual(account.body.account.balance, '500');
        assert.strictEqual(account.body.account.totalStaked, '1000');
        assert.strictEqual(account.body.account.bonus, false);
        assert.strictEqual(account.body.account.deposits.length, 1);
    });

    it('shows accounts named like Object.prototype members', async () => {
        const { status, body } = await request('/accounts/constructor');
        assert.strictEqual(status, 200);
        assert.deepStrictEqual(body.account.deposits, []);
        assert.strictEqual(body.account.totalStaked, '0');
        assert.strictEqual(body.account.bonus, false);
    });

    it('maps ledger errors to status codes', async () => {
        const early = await post('/transactions', { type: 2, sender: 'alice', data: { depositId: 0 } });
        assert.strictEqual(early.status, 409);
        assert.strictEqual(early.body.code, 'CantUnstakeNow');

        const foreign = await post('/transactions', { type: 'admin_set_paused', sender: 'alice', data: { paused: true } });
        assert.strictEqual(foreign.status, 403);

        const unknown = await post('/transactions', { type: 99, sender: 'alice' });
        assert.strictEqual(unknown.status, 400);
        assert.strictEqual(unknown.body.code, 'InvalidTransaction');

        const wrongType = await post('/transactions', { type: 'staking_unstake', sender: 'alice', data: { depositId: '0' } });
        assert.strictEqual(wrongType.status, 400);
        assert.strictEqual(wrongType.body.code, 'InvalidInput');
    });

    it('rejects malformed JSON', async () => {
        const { status, body } = await request('/transactions', '{"type":');
        assert.strictEqual(status, 400);
        assert.strictEqual(body.success, false);
    });

    it('unstakes after maturity and exposes the events', async () => {
        clock.advance(30 * DAY);
        const { status, body } = await post('/transactions', { type: 'STAKING_UNSTAKE', sender: 'alice', data: { depositId: 0 } });
        assert.strictEqual(status, 200);
        assert.strictEqual(body.result.principal, '1000');

        const events = await request('/events?limit=1');
        assert.strictEqual(events.body.total, 2);
        assert.strictEqual(events.body.data[0].type, 'staking_unstake');
        assert.strictEqual(events.body.limit, 1);
    });

    it('serves the ledger configuration', async () => {
        await post('/transactions', { type: 'admin_set_emergency_fee', sender: OWNER, data: { fee: 5 } });
        const { body } = await request('/config');
        assert.strictEqual(body.tokenSymbol, 'STK');
        assert.strictEqual(body.params.emergencyFee, 5);
        // The unstake above drew a reward of 8
        assert.strictEqual(body.amountLeftForStaking, '599999999999999999999999992');
    });
});
