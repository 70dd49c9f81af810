import express, { Request, Response, Router } from 'express';

import { reject } from '../../staking/errors.js';
import { StakingEngine } from '../../staking/engine.js';
import { decodeTransactionData } from '../../transactions/decode.js';
import { parseTransactionType, transactions } from '../../transactions/types.js';
import { sendError } from './utils.js';

export function createTransactionsRouter(engine: StakingEngine): Router {
    const router: Router = express.Router();

    /**
     * @api {post} /transactions Submit transaction
     * @apiName PostTransaction
     * @apiGroup Transactions
     * @apiDescription Queues a transaction and answers once it has committed or been rejected
     *
     * @apiParam {Number|String} type Numeric type or name, e.g. 1 or "staking_stake"
     * @apiParam {String} sender Acting account
     * @apiParam {Object} [data] Type-specific payload
     *
     * @apiParamExample {json} Stake Example:
     *     { "type": "staking_stake", "sender": "alice", "data": { "poolId": 0, "amount": "1000" } }
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const body: unknown = req.body;
            if (typeof body !== 'object' || body === null) {
                throw reject('InvalidInput', '[http] Request body must be a JSON object.');
            }
            const type = parseTransactionType('type' in body ? body.type : undefined);
            if (type === undefined) {
                throw reject('InvalidTransaction', '[http] Unknown transaction type.');
            }
            const sender = 'sender' in body ? body.sender : undefined;
            if (typeof sender !== 'string') {
                throw reject('InvalidInput', '[http] sender must be a string.');
            }
            const data = decodeTransactionData(type, 'data' in body ? body.data : undefined);
            const result = await engine.submit({ type, sender, data });
            res.json({ success: true, type: transactions[type], result });
        } catch (error) {
            sendError(res, error, 'submitting transaction');
        }
    });

    return router;
}
