import express, { ErrorRequestHandler, Express } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { Server } from 'http';

import logger from '../../logger.js';
import settings from '../../settings.js';
import { StakingEngine } from '../../staking/engine.js';
import { bigintReplacer } from '../../utils/bigint.js';
import { createAccountsRouter } from './accounts.js';
import { createConfigRouter } from './config.js';
import { createDepositsRouter } from './deposits.js';
import { createEventsRouter } from './events.js';
import { createPoolsRouter } from './pools.js';
import { createTransactionsRouter } from './transactions.js';

const malformedBody: ErrorRequestHandler = (err, req, res, next) => {
    if (err instanceof SyntaxError) {
        res.status(400).json({ success: false, error: 'Malformed JSON body' });
        return;
    }
    next(err);
};

/**
 * Builds the HTTP API over a staking engine. Bigints are rendered as decimal strings.
 */
export function createApp(engine: StakingEngine): Express {
    const app = express();
    app.use(cors());
    app.use(bodyParser.json());
    app.set('json replacer', bigintReplacer);

    logger.trace('Setting up HTTP endpoints...');
    app.use('/pools', createPoolsRouter(engine));
    app.use('/deposits', createDepositsRouter(engine));
    app.use('/accounts', createAccountsRouter(engine));
    app.use('/events', createEventsRouter(engine.events));
    app.use('/config', createConfigRouter(engine));
    app.use('/transactions', createTransactionsRouter(engine));
    app.use(malformedBody);
    logger.info('All available API endpoints initialized');

    return app;
}

/**
 * HTTP server module
 */
export function init(engine: StakingEngine, port: number = settings.apiPort): Server {
    const app = createApp(engine);

    logger.debug(`Starting HTTP server on port ${port}`);
    const server = app.listen(port, () => {
        const addr = server.address();
        if (addr && typeof addr !== 'string') {
            logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
        } else {
            logger.info(`HTTP server listening on port ${port}`);
        }
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
        } else if (error.code === 'EACCES') {
            logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
        } else {
            logger.error(`HTTP server error: ${error.message}`);
        }
    });

    return server;
}

export default {
    createApp,
    init,
};
