import 'dotenv/config';
import { Server } from 'http';

import { OwnerAccessControl } from './access.js';
import config from './config.js';
import logger from './logger.js';
import { disconnectKafkaProducer, initializeKafkaProducer, KafkaEventPublisher } from './modules/kafka.js';
import http from './modules/http/index.js';
import { MongoStateStore } from './mongo.js';
import settings from './settings.js';
import { StakingEngine, StakingEngineOptions } from './staking/engine.js';
import { defaultParams, StakingState } from './staking/state.js';
import { InMemoryNativeWallet, InMemoryTokenLedger } from './token/ledger.js';
import { formatTokenAmount, toBigInt } from './utils/bigint.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason_details: String(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

let closing = false;
let server: Server | null = null;
let store: MongoStateStore | null = null;

function genesisToken(): InMemoryTokenLedger {
    const token = new InMemoryTokenLedger(config.tokenSymbol, config.custodyAccount);
    const balance = toBigInt(config.genesisBalance);
    // Custody starts with the reward reserve
    token.mint(config.custodyAccount, balance);
    for (const account of settings.genesisAccounts) {
        token.mint(account, balance);
    }
    logger.info(`Minted ${formatTokenAmount(balance)} ${config.tokenSymbol} to custody and ${settings.genesisAccounts.length} genesis account(s).`);
    return token;
}

export async function main(): Promise<void> {
    logger.info(`Starting ${config.networkName} staking ledger...`);

    const token = genesisToken();
    const options: StakingEngineOptions = {
        token,
        tokens: symbol => (symbol === token.symbol ? token : undefined),
        native: new InMemoryNativeWallet(),
        access: new OwnerAccessControl(settings.ownerAccount),
        state: StakingState.genesis(defaultParams({ daySeconds: settings.daySeconds })),
    };

    let engine: StakingEngine;
    if (settings.useMongo) {
        store = await MongoStateStore.connect(settings.mongoUrl, settings.mongoDb);
        engine = await StakingEngine.load({ ...options, store });
        engine.events.addPublisher(store.eventPublisher());
    } else {
        logger.warn('USE_MONGO is not set, ledger state lives in memory only.');
        engine = new StakingEngine(options);
    }

    if (settings.useNotification) {
        await initializeKafkaProducer();
        engine.events.addPublisher(new KafkaEventPublisher());
    }

    server = http.init(engine);
    logger.info(`Ledger owner is ${settings.ownerAccount}, custody is ${engine.custody}.`);
}

async function shutdown(): Promise<void> {
    if (server) {
        const closingServer = server;
        await new Promise<void>(resolve => closingServer.close(() => resolve()));
    }
    if (settings.useNotification) await disconnectKafkaProducer();
    if (store) await store.close();
}

process.on('SIGINT', () => {
    if (closing) return;
    closing = true;
    logger.info('Received SIGINT, shutting down...');

    setTimeout(() => {
        logger.warn('Forcing shutdown after 30s timeout...');
        process.exit(1);
    }, 30000).unref();

    shutdown().then(
        () => {
            logger.info('Staking ledger exited safely');
            process.exit(0);
        },
        (error: unknown) => {
            logger.error(`Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        }
    );
});

main().catch((error: unknown) => {
    logger.fatal('Critical error during startup:', error);
    process.exit(1);
});
