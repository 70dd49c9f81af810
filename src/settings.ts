// Runtime settings sourced from environment variables

import config from './config.js';

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
// JSON log files are written only when set
export const logDir: string | undefined = process.env.LOG_DIR || undefined;
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'lockstake';
export const useMongo: boolean = process.env.USE_MONGO === 'true';
export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
// KAFKA_BROKERS (comma-separated) or the single KAFKA_BROKER
export const kafkaBrokers: string[] = (process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || 'localhost:29092')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
export const kafkaClientId: string = process.env.KAFKA_CLIENT_ID || 'lockstake-event-producer';
export const kafkaTopic: string = process.env.KAFKA_TOPIC || 'staking-events';
export const ownerAccount: string = process.env.OWNER_ACCOUNT || config.ownerAccount;
// Shorter lock days are handy on a devnet: DAY_SECONDS=1 turns a 30-day pool into 30 seconds
export const daySeconds: number = process.env.DAY_SECONDS ? parseInt(process.env.DAY_SECONDS) : config.daySeconds;
export const genesisAccounts: string[] = process.env.GENESIS_ACCOUNTS ? process.env.GENESIS_ACCOUNTS.split(',').map(s => s.trim()).filter(Boolean) : [];

export default {
    apiPort,
    logLevel,
    logDir,
    mongoUrl,
    mongoDb,
    useMongo,
    useNotification,
    kafkaBrokers,
    kafkaClientId,
    kafkaTopic,
    ownerAccount,
    daySeconds,
    genesisAccounts,
};
