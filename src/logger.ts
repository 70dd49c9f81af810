import winston from 'winston';
import fs from 'fs';
import path from 'path';

import settings from './settings.js';
import { bigintReplacer } from './utils/bigint.js';

// Ledger levels: `fatal` for process exits, `trace` for per-transaction timing
const ledgerLevels = {
    levels: {
        fatal: 0,
        error: 1,
        warn: 2,
        info: 3,
        debug: 4,
        trace: 5
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        warn: 'yellow',
        info: 'green',
        debug: 'white',
        trace: 'grey'
    }
};

type LedgerLevel = keyof typeof ledgerLevels.levels;

function isLedgerLevel(level: string): level is LedgerLevel {
    return Object.hasOwn(ledgerLevels.levels, level);
}

const levelNames = Object.keys(ledgerLevels.levels).join(', ');

function resolveLevel(requested: string): LedgerLevel {
    const level = requested.toLowerCase();
    if (isLedgerLevel(level)) return level;
    console.warn(`Invalid LOG_LEVEL "${requested}", falling back to "info". Levels: ${levelNames}`);
    return 'info';
}

const initialLevel = resolveLevel(settings.logLevel);

winston.addColors(ledgerLevels.colors);

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta, bigintReplacer)}` : '';
        return `[${timestamp}] ${level}: ${message}${metaStr}`;
    })
);

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [new winston.transports.Console({ format: consoleFormat })];

if (settings.logDir) {
    fs.mkdirSync(settings.logDir, { recursive: true });
    transports.push(
        new winston.transports.File({
            filename: path.join(settings.logDir, `lockstake-${settings.ownerAccount}.log`),
            format: winston.format.combine(winston.format.timestamp(), winston.format.json({ replacer: bigintReplacer }))
        })
    );
}

const ledgerLogger = winston.createLogger({
    levels: ledgerLevels.levels,
    level: initialLevel,
    format: winston.format.errors({ stack: true }),
    transports
});

const logger = Object.assign(ledgerLogger, {
    /** Switches every transport at runtime; unknown names are refused with a warning. */
    setLogLevel: (level: string) => {
        const next = level.toLowerCase();
        if (!isLedgerLevel(next)) {
            ledgerLogger.warn(`[logger] Unknown log level ${level}. Levels: ${levelNames}`);
            return;
        }
        ledgerLogger.level = next;
        ledgerLogger.debug(`[logger] Log level set to ${next}.`);
    }
});

export default logger;
