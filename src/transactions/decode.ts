import { reject } from '../staking/errors.js';
import { TransactionDataMap, TransactionType, transactions } from './types.js';

type RawData = Record<string, unknown>;
type Decoders = { [K in TransactionType]: (raw: RawData) => TransactionDataMap[K] };

function isRecord(value: unknown): value is RawData {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Field readers only check the JSON type; ranges are checked by each handler's validateTx
const field = {
    number(raw: RawData, name: string): number {
        const value = raw[name];
        if (typeof value !== 'number') throw reject('InvalidInput', `[decode] ${name} must be a number.`);
        return value;
    },
    amount(raw: RawData, name: string): string {
        const value = raw[name];
        if (typeof value === 'string') return value;
        if (typeof value === 'number' && Number.isSafeInteger(value)) return value.toString();
        throw reject('InvalidInput', `[decode] ${name} must be an integer string.`);
    },
    string(raw: RawData, name: string): string {
        const value = raw[name];
        if (typeof value !== 'string') throw reject('InvalidInput', `[decode] ${name} must be a string.`);
        return value;
    },
    boolean(raw: RawData, name: string): boolean {
        const value = raw[name];
        if (typeof value !== 'boolean') throw reject('InvalidInput', `[decode] ${name} must be a boolean.`);
        return value;
    },
    numbers(raw: RawData, name: string): number[] {
        const value = raw[name];
        if (!Array.isArray(value)) throw reject('InvalidInput', `[decode] ${name} must be an array.`);
        return value.map((item: unknown) => {
            if (typeof item !== 'number') throw reject('InvalidInput', `[decode] ${name} must only hold numbers.`);
            return item;
        });
    },
    strings(raw: RawData, name: string): string[] {
        const value = raw[name];
        if (!Array.isArray(value)) throw reject('InvalidInput', `[decode] ${name} must be an array.`);
        return value.map((item: unknown) => {
            if (typeof item !== 'string') throw reject('InvalidInput', `[decode] ${name} must only hold strings.`);
            return item;
        });
    },
};

const decoders: Decoders = {
    [TransactionType.STAKING_STAKE]: raw => ({ poolId: field.number(raw, 'poolId'), amount: field.amount(raw, 'amount') }),
    [TransactionType.STAKING_UNSTAKE]: raw => ({ depositId: field.number(raw, 'depositId') }),
    [TransactionType.STAKING_COMPOUND]: raw => ({ depositId: field.number(raw, 'depositId') }),
    [TransactionType.STAKING_EMERGENCY_WITHDRAW]: raw => ({ depositId: field.number(raw, 'depositId') }),
    [TransactionType.ADMIN_SET_APR_FACTOR]: raw => ({ aprFactor: field.number(raw, 'aprFactor') }),
    [TransactionType.ADMIN_SET_USER_APR_FACTOR]: raw => ({ userAprFactor: field.number(raw, 'userAprFactor') }),
    [TransactionType.ADMIN_SET_EMERGENCY_FEE]: raw => ({ fee: field.number(raw, 'fee') }),
    [TransactionType.ADMIN_SET_COMPOUND_PERIOD]: raw => ({ compoundPeriod: field.number(raw, 'compoundPeriod') }),
    [TransactionType.ADMIN_SET_STAKING_SUPPLY]: raw => ({ amount: field.amount(raw, 'amount') }),
    [TransactionType.ADMIN_SET_PAUSED]: raw => ({ paused: field.boolean(raw, 'paused') }),
    [TransactionType.ADMIN_SET_USER_BONUS]: raw => ({ account: field.string(raw, 'account'), enabled: field.boolean(raw, 'enabled') }),
    [TransactionType.ADMIN_SET_USER_BONUS_BATCH]: raw => ({ accounts: field.strings(raw, 'accounts'), enabled: field.boolean(raw, 'enabled') }),
    [TransactionType.ADMIN_SET_POOL_STATUS]: raw => ({ poolId: field.number(raw, 'poolId'), enabled: field.boolean(raw, 'enabled') }),
    [TransactionType.ADMIN_SET_POOL_STATUS_BATCH]: raw => ({ poolIds: field.numbers(raw, 'poolIds'), enabled: field.boolean(raw, 'enabled') }),
    [TransactionType.ADMIN_SET_APR]: raw => ({ poolId: field.number(raw, 'poolId'), apr: field.number(raw, 'apr') }),
    [TransactionType.ADMIN_SET_APRS]: raw => ({ aprs: field.numbers(raw, 'aprs') }),
    [TransactionType.ADMIN_RETURN_ALL_DEPOSITS]: () => ({}),
    [TransactionType.ADMIN_SWEEP_TOKEN]: raw => ({ symbol: field.string(raw, 'symbol') }),
    [TransactionType.ADMIN_SWEEP_NATIVE]: () => ({}),
};

/**
 * Turns an untyped JSON payload into the data shape of the given transaction type.
 */
export function decodeTransactionData<T extends TransactionType>(type: T, data: unknown): TransactionDataMap[T] {
    const raw = data === undefined ? {} : data;
    if (!isRecord(raw)) {
        throw reject('InvalidInput', `[decode] ${transactions[type]} data must be an object.`);
    }
    return decoders[type](raw);
}
