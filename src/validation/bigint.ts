import config from '../config.js';
import { toBigInt } from '../utils/bigint.js';

const maxValue: bigint = toBigInt(config.maxValue);

/**
 * Token amounts: a bigint or a decimal integer string no larger than `config.maxValue`.
 * Zero and negative amounts are refused unless allowed.
 */
export default function validateBigInt(value: unknown, allowZero = false, allowNegative = false): boolean {
    let amount: bigint;
    if (typeof value === 'bigint') {
        amount = value;
    } else if (typeof value === 'string' && /^-?\d+$/.test(value)) {
        amount = toBigInt(value);
    } else {
        return false;
    }

    if (!allowZero && amount === 0n) return false;
    if (!allowNegative && amount < 0n) return false;
    return amount <= maxValue;
}
