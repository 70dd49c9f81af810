import config from '../config.js';

// Maximum expected length for any BigInt value we'll handle
// This allows for numbers up to 999,999,999,999,999,999,999,999,999,999 (30 digits)
const MAX_INTEGER_LENGTH = 32;

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    if (value.startsWith('-')) return -toBigInt(value.slice(1));
    // Remove padding before converting to BigInt
    return BigInt(value.replace(/^0+/, '') || '0');
}

/**
 * Convert a value to BigInt and then to a zero-padded string suitable for database storage
 * Ensures correct lexicographical sorting in MongoDB
 * @param value The value to convert (number, string, or bigint)
 * @param padLength Optional custom pad length
 * @returns A zero-padded string representation
 */
export function toDbString(
    value: number | string | bigint,
    padLength = MAX_INTEGER_LENGTH
): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

/**
 * Format a token amount with the staking token's decimal places
 * @param value The BigInt value to format
 * @param decimals Number of decimal places
 * @returns A decimal string with trailing zeros trimmed
 */
export function formatTokenAmount(value: bigint, decimals: number = config.tokenPrecision): string {
    const negative = value < 0n;
    const str = (negative ? -value : value).toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, -decimals) || '0';
    const decimalPart = str.slice(-decimals);

    const trimmedDecimal = decimalPart.replace(/0+$/, '');
    const formatted = trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
    return negative ? `-${formatted}` : formatted;
}

/**
 * JSON.stringify replacer rendering bigints as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

export const BigIntMath = {
    sum(values: bigint[]): bigint {
        return values.reduce((acc, val) => acc + val, 0n);
    },
};
