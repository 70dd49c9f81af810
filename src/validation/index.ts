import array from './array.js';
import integer from './integer.js';
import string from './string.js';
import bigint from './bigint.js';
import boolean from './boolean.js';
import account, { validateTokenSymbol } from './account.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    array: (value: unknown, maxLength?: number) => value is unknown[];
    integer: (value: unknown, canBeZero?: boolean, max?: number) => value is number;
    string: (value: unknown, maxLength: number, minLength: number, edgeChars?: string, innerChars?: string) => value is string;
    bigint: (value: unknown, allowZero?: boolean, allowNegative?: boolean) => boolean;
    boolean: (value: unknown) => value is boolean;
    account: (value: unknown) => value is string;
    tokenSymbol: (value: unknown) => value is string;
}

/**
 * Validation module with functions for validating different data types
 */
const validation: ValidationModule = {
    array,
    integer,
    string,
    bigint,
    boolean,
    account,
    tokenSymbol: validateTokenSymbol,
};

export default validation;
