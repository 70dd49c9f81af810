import string from './string.js';

const accountEdgeChars = 'abcdefghijklmnopqrstuvwxyz0123456789';
const accountInnerChars = 'abcdefghijklmnopqrstuvwxyz0123456789.-_';

/**
 * Account names are lowercase, 2 to 32 characters, with `.`, `-` and `_` only
 * between the first and last character
 */
const validateAccount = (value: unknown): value is string => {
    return string(value, 32, 2, accountEdgeChars, accountInnerChars);
};

export const validateTokenSymbol = (value: unknown): value is string => {
    return string(value, 10, 2, 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789');
};

export default validateAccount;
