/**
 * Non-negative safe integers: pool and deposit ids, APRs, fees, periods.
 * Zero is refused unless `canBeZero`; `max` is inclusive.
 */
const validateInteger = (value: unknown, canBeZero = false, max: number = Number.MAX_SAFE_INTEGER): value is number => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value))
        return false;
    if (value < 0 || value > max)
        return false;
    return canBeZero || value !== 0;
};

export default validateInteger;
