/**
 * Validates array values like batch account lists or pool id lists
 * with at least 1 element
 * @param value Value to validate
 * @param maxLength Maximum allowed length of the array
 * @returns True if the array is valid, false otherwise
 */
const validateArray = (
    value: unknown,
    maxLength?: number
): value is unknown[] => {
    if (!value)
        return false;
    if (!Array.isArray(value))
        return false;
    if (value.length < 1)
        return false;
    if (maxLength && value.length > maxLength)
        return false;

    return true;
};

export default validateArray;
