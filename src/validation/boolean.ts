/**
 * Validates boolean flags such as enabled/disabled or paused
 * @param value Value to validate
 * @returns True if the value is a boolean, false otherwise
 */
const validateBoolean = (value: unknown): value is boolean => {
    return typeof value === 'boolean';
};

export default validateBoolean;
