/**
 * Length-bounded string whose first and last characters come from `edgeChars`
 * and whose inner characters come from `edgeChars` or `innerChars`.
 * Without `edgeChars` any character is accepted.
 */
const validateString = (
    value: unknown,
    maxLength: number,
    minLength: number,
    edgeChars?: string,
    innerChars = ''
): value is string => {
    if (typeof value !== 'string' || value.length > maxLength || value.length < minLength)
        return false;
    if (!edgeChars)
        return true;

    const last = value.length - 1;
    return [...value].every((char, i) => {
        if (edgeChars.includes(char))
            return true;
        return i !== 0 && i !== last && innerChars.includes(char);
    });
};

export default validateString;
