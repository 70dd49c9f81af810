/**
 * Account-keyed records are plain objects so clone-deep snapshots copy them.
 * Account names can collide with Object.prototype members (`constructor`),
 * so reads only see own keys and writes define own keys.
 */
export function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function setOwn<T>(record: Record<string, T>, key: string, value: T): void {
    Object.defineProperty(record, key, { value, writable: true, enumerable: true, configurable: true });
}
