import { createHash } from 'crypto';

/**
 * Hex id derived from the joined parts, truncated to `len` characters.
 * Transaction and event ids use it so a replayed history reproduces them.
 */
export function deterministicIdFrom(parts: ReadonlyArray<string | number | bigint>, len = 16): string {
    return createHash('sha256')
        .update(parts.map(String).join('|'))
        .digest('hex')
        .slice(0, len);
}
