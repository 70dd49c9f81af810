import cloneDeep from 'clone-deep';

import { StakingSnapshot } from './staking-interfaces.js';

/**
 * Durable home of the ledger state. `save` is called once per committed transaction.
 */
export interface StateStore {
    readonly name: string;
    load(): Promise<StakingSnapshot | null>;
    save(snapshot: StakingSnapshot): Promise<void>;
}

export class MemoryStateStore implements StateStore {
    readonly name = 'memory';
    private latest: StakingSnapshot | null = null;
    saves = 0;

    async load(): Promise<StakingSnapshot | null> {
        return this.latest ? cloneDeep(this.latest) : null;
    }

    async save(snapshot: StakingSnapshot): Promise<void> {
        this.latest = cloneDeep(snapshot);
        this.saves++;
    }
}
