/**
 * Owner capability gating every administrative transaction.
 */
export interface AccessControl {
    isOwner(account: string): boolean;
}

export class OwnerAccessControl implements AccessControl {
    constructor(private readonly owner: string) {}

    isOwner(account: string): boolean {
        return account === this.owner;
    }
}
