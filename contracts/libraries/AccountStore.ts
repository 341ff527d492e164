import { ZeroAddress } from "ethers";
import { CustomError } from "../../chain/errors";

export interface Account {
    registered: boolean;
    stakedAmount: bigint;
    lastClaimTime: bigint;
    claimableBalance: bigint;
    referrer: string;
}

export interface AccountStoreState {
    accounts: Map<string, Account>;
    registry: string[];
    referralRewards: Map<string, bigint>;
}

export function emptyAccount(): Account {
    return {
        registered: false,
        stakedAmount: 0n,
        lastClaimTime: 0n,
        claimableBalance: 0n,
        referrer: ZeroAddress,
    };
}

/**
 * Absent or self referrers fall back to the operator. The operator itself
 * sits at the root of the referral tree and gets no referrer.
 */
export function resolveReferrer(identity: string, referrer: string, operator: string): string {
    const resolved = referrer === ZeroAddress || referrer === identity ? operator : referrer;
    return resolved === identity ? ZeroAddress : resolved;
}

/**
 * Per-identity account records, the append-only registry of registered
 * identities, and the cumulative referral earnings ledger.
 */
export class AccountStore {
    private state: AccountStoreState = {
        accounts: new Map(),
        registry: [],
        referralRewards: new Map(),
    };

    get(identity: string): Readonly<Account> {
        return this.state.accounts.get(identity) ?? emptyAccount();
    }

    update(identity: string, changes: Partial<Account>): Readonly<Account> {
        const next = { ...this.get(identity), ...changes };
        this.state.accounts.set(identity, next);
        return next;
    }

    register(identity: string, referrer: string, now: bigint, operator: string): Readonly<Account> {
        if (this.get(identity).registered) {
            throw new CustomError("AlreadyRegistered", [identity]);
        }
        this.state.registry.push(identity);
        return this.update(identity, {
            registered: true,
            lastClaimTime: now,
            referrer: resolveReferrer(identity, referrer, operator),
        });
    }

    /**
     * Migration path: force-sets the claimable balance and marks the account
     * registered. The referrer is only assigned when this call registers the
     * identity, and only if one is supplied.
     */
    setBalance(identity: string, amount: bigint, referrer: string, operator: string): Readonly<Account> {
        const current = this.get(identity);
        if (current.registered) {
            return this.update(identity, { claimableBalance: amount });
        }
        this.state.registry.push(identity);
        return this.update(identity, {
            registered: true,
            claimableBalance: amount,
            referrer: referrer === ZeroAddress ? ZeroAddress : resolveReferrer(identity, referrer, operator),
        });
    }

    creditReferral(identity: string, amount: bigint): void {
        this.state.referralRewards.set(identity, this.referralRewards(identity) + amount);
        const account = this.get(identity);
        this.update(identity, { claimableBalance: account.claimableBalance + amount });
    }

    referralRewards(identity: string): bigint {
        return this.state.referralRewards.get(identity) ?? 0n;
    }

    get registeredCount(): number {
        return this.state.registry.length;
    }

    registeredAt(index: number): string {
        const identity = this.state.registry[index];
        if (identity === undefined) {
            throw new CustomError("ExceedsRegistrySize", [BigInt(index), BigInt(this.state.registry.length)]);
        }
        return identity;
    }

    snapshot(): AccountStoreState {
        return structuredClone(this.state);
    }

    restore(state: AccountStoreState): void {
        this.state = state;
    }
}
