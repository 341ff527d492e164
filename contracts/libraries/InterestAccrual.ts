import { CustomError } from "../../chain/errors";
import { LedgerConfig } from "../../config/ledgerConfig";
import { Account, AccountStore } from "./AccountStore";

export const SECONDS_PER_DAY = 86_400n;

/**
 * Claimable amount for the window `[lastClaimTime, now)`. Sub-unit
 * remainders are dropped, not carried into the next window.
 */
export function accrue(
    account: Pick<Account, "stakedAmount" | "lastClaimTime">,
    now: bigint,
    config: Pick<LedgerConfig, "dailyInterestRateBps">
): bigint {
    if (now <= account.lastClaimTime) {
        return 0n;
    }
    const elapsed = now - account.lastClaimTime;
    return (account.stakedAmount * config.dailyInterestRateBps * elapsed) / 100n / SECONDS_PER_DAY;
}

/** Books accrual up to `now` and restarts the window. Works on unstaked accounts too. */
export function advance(store: AccountStore, identity: string, now: bigint, config: LedgerConfig): bigint {
    const account = store.get(identity);
    const amount = accrue(account, now, config);
    store.update(identity, {
        claimableBalance: account.claimableBalance + amount,
        lastClaimTime: now,
    });
    return amount;
}

export function settle(store: AccountStore, identity: string, now: bigint, config: LedgerConfig): bigint {
    if (store.get(identity).stakedAmount === 0n) {
        throw new CustomError("NothingStaked", [identity]);
    }
    return advance(store, identity, now, config);
}
