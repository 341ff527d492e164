import { ZeroAddress } from "ethers";
import { LedgerConfig, REFERRAL_LEVELS } from "../../config/ledgerConfig";
import { AccountStore } from "./AccountStore";

export interface ReferralCredit {
    /** 1 for the direct referrer. */
    level: number;
    referrer: string;
    amount: bigint;
}

const PERMILLE = 1000n;

/**
 * Pays `reward * table[i] / 1000` to each referrer up the chain starting at
 * `firstReferrer`. Stops at the zero address or after the last table entry,
 * whichever comes first, so cyclic chains still terminate.
 */
export function cascade(
    store: AccountStore,
    firstReferrer: string,
    reward: bigint,
    config: Pick<LedgerConfig, "referralPercentTable">
): ReferralCredit[] {
    const credits: ReferralCredit[] = [];
    const depth = Math.min(config.referralPercentTable.length, REFERRAL_LEVELS);

    let referrer = firstReferrer;
    for (let i = 0; i < depth; i++) {
        if (referrer === ZeroAddress) {
            break;
        }
        const amount = (reward * config.referralPercentTable[i]) / PERMILLE;
        store.creditReferral(referrer, amount);
        credits.push({ level: i + 1, referrer, amount });
        referrer = store.get(referrer).referrer;
    }
    return credits;
}
