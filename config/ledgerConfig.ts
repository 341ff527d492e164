export const REFERRAL_LEVELS = 5;

/** Economic parameters the operator may change at any time. */
export interface LedgerParameters {
    /** Daily interest, in percent of the staked amount (divided by 100). */
    dailyInterestRateBps: bigint;
    signupBonusAmount: bigint;
    /** Stable units per 100 tokens. */
    tokenToStableRate: bigint;
    /** Permille paid to each referrer level, nearest first. */
    referralPercentTable: readonly bigint[];
}

/**
 * Everything the accounting code reads, passed explicitly into each
 * operation. `operator` receives fees and is the fallback referrer.
 */
export interface LedgerConfig extends LedgerParameters {
    operator: string;
    pausedForOperations: boolean;
    pausedForWithdrawals: boolean;
}

export const DEFAULT_LEDGER_PARAMETERS: LedgerParameters = {
    dailyInterestRateBps: 2n,
    signupBonusAmount: 100n * 10n ** 18n,
    tokenToStableRate: 100n,
    referralPercentTable: [100n, 50n, 30n, 20n, 10n],
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function parseUint(name: string, raw: string): bigint {
    const value = raw.trim();
    if (!/^\d+$/.test(value)) {
        throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(value);
}

export function validateParameters(parameters: LedgerParameters): LedgerParameters {
    if (parameters.tokenToStableRate === 0n) {
        throw new ConfigError("TOKEN_TO_STABLE_RATE must be greater than zero");
    }
    if (parameters.referralPercentTable.length !== REFERRAL_LEVELS) {
        throw new ConfigError(
            `REFERRAL_PERCENTS must have exactly ${REFERRAL_LEVELS} entries, got ${parameters.referralPercentTable.length}`
        );
    }
    return parameters;
}

/**
 * Reads deployment parameters from the environment, falling back to
 * {@link DEFAULT_LEDGER_PARAMETERS} for anything unset.
 *
 *   DAILY_INTEREST_RATE   percent per day
 *   SIGNUP_BONUS          token base units
 *   TOKEN_TO_STABLE_RATE  stable units per 100 tokens
 *   REFERRAL_PERCENTS     five comma separated permille values
 */
export function loadLedgerParameters(env: NodeJS.ProcessEnv = process.env): LedgerParameters {
    const defaults = DEFAULT_LEDGER_PARAMETERS;
    return validateParameters({
        dailyInterestRateBps: env.DAILY_INTEREST_RATE
            ? parseUint("DAILY_INTEREST_RATE", env.DAILY_INTEREST_RATE)
            : defaults.dailyInterestRateBps,
        signupBonusAmount: env.SIGNUP_BONUS
            ? parseUint("SIGNUP_BONUS", env.SIGNUP_BONUS)
            : defaults.signupBonusAmount,
        tokenToStableRate: env.TOKEN_TO_STABLE_RATE
            ? parseUint("TOKEN_TO_STABLE_RATE", env.TOKEN_TO_STABLE_RATE)
            : defaults.tokenToStableRate,
        referralPercentTable: env.REFERRAL_PERCENTS
            ? env.REFERRAL_PERCENTS.split(",").map((entry) => parseUint("REFERRAL_PERCENTS", entry))
            : defaults.referralPercentTable,
    });
}
