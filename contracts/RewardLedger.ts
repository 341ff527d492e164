import { Result, getAddress } from "ethers";
import { Chain } from "../chain/Chain";
import { BaseContract } from "../chain/BaseContract";
import { toAddress, toBigInt, toBigIntArray, toBool } from "../chain/abi";
import { LedgerConfig, LedgerParameters, REFERRAL_LEVELS } from "../config/ledgerConfig";
import { REWARD_LEDGER_ABI } from "./interfaces/IRewardLedger";
import { Account, AccountStore, AccountStoreState } from "./libraries/AccountStore";
import { accrue, advance, settle } from "./libraries/InterestAccrual";
import { cascade } from "./libraries/ReferralCascade";
import { SafeERC20, TokenLedger } from "./libraries/SafeERC20";
import { RewardLedgerClient } from "./RewardLedgerClient";

/** Share of swapped and withdrawn stable amounts forwarded to the operator. */
export const FEE_PERCENT = 5n;

export interface RewardLedgerDeployArgs {
    token: string;
    stable: string;
    parameters: LedgerParameters;
}

interface LedgerState {
    accounts: AccountStoreState;
    config: LedgerConfig;
    totalStaked: bigint;
}

/**
 * Reward-token ledger: signup bonus, stable-to-token swap with referral
 * cascade, staking with lazily accrued daily interest, and stable
 * withdrawals of the accrued balance.
 *
 * Token flow:
 *   signup          ledger  -> user      (token, bonus)
 *   swap            user    -> ledger    (stable, needs approve)
 *                   ledger  -> operator  (stable, 5% fee)
 *                   ledger  -> user      (token)
 *   stake           user    -> ledger    (token, needs approve)
 *   unstake         ledger  -> user      (token)
 *   withdrawStable  ledger  -> operator  (stable, 5% fee)
 *                   ledger  -> user      (stable)
 */
export class RewardLedger extends BaseContract<LedgerState> {
    readonly owner: string;
    readonly tokenLedger: TokenLedger;
    readonly stableLedger: TokenLedger;

    private readonly store = new AccountStore();
    private config: LedgerConfig;
    private totalStaked = 0n;
    private locked = false;

    constructor(chain: Chain, address: string, args: RewardLedgerDeployArgs) {
        super(chain, address, REWARD_LEDGER_ABI);
        this.owner = chain.msgSender;
        this.tokenLedger = new SafeERC20(chain, address, getAddress(args.token));
        this.stableLedger = new SafeERC20(chain, address, getAddress(args.stable));
        this.config = {
            ...args.parameters,
            referralPercentTable: [...args.parameters.referralPercentTable],
            operator: this.owner,
            pausedForOperations: false,
            pausedForWithdrawals: false,
        };
        this.guarded(() => {
            this.validRate(this.config.tokenToStableRate);
            this.validReferralTable(this.config.referralPercentTable);
        });
    }

    static factory(args: RewardLedgerDeployArgs) {
        return (chain: Chain, address: string) => new RewardLedger(chain, address, args);
    }

    connect(signer: string): RewardLedgerClient {
        return new RewardLedgerClient(this.chain, this.address, signer);
    }

    protected dispatch(method: string, args: Result): readonly unknown[] {
        switch (method) {
            case "owner": return [this.owner];
            case "token": return [this.tokenLedger.token];
            case "stable": return [this.stableLedger.token];
            case "getAccount": return [this.encodeAccount(this.store.get(toAddress(args[0])))];
            case "getConfig": return [this.encodeConfig()];
            case "pendingRewards": return [this.pendingRewards(toAddress(args[0]))];
            case "referralRewards": return [this.store.referralRewards(toAddress(args[0]))];
            case "registeredCount": return [BigInt(this.store.registeredCount)];
            case "registeredAt": return [this.store.registeredAt(Number(toBigInt(args[0])))];
            case "totalStaked": return [this.totalStaked];

            case "signup": return this.nonReentrant(() => this.signup(toAddress(args[0])));
            case "swap": return this.nonReentrant(() => this.swap(toBigInt(args[0])));
            case "stake": return this.nonReentrant(() => this.stake(toBigInt(args[0])));
            case "unstake": return this.nonReentrant(() => this.unstake(toBigInt(args[0])));
            case "claim": return this.nonReentrant(() => this.claim(toAddress(args[0])));
            case "withdrawStable": return this.nonReentrant(() => this.withdrawStable(toBigInt(args[0])));
            case "distributeDailyRewards":
                return this.nonReentrant(() => this.distributeDailyRewards(toBigInt(args[0])));

            case "setDailyInterestRate":
                return this.updateParameters({ dailyInterestRateBps: toBigInt(args[0]) });
            case "setSignupBonus":
                return this.updateParameters({ signupBonusAmount: toBigInt(args[0]) });
            case "setTokenToStableRate":
                return this.updateParameters({ tokenToStableRate: toBigInt(args[0]) });
            case "setReferralPercentages": return this.setReferralPercentages(toBigIntArray(args[0]));
            case "setPausedForOperations":
                return this.setPaused({ pausedForOperations: toBool(args[0]) });
            case "setPausedForWithdrawals":
                return this.setPaused({ pausedForWithdrawals: toBool(args[0]) });
            case "setBalance":
                return this.setBalance(toAddress(args[0]), toBigInt(args[1]), toAddress(args[2]));
            case "sweep": return this.sweep(toAddress(args[0]), toAddress(args[1]), toBigInt(args[2]));
            default:
                throw new Error(`RewardLedger: unhandled method ${method}`);
        }
    }

    protected snapshotState(): LedgerState {
        return { accounts: this.store.snapshot(), config: this.config, totalStaked: this.totalStaked };
    }

    protected restoreState(state: LedgerState): void {
        this.store.restore(state.accounts);
        this.config = state.config;
        this.totalStaked = state.totalStaked;
    }

    // ─── User operations ─────────────────────────────────────────────────────

    private signup(referrer: string): [] {
        this.whenOperational();
        this.onlyExternalCaller();

        const user = this.sender;
        const account = this.store.register(user, referrer, this.now, this.config.operator);
        const bonus = this.config.signupBonusAmount;
        if (bonus > 0n) {
            this.tokenLedger.transfer(user, bonus);
        }

        this.emit("Signup", user, account.referrer, bonus);
        return [];
    }

    private swap(stableAmount: bigint): [bigint] {
        this.whenOperational();
        this.onlyExternalCaller();
        this.nonZero(stableAmount);

        const user = this.sender;
        const tokenAmount = (stableAmount * 100n) / this.config.tokenToStableRate;
        const fee = (stableAmount * FEE_PERCENT) / 100n;

        this.stableLedger.transferFrom(user, this.address, stableAmount);
        this.stableLedger.transfer(this.config.operator, fee);
        this.tokenLedger.transfer(user, tokenAmount);
        this.emit("Swap", user, stableAmount, tokenAmount, fee);

        const referrer = this.store.get(user).referrer;
        for (const credit of cascade(this.store, referrer, tokenAmount, this.config)) {
            this.emit("ReferralReward", credit.referrer, user, credit.level, credit.amount);
        }
        return [tokenAmount];
    }

    private stake(amount: bigint): [] {
        this.whenOperational();
        this.onlyExternalCaller();
        this.nonZero(amount);

        const user = this.sender;
        const balance = this.tokenLedger.balanceOf(user);
        if (balance < amount) {
            this.revert("InsufficientBalance", user, balance, amount);
        }
        this.tokenLedger.transferFrom(user, this.address, amount);

        // The whole position restarts its accrual window, not just the increment.
        const account = this.store.get(user);
        this.store.update(user, { stakedAmount: account.stakedAmount + amount, lastClaimTime: this.now });
        this.totalStaked += amount;

        this.emit("Stake", user, amount);
        return [];
    }

    private unstake(amount: bigint): [] {
        this.whenOperational();
        this.onlyExternalCaller();
        this.nonZero(amount);

        const user = this.sender;
        const staked = this.store.get(user).stakedAmount;
        if (staked < amount) {
            this.revert("InsufficientStake", user, staked, amount);
        }
        const accrued = settle(this.store, user, this.now, this.config);
        this.store.update(user, { stakedAmount: staked - amount });
        this.totalStaked -= amount;
        this.tokenLedger.transfer(user, amount);

        this.emit("Unstake", user, amount, accrued);
        return [];
    }

    /** Anyone may settle on behalf of `account`. */
    private claim(account: string): [bigint] {
        this.whenOperational();
        this.onlyExternalCaller();

        const amount = settle(this.store, account, this.now, this.config);
        this.emit("Claim", account, this.sender, amount);
        return [amount];
    }

    private withdrawStable(amount: bigint): [] {
        if (this.config.pausedForWithdrawals) {
            this.revert("WithdrawalsPaused");
        }
        this.onlyExternalCaller();
        this.nonZero(amount);

        const user = this.sender;
        const claimable = this.store.get(user).claimableBalance;
        if (claimable < amount) {
            this.revert("InsufficientClaimable", user, claimable, amount);
        }
        this.store.update(user, { claimableBalance: claimable - amount });

        const fee = (amount * FEE_PERCENT) / 100n;
        this.stableLedger.transfer(this.config.operator, fee);
        this.stableLedger.transfer(user, amount - fee);

        this.emit("Withdrawal", user, amount, fee);
        return [];
    }

    // ─── Operator ────────────────────────────────────────────────────────────

    /**
     * Settles the first `count` registered accounts. There is no cursor:
     * callers that split the registry across calls pass growing counts, and
     * already settled accounts accrue nothing for the same instant.
     */
    private distributeDailyRewards(count: bigint): [bigint] {
        this.onlyOwner();

        const registered = BigInt(this.store.registeredCount);
        if (count > registered) {
            this.revert("ExceedsRegistrySize", count, registered);
        }
        for (let i = 0; i < Number(count); i++) {
            advance(this.store, this.store.registeredAt(i), this.now, this.config);
        }

        const percent = registered === 0n ? 0n : (count * 100n) / registered;
        this.emit("RewardsDistributed", count, percent);
        return [percent];
    }

    private updateParameters(changes: Partial<LedgerParameters>): [] {
        this.onlyOwner();
        if (changes.tokenToStableRate !== undefined) {
            this.validRate(changes.tokenToStableRate);
        }
        this.config = { ...this.config, ...changes };
        this.emit(
            "ParametersUpdated",
            this.config.dailyInterestRateBps,
            this.config.signupBonusAmount,
            this.config.tokenToStableRate
        );
        return [];
    }

    private setReferralPercentages(table: bigint[]): [] {
        this.onlyOwner();
        this.validReferralTable(table);
        this.config = { ...this.config, referralPercentTable: table };
        this.emit("ReferralTableUpdated", table);
        return [];
    }

    private setPaused(changes: Pick<Partial<LedgerConfig>, "pausedForOperations" | "pausedForWithdrawals">): [] {
        this.onlyOwner();
        this.config = { ...this.config, ...changes };
        this.emit("PauseUpdated", this.config.pausedForOperations, this.config.pausedForWithdrawals);
        return [];
    }

    /** Bulk migration: no accrual settlement, no bonus. */
    private setBalance(account: string, amount: bigint, referrer: string): [] {
        this.onlyOwner();
        const updated = this.store.setBalance(account, amount, referrer, this.config.operator);
        this.emit("BalanceSet", account, amount, updated.referrer);
        return [];
    }

    private sweep(asset: string, to: string, amount: bigint): [] {
        this.onlyOwner();
        new SafeERC20(this.chain, this.address, asset).transfer(to, amount);
        this.emit("Swept", asset, to, amount);
        return [];
    }

    // ─── Views & guards ──────────────────────────────────────────────────────

    private pendingRewards(identity: string): bigint {
        const account = this.store.get(identity);
        return account.stakedAmount === 0n ? 0n : accrue(account, this.now, this.config);
    }

    private encodeAccount(account: Readonly<Account>): unknown[] {
        return [
            account.registered,
            account.stakedAmount,
            account.lastClaimTime,
            account.claimableBalance,
            account.referrer,
        ];
    }

    private encodeConfig(): unknown[] {
        const config = this.config;
        return [
            config.operator,
            config.dailyInterestRateBps,
            config.signupBonusAmount,
            config.tokenToStableRate,
            config.referralPercentTable,
            config.pausedForOperations,
            config.pausedForWithdrawals,
        ];
    }

    private nonReentrant<T>(operation: () => T): T {
        if (this.locked) {
            this.revert("ReentrantCall");
        }
        this.locked = true;
        try {
            return operation();
        } finally {
            this.locked = false;
        }
    }

    private whenOperational(): void {
        if (this.config.pausedForOperations) {
            this.revert("OperationsPaused");
        }
    }

    /** Coarse filter: rejects callers with code at their address. */
    private onlyExternalCaller(): void {
        if (this.chain.hasCode(this.sender)) {
            this.revert("ContractCallerNotAllowed", this.sender);
        }
    }

    private onlyOwner(): void {
        if (this.sender !== this.owner) {
            this.revert("NotOwner", this.sender);
        }
    }

    private validRate(rate: bigint): void {
        if (rate === 0n) {
            this.revert("InvalidRate");
        }
    }

    private validReferralTable(table: readonly bigint[]): void {
        if (table.length !== REFERRAL_LEVELS) {
            this.revert("InvalidReferralTable", BigInt(table.length));
        }
    }

    private nonZero(amount: bigint): void {
        if (amount === 0n) {
            this.revert("ZeroAmount");
        }
    }
}
