import { ZeroAddress } from "ethers";
import { Chain, TransactionReceipt } from "../chain/Chain";
import { ContractClient } from "../chain/ContractClient";
import { toAddress, toBigInt, toBigIntArray, toBool } from "../chain/abi";
import { LedgerConfig } from "../config/ledgerConfig";
import { IRewardLedger } from "./interfaces/IRewardLedger";
import { Account } from "./libraries/AccountStore";

export interface CallResult<T> {
    receipt: TransactionReceipt;
    value: T;
}

export class RewardLedgerClient extends ContractClient {
    constructor(chain: Chain, target: string, signer: string) {
        super(chain, target, IRewardLedger, signer);
    }

    connect(signer: string): RewardLedgerClient {
        return new RewardLedgerClient(this.chain, this.target, signer);
    }

    // Views

    owner(): string {
        return toAddress(this.read("owner")[0]);
    }

    token(): string {
        return toAddress(this.read("token")[0]);
    }

    stable(): string {
        return toAddress(this.read("stable")[0]);
    }

    getAccount(account: string): Account {
        const [result] = this.read("getAccount", [account]);
        return {
            registered: toBool(result.registered),
            stakedAmount: toBigInt(result.stakedAmount),
            lastClaimTime: toBigInt(result.lastClaimTime),
            claimableBalance: toBigInt(result.claimableBalance),
            referrer: toAddress(result.referrer),
        };
    }

    getConfig(): LedgerConfig {
        const [result] = this.read("getConfig");
        return {
            operator: toAddress(result.operator),
            dailyInterestRateBps: toBigInt(result.dailyInterestRateBps),
            signupBonusAmount: toBigInt(result.signupBonusAmount),
            tokenToStableRate: toBigInt(result.tokenToStableRate),
            referralPercentTable: toBigIntArray(result.referralPercentTable),
            pausedForOperations: toBool(result.pausedForOperations),
            pausedForWithdrawals: toBool(result.pausedForWithdrawals),
        };
    }

    pendingRewards(account: string): bigint {
        return toBigInt(this.read("pendingRewards", [account])[0]);
    }

    referralRewards(account: string): bigint {
        return toBigInt(this.read("referralRewards", [account])[0]);
    }

    registeredCount(): bigint {
        return toBigInt(this.read("registeredCount")[0]);
    }

    registeredAt(index: bigint | number): string {
        return toAddress(this.read("registeredAt", [index])[0]);
    }

    totalStaked(): bigint {
        return toBigInt(this.read("totalStaked")[0]);
    }

    // User operations

    signup(referrer: string = ZeroAddress): TransactionReceipt {
        return this.send("signup", [referrer]);
    }

    swap(stableAmount: bigint): CallResult<bigint> {
        return this.sendAndDecode("swap", [stableAmount]);
    }

    stake(amount: bigint): TransactionReceipt {
        return this.send("stake", [amount]);
    }

    unstake(amount: bigint): TransactionReceipt {
        return this.send("unstake", [amount]);
    }

    claim(account: string): CallResult<bigint> {
        return this.sendAndDecode("claim", [account]);
    }

    withdrawStable(amount: bigint): TransactionReceipt {
        return this.send("withdrawStable", [amount]);
    }

    // Operator

    distributeDailyRewards(count: bigint | number): CallResult<bigint> {
        return this.sendAndDecode("distributeDailyRewards", [count]);
    }

    setDailyInterestRate(rate: bigint): TransactionReceipt {
        return this.send("setDailyInterestRate", [rate]);
    }

    setSignupBonus(amount: bigint): TransactionReceipt {
        return this.send("setSignupBonus", [amount]);
    }

    setTokenToStableRate(rate: bigint): TransactionReceipt {
        return this.send("setTokenToStableRate", [rate]);
    }

    setReferralPercentages(table: readonly bigint[]): TransactionReceipt {
        return this.send("setReferralPercentages", [table]);
    }

    setPausedForOperations(paused: boolean): TransactionReceipt {
        return this.send("setPausedForOperations", [paused]);
    }

    setPausedForWithdrawals(paused: boolean): TransactionReceipt {
        return this.send("setPausedForWithdrawals", [paused]);
    }

    setBalance(account: string, amount: bigint, referrer: string = ZeroAddress): TransactionReceipt {
        return this.send("setBalance", [account, amount, referrer]);
    }

    sweep(asset: string, to: string, amount: bigint): TransactionReceipt {
        return this.send("sweep", [asset, to, amount]);
    }

    private sendAndDecode(method: string, args: readonly unknown[]): CallResult<bigint> {
        const receipt = this.send(method, args);
        return { receipt, value: toBigInt(this.decode(method, receipt)[0]) };
    }
}
