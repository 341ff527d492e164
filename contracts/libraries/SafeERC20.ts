import { Interface } from "ethers";
import { Chain } from "../../chain/Chain";
import { CustomError } from "../../chain/errors";
import { toBigInt, toBool } from "../../chain/abi";
import { IERC20 } from "../interfaces/IERC20";

/** The slice of a fungible-token ledger the reward ledger relies on. */
export interface TokenLedger {
    readonly token: string;
    transfer(to: string, amount: bigint): void;
    transferFrom(from: string, to: string, amount: bigint): void;
    balanceOf(account: string): bigint;
}

/**
 * Calls an ERC-20 at `token` with `holder` as `msg.sender`. A `false` return
 * aborts with `SafeERC20FailedOperation`; reverts inside the token propagate
 * unchanged.
 */
export class SafeERC20 implements TokenLedger {
    constructor(
        private readonly chain: Chain,
        private readonly holder: string,
        readonly token: string,
        private readonly abi: Interface = IERC20
    ) {}

    transfer(to: string, amount: bigint): void {
        this.expectSuccess(this.call("transfer", [to, amount])[0]);
    }

    transferFrom(from: string, to: string, amount: bigint): void {
        this.expectSuccess(this.call("transferFrom", [from, to, amount])[0]);
    }

    balanceOf(account: string): bigint {
        return toBigInt(this.call("balanceOf", [account])[0]);
    }

    private call(method: string, args: readonly unknown[]) {
        const returnData = this.chain.call(this.holder, this.token, this.abi.encodeFunctionData(method, args));
        return this.abi.decodeFunctionResult(method, returnData);
    }

    private expectSuccess(result: unknown): void {
        if (!toBool(result)) {
            throw new CustomError("SafeERC20FailedOperation", [this.token]);
        }
    }
}
