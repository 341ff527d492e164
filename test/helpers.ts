import { expect } from "chai";
import { LogDescription } from "ethers";
import { ChainContract, TransactionReceipt } from "../chain/Chain";
import { ContractRevert } from "../chain/errors";

/** Runs `action` and asserts it reverts with the named custom error. */
export function expectRevert(action: () => unknown, errorName: string): ContractRevert {
    try {
        action();
    } catch (error) {
        if (!(error instanceof ContractRevert)) {
            throw error;
        }
        expect(error.errorName).to.equal(errorName);
        return error;
    }
    expect.fail(`Expected transaction to be reverted with custom error '${errorName}'`);
}

/** Decoded events named `eventName` that `contract` emitted in `receipt`. */
export function parseEvents(receipt: TransactionReceipt, contract: ChainContract, eventName: string): LogDescription[] {
    return receipt.logs
        .filter((log) => log.address === contract.address)
        .map((log) => contract.interface.parseLog(log))
        .filter((parsed): parsed is LogDescription => parsed !== null && parsed.name === eventName);
}
