import { Interface, Result } from "ethers";
import { Chain, TransactionReceipt } from "./Chain";

/**
 * Signer-bound handle on a deployed contract: the off-chain side that encodes
 * calldata and decodes return data, like an ethers `Contract` after `connect`.
 */
export abstract class ContractClient {
    readonly interface: Interface;

    protected constructor(
        protected readonly chain: Chain,
        readonly target: string,
        contractInterface: Interface,
        readonly signer: string
    ) {
        this.interface = contractInterface;
    }

    protected send(method: string, args: readonly unknown[] = []): TransactionReceipt {
        const data = this.interface.encodeFunctionData(method, args);
        return this.chain.sendTransaction({ from: this.signer, to: this.target, data });
    }

    protected read(method: string, args: readonly unknown[] = []): Result {
        const data = this.interface.encodeFunctionData(method, args);
        const returnData = this.chain.staticCall({ from: this.signer, to: this.target, data });
        return this.interface.decodeFunctionResult(method, returnData);
    }

    protected decode(method: string, receipt: TransactionReceipt): Result {
        return this.interface.decodeFunctionResult(method, receipt.returnData);
    }
}
