import { Interface, Result, getBytes, hexlify } from "ethers";
import { Chain } from "../../chain/Chain";
import { BaseContract } from "../../chain/BaseContract";
import { toAddress } from "../../chain/abi";

export const CALL_FORWARDER_ABI = ["function forward(address target, bytes data) returns (bytes)"] as const;

/** Relays arbitrary calldata, so the target sees a contract as `msg.sender`. */
export class CallForwarder extends BaseContract<null> {
    constructor(chain: Chain, address: string) {
        super(chain, address, CALL_FORWARDER_ABI);
    }

    static factory() {
        return (chain: Chain, address: string) => new CallForwarder(chain, address);
    }

    static encodeForward(target: string, data: string): string {
        return new Interface(CALL_FORWARDER_ABI).encodeFunctionData("forward", [target, getBytes(data)]);
    }

    protected dispatch(method: string, args: Result): readonly unknown[] {
        if (method !== "forward") {
            throw new Error(`CallForwarder: unhandled method ${method}`);
        }
        const data = args[1];
        if (typeof data !== "string") {
            throw new TypeError("CallForwarder: expected bytes calldata");
        }
        return [this.chain.call(this.address, toAddress(args[0]), hexlify(data))];
    }

    protected snapshotState(): null {
        return null;
    }

    protected restoreState(): void {}
}
