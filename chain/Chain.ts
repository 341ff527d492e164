import { Interface, dataSlice, getAddress, getCreateAddress, id } from "ethers";
import { ChainError } from "./errors";

export interface Log {
    address: string;
    topics: readonly string[];
    data: string;
}

export interface TransactionRequest {
    from: string;
    to: string;
    data: string;
}

export interface TransactionReceipt {
    status: 1;
    from: string;
    to: string;
    blockNumber: number;
    timestamp: bigint;
    logs: Log[];
    returnData: string;
}

/**
 * What the chain needs from deployed code: ABI-encoded entry point plus a way
 * to roll its storage back when the enclosing transaction fails.
 */
export interface ChainContract {
    readonly address: string;
    readonly interface: Interface;
    execute(data: string): string;
    checkpoint(): () => void;
}

export type ContractFactory<C extends ChainContract> = (chain: Chain, address: string) => C;

export const GENESIS_TIMESTAMP = 1_700_000_000n;

/**
 * In-process chain. Transactions are serialized: one runs to completion before
 * the next starts, and a failing one leaves every contract as it found it.
 * The block timestamp only moves when told to (see `time.ts`), so two
 * transactions in a row observe the same `now`.
 */
export class Chain {
    private readonly contracts = new Map<string, ChainContract>();
    private readonly nonces = new Map<string, number>();
    private readonly frames: string[] = [];
    private pendingLogs: Log[] = [];
    private currentTimestamp: bigint;
    private currentBlock = 0;

    constructor(genesisTimestamp: bigint = GENESIS_TIMESTAMP) {
        this.currentTimestamp = genesisTimestamp;
    }

    get timestamp(): bigint {
        return this.currentTimestamp;
    }

    get blockNumber(): number {
        return this.currentBlock;
    }

    /** Immediate caller of the executing contract. */
    get msgSender(): string {
        const sender = this.frames[this.frames.length - 1];
        if (sender === undefined) {
            throw new ChainError("No call in progress");
        }
        return sender;
    }

    /** Deterministic externally owned accounts, in the spirit of `ethers.getSigners()`. */
    getSigners(count = 10): string[] {
        return Array.from({ length: count }, (_, i) => getAddress(dataSlice(id(`signer:${i}`), 12)));
    }

    hasCode(address: string): boolean {
        return this.contracts.has(getAddress(address));
    }

    getContract(address: string): ChainContract {
        const contract = this.contracts.get(getAddress(address));
        if (!contract) {
            throw new ChainError(`No contract deployed at ${address}`);
        }
        return contract;
    }

    deploy<C extends ChainContract>(from: string, factory: ContractFactory<C>): C {
        if (this.frames.length > 0) {
            throw new ChainError("A transaction is already executing");
        }
        const deployer = getAddress(from);
        const address = getCreateAddress({ from: deployer, nonce: this.useNonce(deployer) });

        this.frames.push(deployer);
        let contract: C;
        try {
            contract = factory(this, address);
        } finally {
            this.frames.pop();
            this.pendingLogs = [];
        }

        this.contracts.set(address, contract);
        this.currentBlock++;
        return contract;
    }

    sendTransaction(request: TransactionRequest): TransactionReceipt {
        if (this.frames.length > 0) {
            throw new ChainError("A transaction is already executing");
        }
        const from = getAddress(request.from);
        if (this.hasCode(from)) {
            throw new ChainError(`Sender ${from} is a contract`);
        }
        this.useNonce(from);

        const restores = [...this.contracts.values()].map((contract) => contract.checkpoint());
        this.pendingLogs = [];
        try {
            const returnData = this.call(from, request.to, request.data);
            this.currentBlock++;
            return {
                status: 1,
                from,
                to: getAddress(request.to),
                blockNumber: this.currentBlock,
                timestamp: this.currentTimestamp,
                logs: this.pendingLogs,
                returnData,
            };
        } catch (error) {
            for (const restore of restores) {
                restore();
            }
            throw error;
        } finally {
            this.pendingLogs = [];
        }
    }

    /** Read-only call; whatever the callee writes is discarded. */
    staticCall(request: TransactionRequest): string {
        const restores = [...this.contracts.values()].map((contract) => contract.checkpoint());
        try {
            return this.call(request.from, request.to, request.data);
        } finally {
            for (const restore of restores) {
                restore();
            }
            this.pendingLogs = [];
        }
    }

    /** Message call, used for the top-level call and for contract-to-contract calls. */
    call(from: string, to: string, data: string): string {
        const target = this.getContract(to);
        this.frames.push(getAddress(from));
        try {
            return target.execute(data);
        } finally {
            this.frames.pop();
        }
    }

    emitLog(log: Log): void {
        this.pendingLogs.push(log);
    }

    setTimestamp(timestamp: bigint): void {
        if (timestamp < this.currentTimestamp) {
            throw new ChainError(
                `Timestamp ${timestamp} is lower than the current timestamp ${this.currentTimestamp}`
            );
        }
        this.currentTimestamp = timestamp;
    }

    private useNonce(account: string): number {
        const nonce = this.nonces.get(account) ?? 0;
        this.nonces.set(account, nonce + 1);
        return nonce;
    }
}
