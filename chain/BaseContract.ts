import { Interface, InterfaceAbi, Result } from "ethers";
import { Chain, ChainContract } from "./Chain";
import { ChainError, ContractRevert, CustomError } from "./errors";

/**
 * Base for contracts running on {@link Chain}. Subclasses route decoded calls
 * in `dispatch` and expose their storage through `snapshotState` /
 * `restoreState` so the chain can roll a failed transaction back.
 */
export abstract class BaseContract<S> implements ChainContract {
    readonly interface: Interface;

    protected constructor(
        protected readonly chain: Chain,
        readonly address: string,
        abi: InterfaceAbi
    ) {
        this.interface = new Interface(abi);
    }

    execute(data: string): string {
        const call = this.interface.parseTransaction({ data });
        if (!call) {
            throw new ChainError(`${this.address}: no function matches selector ${data.slice(0, 10)}`);
        }
        const result = this.guarded(() => this.dispatch(call.name, call.args));
        return this.interface.encodeFunctionResult(call.fragment, result);
    }

    checkpoint(): () => void {
        const state = this.snapshotState();
        return () => this.restoreState(state);
    }

    protected abstract dispatch(method: string, args: Result): readonly unknown[];

    protected abstract snapshotState(): S;

    protected abstract restoreState(state: S): void;

    protected get sender(): string {
        return this.chain.msgSender;
    }

    protected get now(): bigint {
        return this.chain.timestamp;
    }

    protected revert(errorName: string, ...args: unknown[]): never {
        throw new CustomError(errorName, args);
    }

    /** Runs `body`, surfacing a `CustomError` as a {@link ContractRevert} from this contract. */
    protected guarded<T>(body: () => T): T {
        try {
            return body();
        } catch (error) {
            if (error instanceof CustomError) {
                throw this.toRevert(error);
            }
            throw error;
        }
    }

    protected emit(eventName: string, ...args: unknown[]): void {
        const { topics, data } = this.interface.encodeEventLog(eventName, args);
        this.chain.emitLog({ address: this.address, topics, data });
    }

    private toRevert(error: CustomError): ContractRevert {
        const data = this.interface.encodeErrorResult(error.errorName, error.args);
        return new ContractRevert(this.address, error.errorName, error.args, data);
    }
}
