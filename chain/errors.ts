/**
 * Raised by contract code to abort the current transaction with a named
 * custom error. The executing contract turns it into a {@link ContractRevert}
 * carrying the ABI-encoded revert data.
 */
export class CustomError extends Error {
    constructor(
        readonly errorName: string,
        readonly args: readonly unknown[] = []
    ) {
        super(`${errorName}(${args.map(String).join(", ")})`);
        this.name = "CustomError";
    }
}

/**
 * A reverted call as seen from outside the contract. `data` is the same
 * selector-prefixed payload a node would return, so it can be decoded with the
 * contract's `Interface.parseError`.
 */
export class ContractRevert extends Error {
    constructor(
        readonly contract: string,
        readonly errorName: string,
        readonly args: readonly unknown[],
        readonly data: string
    ) {
        super(`${contract} reverted with custom error '${errorName}(${args.map(String).join(", ")})'`);
        this.name = "ContractRevert";
    }
}

/** Misuse of the chain runtime itself: unknown addresses, clock going backwards, nested transactions. */
export class ChainError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ChainError";
    }
}
