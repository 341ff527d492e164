import { getAddress } from "ethers";

// Narrowing for values coming out of ethers `Result`s, which are untyped.

export function toBigInt(value: unknown): bigint {
    if (typeof value !== "bigint") {
        throw new TypeError(`Expected a uint value, got ${typeof value}`);
    }
    return value;
}

export function toBool(value: unknown): boolean {
    if (typeof value !== "boolean") {
        throw new TypeError(`Expected a bool value, got ${typeof value}`);
    }
    return value;
}

export function toAddress(value: unknown): string {
    if (typeof value !== "string") {
        throw new TypeError(`Expected an address value, got ${typeof value}`);
    }
    return getAddress(value);
}

export function toBigIntArray(value: unknown): bigint[] {
    if (!Array.isArray(value)) {
        throw new TypeError(`Expected a uint[] value, got ${typeof value}`);
    }
    return Array.from(value, toBigInt);
}
