import { Chain } from "./Chain";

export const ONE_DAY = 24n * 60n * 60n;

/**
 * Clock helpers shaped after hardhat-network-helpers' `time`. The chain clock
 * is monotonic; `increaseTo` with a past timestamp throws.
 */
export const time = {
    latest(chain: Chain): bigint {
        return chain.timestamp;
    },

    increase(chain: Chain, seconds: bigint | number): bigint {
        const delta = BigInt(seconds);
        chain.setTimestamp(chain.timestamp + delta);
        return chain.timestamp;
    },

    increaseTo(chain: Chain, timestamp: bigint | number): bigint {
        chain.setTimestamp(BigInt(timestamp));
        return chain.timestamp;
    },
};
