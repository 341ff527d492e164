import { Chain } from "../../chain/Chain";
import { ERC20Token } from "../token/ERC20Token";

/**
 * Token that calls back into `target` with `data` from inside every transfer,
 * the way a malicious token with receive hooks would.
 */
export class ReentrantERC20 extends ERC20Token {
    private hook: { target: string; data: string } | undefined;

    static factory(name: string, symbol: string, decimals = 18) {
        return (chain: Chain, address: string) => new ReentrantERC20(chain, address, name, symbol, decimals);
    }

    arm(target: string, data: string): void {
        this.hook = { target, data };
    }

    disarm(): void {
        this.hook = undefined;
    }

    protected transfer(to: string, value: bigint): boolean {
        this.reenter();
        return super.transfer(to, value);
    }

    protected transferFrom(from: string, to: string, value: bigint): boolean {
        this.reenter();
        return super.transferFrom(from, to, value);
    }

    private reenter(): void {
        if (this.hook) {
            this.chain.call(this.address, this.hook.target, this.hook.data);
        }
    }
}
