import { Result, ZeroAddress } from "ethers";
import { Chain, TransactionReceipt } from "../../chain/Chain";
import { BaseContract } from "../../chain/BaseContract";
import { ContractClient } from "../../chain/ContractClient";
import { toAddress, toBigInt } from "../../chain/abi";
import { ERC20_ABI, IERC20 } from "../interfaces/IERC20";

interface TokenState {
    totalSupply: bigint;
    balances: Map<string, bigint>;
    allowances: Map<string, Map<string, bigint>>;
}

/**
 * Plain fungible token, used for both the reward token and the stable asset.
 * The deployer is the only account allowed to mint.
 */
export class ERC20Token extends BaseContract<TokenState> {
    readonly owner: string;
    private state: TokenState = { totalSupply: 0n, balances: new Map(), allowances: new Map() };

    constructor(
        chain: Chain,
        address: string,
        readonly tokenName: string,
        readonly tokenSymbol: string,
        readonly decimals = 18
    ) {
        super(chain, address, ERC20_ABI);
        this.owner = chain.msgSender;
    }

    static factory(name: string, symbol: string, decimals = 18) {
        return (chain: Chain, address: string) => new ERC20Token(chain, address, name, symbol, decimals);
    }

    connect(signer: string): ERC20Client {
        return new ERC20Client(this.chain, this.address, signer);
    }

    protected dispatch(method: string, args: Result): readonly unknown[] {
        switch (method) {
            case "name": return [this.tokenName];
            case "symbol": return [this.tokenSymbol];
            case "decimals": return [this.decimals];
            case "totalSupply": return [this.state.totalSupply];
            case "balanceOf": return [this.balanceOf(toAddress(args[0]))];
            case "allowance": return [this.allowanceOf(toAddress(args[0]), toAddress(args[1]))];
            case "approve": return [this.approve(toAddress(args[0]), toBigInt(args[1]))];
            case "transfer": return [this.transfer(toAddress(args[0]), toBigInt(args[1]))];
            case "transferFrom":
                return [this.transferFrom(toAddress(args[0]), toAddress(args[1]), toBigInt(args[2]))];
            case "mint":
                this.mint(toAddress(args[0]), toBigInt(args[1]));
                return [];
            default:
                throw new Error(`ERC20Token: unhandled method ${method}`);
        }
    }

    protected snapshotState(): TokenState {
        return structuredClone(this.state);
    }

    protected restoreState(state: TokenState): void {
        this.state = state;
    }

    protected approve(spender: string, value: bigint): boolean {
        const owner = this.sender;
        const allowances = this.state.allowances.get(owner) ?? new Map<string, bigint>();
        allowances.set(spender, value);
        this.state.allowances.set(owner, allowances);
        this.emit("Approval", owner, spender, value);
        return true;
    }

    protected transfer(to: string, value: bigint): boolean {
        this.move(this.sender, to, value);
        return true;
    }

    protected transferFrom(from: string, to: string, value: bigint): boolean {
        const spender = this.sender;
        const allowance = this.allowanceOf(from, spender);
        if (allowance < value) {
            this.revert("ERC20InsufficientAllowance", spender, allowance, value);
        }
        this.state.allowances.get(from)?.set(spender, allowance - value);
        this.move(from, to, value);
        return true;
    }

    private mint(to: string, value: bigint): void {
        if (this.sender !== this.owner) {
            this.revert("NotOwner", this.sender);
        }
        if (to === ZeroAddress) {
            this.revert("ERC20InvalidReceiver", to);
        }
        this.state.totalSupply += value;
        this.state.balances.set(to, this.balanceOf(to) + value);
        this.emit("Transfer", ZeroAddress, to, value);
    }

    private move(from: string, to: string, value: bigint): void {
        if (to === ZeroAddress) {
            this.revert("ERC20InvalidReceiver", to);
        }
        const balance = this.balanceOf(from);
        if (balance < value) {
            this.revert("ERC20InsufficientBalance", from, balance, value);
        }
        this.state.balances.set(from, balance - value);
        this.state.balances.set(to, this.balanceOf(to) + value);
        this.emit("Transfer", from, to, value);
    }

    private balanceOf(account: string): bigint {
        return this.state.balances.get(account) ?? 0n;
    }

    private allowanceOf(owner: string, spender: string): bigint {
        return this.state.allowances.get(owner)?.get(spender) ?? 0n;
    }
}

export class ERC20Client extends ContractClient {
    constructor(chain: Chain, target: string, signer: string) {
        super(chain, target, IERC20, signer);
    }

    balanceOf(account: string): bigint {
        return toBigInt(this.read("balanceOf", [account])[0]);
    }

    allowance(owner: string, spender: string): bigint {
        return toBigInt(this.read("allowance", [owner, spender])[0]);
    }

    totalSupply(): bigint {
        return toBigInt(this.read("totalSupply")[0]);
    }

    approve(spender: string, value: bigint): TransactionReceipt {
        return this.send("approve", [spender, value]);
    }

    transfer(to: string, value: bigint): TransactionReceipt {
        return this.send("transfer", [to, value]);
    }

    transferFrom(from: string, to: string, value: bigint): TransactionReceipt {
        return this.send("transferFrom", [from, to, value]);
    }

    mint(to: string, value: bigint): TransactionReceipt {
        return this.send("mint", [to, value]);
    }
}
