import { Chain } from "../chain/Chain";
import { DEFAULT_LEDGER_PARAMETERS, LedgerParameters } from "../config/ledgerConfig";
import { RewardLedger } from "../contracts/RewardLedger";
import { ERC20Token } from "../contracts/token/ERC20Token";

export interface LedgerModuleOptions {
    parameters?: LedgerParameters;
    /** Already deployed tokens to wire in instead of fresh ones. */
    token?: ERC20Token;
    stable?: ERC20Token;
    /** Reward tokens minted straight into ledger custody for bonuses and swaps. */
    custodyFunding?: bigint;
}

export interface LedgerDeployment {
    token: ERC20Token;
    stable: ERC20Token;
    ledger: RewardLedger;
}

/**
 * Deploys reward token, stable asset and ledger from `deployer`, who becomes
 * the ledger operator and the minter of both tokens.
 */
export function deployLedgerModule(chain: Chain, deployer: string, options: LedgerModuleOptions = {}): LedgerDeployment {
    const token = options.token ?? chain.deploy(deployer, ERC20Token.factory("Reward Token", "RWD"));
    const stable = options.stable ?? chain.deploy(deployer, ERC20Token.factory("Stable Dollar", "USDS"));
    const ledger = chain.deploy(
        deployer,
        RewardLedger.factory({
            token: token.address,
            stable: stable.address,
            parameters: options.parameters ?? DEFAULT_LEDGER_PARAMETERS,
        })
    );

    const funding = options.custodyFunding ?? 0n;
    if (funding > 0n) {
        token.connect(token.owner).mint(ledger.address, funding);
    }
    return { token, stable, ledger };
}
