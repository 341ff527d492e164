export { Chain, GENESIS_TIMESTAMP } from "./chain/Chain";
export type { ChainContract, ContractFactory, Log, TransactionReceipt, TransactionRequest } from "./chain/Chain";
export { BaseContract } from "./chain/BaseContract";
export { ContractClient } from "./chain/ContractClient";
export { ChainError, ContractRevert, CustomError } from "./chain/errors";
export { ONE_DAY, time } from "./chain/time";

export {
    ConfigError,
    DEFAULT_LEDGER_PARAMETERS,
    REFERRAL_LEVELS,
    loadLedgerParameters,
    validateParameters,
} from "./config/ledgerConfig";
export type { LedgerConfig, LedgerParameters } from "./config/ledgerConfig";

export { FEE_PERCENT, RewardLedger } from "./contracts/RewardLedger";
export type { RewardLedgerDeployArgs } from "./contracts/RewardLedger";
export { RewardLedgerClient } from "./contracts/RewardLedgerClient";
export type { CallResult } from "./contracts/RewardLedgerClient";
export { ERC20Client, ERC20Token } from "./contracts/token/ERC20Token";
export { ERC20_ABI, IERC20 } from "./contracts/interfaces/IERC20";
export { IRewardLedger, REWARD_LEDGER_ABI } from "./contracts/interfaces/IRewardLedger";
export { AccountStore, emptyAccount, resolveReferrer } from "./contracts/libraries/AccountStore";
export type { Account } from "./contracts/libraries/AccountStore";
export { SECONDS_PER_DAY, accrue, advance, settle } from "./contracts/libraries/InterestAccrual";
export { cascade } from "./contracts/libraries/ReferralCascade";
export type { ReferralCredit } from "./contracts/libraries/ReferralCascade";
export { SafeERC20 } from "./contracts/libraries/SafeERC20";
export type { TokenLedger } from "./contracts/libraries/SafeERC20";

export { deployLedgerModule } from "./deploy/LedgerModule";
export type { LedgerDeployment, LedgerModuleOptions } from "./deploy/LedgerModule";
