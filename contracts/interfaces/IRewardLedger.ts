import { Interface } from "ethers";

const ACCOUNT_TUPLE =
    "tuple(bool registered, uint256 stakedAmount, uint64 lastClaimTime, uint256 claimableBalance, address referrer)";
const CONFIG_TUPLE =
    "tuple(address operator, uint256 dailyInterestRateBps, uint256 signupBonusAmount, uint256 tokenToStableRate, uint256[] referralPercentTable, bool pausedForOperations, bool pausedForWithdrawals)";

export const REWARD_LEDGER_ABI = [
    // Views
    "function owner() view returns (address)",
    "function token() view returns (address)",
    "function stable() view returns (address)",
    `function getAccount(address account) view returns (${ACCOUNT_TUPLE})`,
    `function getConfig() view returns (${CONFIG_TUPLE})`,
    "function pendingRewards(address account) view returns (uint256)",
    "function referralRewards(address account) view returns (uint256)",
    "function registeredCount() view returns (uint256)",
    "function registeredAt(uint256 index) view returns (address)",
    "function totalStaked() view returns (uint256)",

    // User operations
    "function signup(address referrer)",
    "function swap(uint256 stableAmount) returns (uint256 tokenAmount)",
    "function stake(uint256 amount)",
    "function unstake(uint256 amount)",
    "function claim(address account) returns (uint256 amount)",
    "function withdrawStable(uint256 amount)",

    // Operator
    "function distributeDailyRewards(uint256 count) returns (uint256 percentProcessed)",
    "function setDailyInterestRate(uint256 rate)",
    "function setSignupBonus(uint256 amount)",
    "function setTokenToStableRate(uint256 rate)",
    "function setReferralPercentages(uint256[] table)",
    "function setPausedForOperations(bool paused)",
    "function setPausedForWithdrawals(bool paused)",
    "function setBalance(address account, uint256 amount, address referrer)",
    "function sweep(address asset, address to, uint256 amount)",

    "event Signup(address indexed user, address indexed referrer, uint256 bonus)",
    "event Swap(address indexed user, uint256 stableAmount, uint256 tokenAmount, uint256 fee)",
    "event Stake(address indexed user, uint256 amount)",
    "event Unstake(address indexed user, uint256 amount, uint256 accrued)",
    "event Claim(address indexed account, address indexed caller, uint256 amount)",
    "event Withdrawal(address indexed user, uint256 amount, uint256 fee)",
    "event ReferralReward(address indexed referrer, address indexed referee, uint8 level, uint256 amount)",
    "event BalanceSet(address indexed account, uint256 amount, address referrer)",
    "event RewardsDistributed(uint256 processed, uint256 percentProcessed)",
    "event ParametersUpdated(uint256 dailyInterestRateBps, uint256 signupBonusAmount, uint256 tokenToStableRate)",
    "event ReferralTableUpdated(uint256[] table)",
    "event PauseUpdated(bool pausedForOperations, bool pausedForWithdrawals)",
    "event Swept(address indexed asset, address indexed to, uint256 amount)",

    "error AlreadyRegistered(address account)",
    "error InsufficientBalance(address account, uint256 balance, uint256 needed)",
    "error InsufficientStake(address account, uint256 staked, uint256 needed)",
    "error InsufficientClaimable(address account, uint256 claimable, uint256 needed)",
    "error NothingStaked(address account)",
    "error ExceedsRegistrySize(uint256 requested, uint256 registered)",
    "error NotOwner(address caller)",
    "error ContractCallerNotAllowed(address caller)",
    "error OperationsPaused()",
    "error WithdrawalsPaused()",
    "error ReentrantCall()",
    "error ZeroAmount()",
    "error InvalidReferralTable(uint256 length)",
    "error InvalidRate()",
    "error SafeERC20FailedOperation(address token)",
] as const;

export const IRewardLedger = new Interface(REWARD_LEDGER_ABI);
