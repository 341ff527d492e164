// Deploys the reward ledger on an in-process chain, funds custody and walks
// a few demo accounts through signup, swap and stake.

import { ethers } from "ethers";
import { Chain } from "../chain/Chain";
import { ONE_DAY, time } from "../chain/time";
import { loadLedgerParameters } from "../config/ledgerConfig";
import { deployLedgerModule } from "../deploy/LedgerModule";

async function main() {
    console.log("🚀 REWARD LEDGER LOCAL DEPLOYMENT 🚀\n");

    const chain = new Chain();
    const [deployer, alice, bob, carol] = chain.getSigners(4);
    console.log("Deploying contracts with account:", deployer);

    const parameters = loadLedgerParameters();
    const custodyFunding = ethers.parseEther(process.env.CUSTODY_FUNDING || "1000000");

    const { token, stable, ledger } = deployLedgerModule(chain, deployer, { parameters, custodyFunding });
    console.log(`Reward token deployed to: ${token.address}`);
    console.log(`Stable asset deployed to: ${stable.address}`);
    console.log(`RewardLedger deployed to: ${ledger.address}`);

    const config = ledger.connect(deployer).getConfig();
    console.log("\n=== Ledger Parameters ===");
    console.log(`Operator: ${config.operator}`);
    console.log(`Daily interest rate: ${config.dailyInterestRateBps}% / 100`);
    console.log(`Signup bonus: ${ethers.formatEther(config.signupBonusAmount)} tokens`);
    console.log(`Token to stable rate: ${config.tokenToStableRate} stable per 100 tokens`);
    console.log(`Referral table (permille): ${config.referralPercentTable.join(", ")}`);

    console.log("\n👥 Signing up demo accounts...");
    ledger.connect(alice).signup();
    ledger.connect(bob).signup(alice);
    ledger.connect(carol).signup(bob);
    console.log(`✅ Registered accounts: ${ledger.connect(deployer).registeredCount()}`);

    console.log("\n💱 Carol swaps 1000 stable...");
    const swapAmount = ethers.parseEther("1000");
    stable.connect(deployer).mint(carol, swapAmount);
    stable.connect(carol).approve(ledger.address, swapAmount);
    const { value: received } = ledger.connect(carol).swap(swapAmount);
    console.log(`✅ Carol received ${ethers.formatEther(received)} tokens`);

    console.log("\n🔒 Alice stakes her signup bonus...");
    const stakeAmount = token.connect(alice).balanceOf(alice);
    token.connect(alice).approve(ledger.address, stakeAmount);
    ledger.connect(alice).stake(stakeAmount);
    time.increase(chain, ONE_DAY);
    console.log(`Pending after one day: ${ethers.formatEther(ledger.connect(alice).pendingRewards(alice))} tokens`);

    console.log("\n=== Account Summary ===");
    for (const [label, account] of [["Alice", alice], ["Bob", bob], ["Carol", carol]]) {
        const info = ledger.connect(deployer).getAccount(account);
        console.log(`\n${label} (${account})`);
        console.log(`Referrer: ${info.referrer}`);
        console.log(`Staked: ${ethers.formatEther(info.stakedAmount)} tokens`);
        console.log(`Claimable: ${ethers.formatEther(info.claimableBalance)}`);
        console.log(`Referral rewards: ${ethers.formatEther(ledger.connect(deployer).referralRewards(account))}`);
    }

    console.log("\n=== Custody ===");
    console.log(`Token custody: ${ethers.formatEther(token.connect(deployer).balanceOf(ledger.address))}`);
    console.log(`Stable custody: ${ethers.formatEther(stable.connect(deployer).balanceOf(ledger.address))}`);
    console.log(`Total staked: ${ethers.formatEther(ledger.connect(deployer).totalStaked())}`);
}

main()
    .then(() => process.exit(0))
    .catch((error) => {
        console.error(error);
        process.exit(1);
    });
