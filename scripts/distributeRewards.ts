// Runs the operator's daily sweep over the registry in batches. Each call
// takes a growing prefix count, since the ledger keeps no cursor.

import { ethers } from "ethers";
import { Chain } from "../chain/Chain";
import { ONE_DAY, time } from "../chain/time";
import { loadLedgerParameters } from "../config/ledgerConfig";
import { deployLedgerModule } from "../deploy/LedgerModule";

async function main() {
    console.log("📅 DAILY REWARD DISTRIBUTION 📅\n");

    const batchSize = BigInt(process.env.BATCH_SIZE || "25");
    const accountCount = Number(process.env.DEMO_ACCOUNTS || "60");
    if (batchSize <= 0n) {
        throw new Error("BATCH_SIZE must be greater than zero");
    }

    const chain = new Chain();
    const [deployer, ...users] = chain.getSigners(accountCount + 1);
    const { token, ledger } = deployLedgerModule(chain, deployer, {
        parameters: loadLedgerParameters(),
        custodyFunding: ethers.parseEther("1000000"),
    });
    const operator = ledger.connect(deployer);

    console.log(`👥 Registering ${users.length} accounts, every other one staking...`);
    users.forEach((user, index) => {
        ledger.connect(user).signup();
        if (index % 2 === 0) {
            const balance = token.connect(user).balanceOf(user);
            token.connect(user).approve(ledger.address, balance);
            ledger.connect(user).stake(balance);
        }
    });

    time.increase(chain, ONE_DAY);
    console.log(`⏩ Advanced clock to ${new Date(Number(time.latest(chain)) * 1000).toISOString()}`);

    const registered = operator.registeredCount();
    console.log(`\nRegistered accounts: ${registered}`);
    console.log(`Batch size: ${batchSize}`);

    for (let count = batchSize; ; count += batchSize) {
        const target = count < registered ? count : registered;
        const { value: percent } = operator.distributeDailyRewards(target);
        console.log(`   ✅ Settled first ${target} accounts (${percent}%)`);
        if (target === registered) {
            break;
        }
    }

    const credited = users.reduce((sum, user) => sum + operator.getAccount(user).claimableBalance, 0n);
    console.log(`\n📊 Total credited: ${ethers.formatEther(credited)} tokens`);
    console.log(`Total staked: ${ethers.formatEther(operator.totalStaked())} tokens`);
}

main()
    .then(() => process.exit(0))
    .catch((error) => {
        console.error(error);
        process.exit(1);
    });
