// Restores claimable balances and referrers from an exported snapshot into a
// freshly deployed ledger using the operator's setBalance.

import { ethers } from "ethers";
import * as fs from "fs";
import * as path from "path";
import { Chain } from "../chain/Chain";
import { ContractRevert } from "../chain/errors";
import { loadLedgerParameters } from "../config/ledgerConfig";
import { deployLedgerModule } from "../deploy/LedgerModule";

interface BalanceEntry {
    account: string;
    claimableBalance: bigint;
    referrer: string;
}

function parseMigrationData(raw: unknown): BalanceEntry[] {
    if (typeof raw !== "object" || raw === null || !("balances" in raw) || !Array.isArray(raw.balances)) {
        throw new Error("Migration data must contain a balances array");
    }
    return raw.balances.map((entry: unknown, index: number) => {
        if (typeof entry !== "object" || entry === null) {
            throw new Error(`balances[${index}] is not an object`);
        }
        const account = "account" in entry ? entry.account : undefined;
        const amount = "claimableBalance" in entry ? entry.claimableBalance : undefined;
        const referrer = "referrer" in entry ? entry.referrer : ethers.ZeroAddress;
        if (typeof account !== "string" || !ethers.isAddress(account)) {
            throw new Error(`balances[${index}].account is not an address`);
        }
        if (typeof amount !== "string" || !/^\d+$/.test(amount)) {
            throw new Error(`balances[${index}].claimableBalance must be a decimal string`);
        }
        if (typeof referrer !== "string" || !ethers.isAddress(referrer)) {
            throw new Error(`balances[${index}].referrer is not an address`);
        }
        return {
            account: ethers.getAddress(account),
            claimableBalance: BigInt(amount),
            referrer: ethers.getAddress(referrer),
        };
    });
}

async function main() {
    console.log("🔄 BALANCE MIGRATION SCRIPT 🔄");
    console.log("Migrating claimable balances to new ledger...\n");

    // Remove surrounding quotes if present (Windows issue)
    const migrationDataFile = (process.env.MIGRATION_DATA_FILE || "data/migration.sample.json").replace(/^["']|["']$/g, "");
    console.log(`📁 Loading migration data from: ${migrationDataFile}`);
    const entries = parseMigrationData(JSON.parse(fs.readFileSync(path.join(__dirname, migrationDataFile), "utf8")));

    const chain = new Chain();
    const [deployer] = chain.getSigners(1);
    const { ledger } = deployLedgerModule(chain, deployer, { parameters: loadLedgerParameters() });
    const operator = ledger.connect(deployer);

    console.log("\n📋 Migration Summary:");
    console.log(`New RewardLedger: ${ledger.address}`);
    console.log(`Accounts to migrate: ${entries.length}`);
    const total = entries.reduce((sum, entry) => sum + entry.claimableBalance, 0n);
    console.log(`Total claimable: ${ethers.formatEther(total)}`);

    const BATCH_SIZE = 10;
    let migrated = 0;
    const failed: string[] = [];

    for (let i = 0; i < entries.length; i += BATCH_SIZE) {
        const batch = entries.slice(i, i + BATCH_SIZE);
        console.log(`\n📦 Processing batch ${Math.floor(i / BATCH_SIZE) + 1}/${Math.ceil(entries.length / BATCH_SIZE)}`);

        for (const entry of batch) {
            console.log(`   👤 ${entry.account}: ${ethers.formatEther(entry.claimableBalance)} (referrer ${entry.referrer})`);
            try {
                const receipt = operator.setBalance(entry.account, entry.claimableBalance, entry.referrer);
                console.log(`      ✅ Included in block ${receipt.blockNumber}`);
                migrated++;
            } catch (error) {
                if (!(error instanceof ContractRevert)) {
                    throw error;
                }
                console.error(`      ❌ Reverted: ${error.message}`);
                failed.push(entry.account);
            }
        }
    }

    console.log("\n🔍 Verifying migrated balances...");
    let mismatches = 0;
    for (const entry of entries) {
        if (failed.includes(entry.account)) {
            continue;
        }
        const account = operator.getAccount(entry.account);
        if (!account.registered || account.claimableBalance !== entry.claimableBalance) {
            console.log(`   ❌ ${entry.account}: expected ${entry.claimableBalance}, found ${account.claimableBalance}`);
            mismatches++;
        }
    }

    console.log("\n📊 Migration Results:");
    console.log(`Migrated: ${migrated}/${entries.length}`);
    console.log(`Registered accounts: ${operator.registeredCount()}`);
    console.log(`Failed: ${failed.length}`);
    console.log(`Mismatches: ${mismatches}`);

    const outputDir = path.join(__dirname, "output");
    fs.mkdirSync(outputDir, { recursive: true });
    const reportFile = path.join(outputDir, `migration-report-${Date.now()}.json`);
    fs.writeFileSync(
        reportFile,
        JSON.stringify({ ledger: ledger.address, migrated, failed, mismatches, total: total.toString() }, null, 2)
    );
    console.log(`💾 Report saved to: ${reportFile}`);

    if (failed.length > 0 || mismatches > 0) {
        throw new Error("Migration finished with errors");
    }
    console.log("\n🎉 Migration completed successfully!");
}

main()
    .then(() => process.exit(0))
    .catch((error) => {
        console.error("❌ Migration failed:", error);
        process.exit(1);
    });
