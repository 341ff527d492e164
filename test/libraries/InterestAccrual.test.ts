import { expect } from "chai";
import { ZeroAddress } from "ethers";
import { Chain } from "../../chain/Chain";
import { CustomError } from "../../chain/errors";
import { DEFAULT_LEDGER_PARAMETERS, LedgerConfig } from "../../config/ledgerConfig";
import { AccountStore } from "../../contracts/libraries/AccountStore";
import { accrue, advance, settle } from "../../contracts/libraries/InterestAccrual";

describe("InterestAccrual", function () {
    let store: AccountStore;
    let config: LedgerConfig;
    let user1: string;
    const start = 1_700_000_000n;

    beforeEach(function () {
        let operator: string;
        [operator, user1] = new Chain().getSigners(2);
        config = {
            ...DEFAULT_LEDGER_PARAMETERS,
            operator,
            pausedForOperations: false,
            pausedForWithdrawals: false,
        };
        store = new AccountStore();
        store.register(user1, ZeroAddress, start, operator);
    });

    describe("accrue", function () {
        it("should pay half a day at 2% on 1000 staked as 10", function () {
            const amount = accrue({ stakedAmount: 1000n, lastClaimTime: start }, start + 43_200n, {
                dailyInterestRateBps: 2n,
            });
            expect(amount).to.equal(10n);
        });

        it("should truncate sub-unit remainders", function () {
            const amount = accrue({ stakedAmount: 999n, lastClaimTime: start }, start + 86_399n, {
                dailyInterestRateBps: 1n,
            });
            expect(amount).to.equal(9n);
        });

        it("should return zero when no time has elapsed", function () {
            expect(accrue({ stakedAmount: 1000n, lastClaimTime: start }, start, config)).to.equal(0n);
        });
    });

    describe("settle", function () {
        it("should credit accrual and restart the window", function () {
            store.update(user1, { stakedAmount: 5000n });

            const credited = settle(store, user1, start + 86_400n, config);

            expect(credited).to.equal(100n);
            expect(store.get(user1).claimableBalance).to.equal(100n);
            expect(store.get(user1).lastClaimTime).to.equal(start + 86_400n);
        });

        it("should add nothing when settled twice at the same instant", function () {
            store.update(user1, { stakedAmount: 5000n });
            settle(store, user1, start + 86_400n, config);

            expect(settle(store, user1, start + 86_400n, config)).to.equal(0n);
            expect(store.get(user1).claimableBalance).to.equal(100n);
        });

        it("should reject an account with nothing staked", function () {
            expect(() => settle(store, user1, start + 1n, config)).to.throw(CustomError, "NothingStaked");
            expect(store.get(user1).lastClaimTime).to.equal(start);
        });
    });

    it("should advance the clock of an unstaked account without crediting", function () {
        expect(advance(store, user1, start + 500n, config)).to.equal(0n);
        expect(store.get(user1).lastClaimTime).to.equal(start + 500n);
        expect(store.get(user1).claimableBalance).to.equal(0n);
    });
});
