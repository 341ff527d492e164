import { expect } from "chai";
import { ZeroAddress } from "ethers";
import { Chain } from "../../chain/Chain";
import { CustomError } from "../../chain/errors";
import { AccountStore, resolveReferrer } from "../../contracts/libraries/AccountStore";

describe("AccountStore", function () {
    let store: AccountStore;
    let operator: string;
    let user1: string;
    let user2: string;
    const now = 1_700_000_000n;

    beforeEach(function () {
        [operator, user1, user2] = new Chain().getSigners(3);
        store = new AccountStore();
    });

    describe("resolveReferrer", function () {
        it("should fall back to the operator when no referrer is given", function () {
            expect(resolveReferrer(user1, ZeroAddress, operator)).to.equal(operator);
        });

        it("should fall back to the operator on self-referral", function () {
            expect(resolveReferrer(user1, user1, operator)).to.equal(operator);
        });

        it("should keep a distinct referrer", function () {
            expect(resolveReferrer(user1, user2, operator)).to.equal(user2);
        });

        it("should leave the operator without a referrer", function () {
            expect(resolveReferrer(operator, ZeroAddress, operator)).to.equal(ZeroAddress);
            expect(resolveReferrer(operator, operator, operator)).to.equal(ZeroAddress);
        });
    });

    describe("register", function () {
        it("should create the account and append it to the registry", function () {
            const account = store.register(user1, user2, now, operator);

            expect(account).to.deep.equal({
                registered: true,
                stakedAmount: 0n,
                lastClaimTime: now,
                claimableBalance: 0n,
                referrer: user2,
            });
            expect(store.registeredCount).to.equal(1);
            expect(store.registeredAt(0)).to.equal(user1);
        });

        it("should reject a second registration without touching state", function () {
            store.register(user1, ZeroAddress, now, operator);

            expect(() => store.register(user1, user2, now + 10n, operator)).to.throw(
                CustomError,
                "AlreadyRegistered"
            );
            expect(store.registeredCount).to.equal(1);
            expect(store.get(user1).referrer).to.equal(operator);
            expect(store.get(user1).lastClaimTime).to.equal(now);
        });
    });

    describe("setBalance", function () {
        it("should register a new identity without stamping the clock", function () {
            const account = store.setBalance(user1, 500n, ZeroAddress, operator);

            expect(account.registered).to.equal(true);
            expect(account.claimableBalance).to.equal(500n);
            expect(account.lastClaimTime).to.equal(0n);
            expect(account.referrer).to.equal(ZeroAddress);
            expect(store.registeredCount).to.equal(1);
        });

        it("should not append an already registered identity twice", function () {
            store.register(user1, user2, now, operator);
            store.setBalance(user1, 42n, ZeroAddress, operator);

            expect(store.registeredCount).to.equal(1);
            expect(store.get(user1).claimableBalance).to.equal(42n);
            expect(store.get(user1).referrer).to.equal(user2);
        });

        it("should apply the self-referral fallback to a supplied referrer", function () {
            store.setBalance(user1, 1n, user1, operator);

            expect(store.get(user1).referrer).to.equal(operator);
        });

        it("should never replace the referrer of a registered identity", function () {
            store.setBalance(user1, 1n, user2, operator);
            store.setBalance(user1, 2n, operator, operator);

            expect(store.get(user1).referrer).to.equal(user2);
            expect(store.get(user1).claimableBalance).to.equal(2n);
        });
    });

    it("should track referral rewards separately from the claimable balance", function () {
        store.setBalance(user1, 100n, ZeroAddress, operator);
        store.creditReferral(user1, 25n);
        store.creditReferral(user1, 5n);

        expect(store.referralRewards(user1)).to.equal(30n);
        expect(store.get(user1).claimableBalance).to.equal(130n);
    });

    it("should restore a snapshot", function () {
        store.register(user1, ZeroAddress, now, operator);
        const snapshot = store.snapshot();

        store.register(user2, user1, now, operator);
        store.creditReferral(user1, 7n);
        store.restore(snapshot);

        expect(store.registeredCount).to.equal(1);
        expect(store.get(user2).registered).to.equal(false);
        expect(store.referralRewards(user1)).to.equal(0n);
    });

    it("should reject registry reads past the end", function () {
        expect(() => store.registeredAt(0)).to.throw(CustomError, "ExceedsRegistrySize");
    });
});
