import { expect } from "chai";
import { ZeroAddress } from "ethers";
import { Chain } from "../../chain/Chain";
import { AccountStore } from "../../contracts/libraries/AccountStore";
import { cascade } from "../../contracts/libraries/ReferralCascade";

describe("ReferralCascade", function () {
    const config = { referralPercentTable: [100n, 50n, 30n, 20n, 10n] };
    let store: AccountStore;
    let chainOf: string[];

    beforeEach(function () {
        // chainOf[0] is the root; chainOf[i] was referred by chainOf[i - 1].
        chainOf = new Chain().getSigners(7);
        store = new AccountStore();
        chainOf.forEach((identity, i) => {
            store.register(identity, i === 0 ? ZeroAddress : chainOf[i - 1], 0n, ZeroAddress);
        });
    });

    it("should credit a single level when the referrer is the root", function () {
        const credits = cascade(store, chainOf[0], 1000n, config);

        expect(credits).to.deep.equal([{ level: 1, referrer: chainOf[0], amount: 100n }]);
        expect(store.get(chainOf[0]).claimableBalance).to.equal(100n);
        expect(store.referralRewards(chainOf[0])).to.equal(100n);
    });

    it("should pay each of five levels its share of the original reward", function () {
        const credits = cascade(store, chainOf[4], 1000n, config);

        expect(credits.map((credit) => credit.referrer)).to.deep.equal([
            chainOf[4],
            chainOf[3],
            chainOf[2],
            chainOf[1],
            chainOf[0],
        ]);
        expect(credits.map((credit) => credit.amount)).to.deep.equal([100n, 50n, 30n, 20n, 10n]);
    });

    it("should stop after five levels on a longer chain", function () {
        const credits = cascade(store, chainOf[6], 1000n, config);

        expect(credits).to.have.length(5);
        expect(credits[4].referrer).to.equal(chainOf[2]);
        expect(store.get(chainOf[1]).claimableBalance).to.equal(0n);
        expect(store.get(chainOf[0]).claimableBalance).to.equal(0n);
    });

    it("should count levels whose share truncates to zero", function () {
        const credits = cascade(store, chainOf[2], 15n, config);

        expect(credits.map((credit) => credit.amount)).to.deep.equal([1n, 0n, 0n]);
    });

    it("should credit nothing without a referrer", function () {
        expect(cascade(store, ZeroAddress, 1000n, config)).to.deep.equal([]);
    });

    it("should terminate on a referral cycle", function () {
        // Fresh identities: registration fixes the referrer for good.
        const [, , , , , , , x, y] = new Chain().getSigners(9);
        store.setBalance(x, 0n, y, ZeroAddress);
        store.setBalance(y, 0n, x, ZeroAddress);

        const credits = cascade(store, x, 1000n, config);

        expect(credits.map((credit) => credit.referrer)).to.deep.equal([x, y, x, y, x]);
        expect(store.referralRewards(x)).to.equal(140n);
        expect(store.referralRewards(y)).to.equal(70n);
    });
});
