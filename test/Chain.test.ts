import { expect } from "chai";
import { getCreateAddress } from "ethers";
import { Chain, GENESIS_TIMESTAMP } from "../chain/Chain";
import { ChainError } from "../chain/errors";
import { ONE_DAY, time } from "../chain/time";
import { IERC20 } from "../contracts/interfaces/IERC20";
import { CallForwarder } from "../contracts/mocks/CallForwarder";
import { ERC20Token } from "../contracts/token/ERC20Token";
import { expectRevert } from "./helpers";

describe("Chain", function () {
    let chain: Chain;
    let owner: string;
    let user1: string;
    let user2: string;
    let token: ERC20Token;

    beforeEach(function () {
        chain = new Chain();
        [owner, user1, user2] = chain.getSigners(3);
        token = chain.deploy(owner, ERC20Token.factory("Test Token", "TST"));
        token.connect(owner).mint(user1, 1000n);
    });

    it("should derive contract addresses from deployer and nonce", function () {
        expect(token.address).to.equal(getCreateAddress({ from: owner, nonce: 0 }));

        const second = chain.deploy(owner, ERC20Token.factory("Second", "SND"));
        // nonce 1 went to the mint transaction
        expect(second.address).to.equal(getCreateAddress({ from: owner, nonce: 2 }));
    });

    it("should hand out distinct deterministic signers", function () {
        const signers = chain.getSigners(5);

        expect(new Set(signers).size).to.equal(5);
        expect(new Chain().getSigners(5)).to.deep.equal(signers);
    });

    it("should return a receipt with the emitted logs", function () {
        const receipt = token.connect(user1).transfer(user2, 10n);

        expect(receipt.status).to.equal(1);
        expect(receipt.from).to.equal(user1);
        expect(receipt.logs).to.have.length(1);
        expect(receipt.blockNumber).to.equal(chain.blockNumber);
    });

    it("should roll every contract back when a transaction fails", function () {
        const client = token.connect(user1);

        expectRevert(() => client.transfer(user2, 5000n), "ERC20InsufficientBalance");

        expect(client.balanceOf(user1)).to.equal(1000n);
        expect(client.balanceOf(user2)).to.equal(0n);
    });

    it("should discard writes made during a static call", function () {
        const data = IERC20.encodeFunctionData("transfer", [user2, 10n]);
        chain.staticCall({ from: user1, to: token.address, data });

        expect(token.connect(user1).balanceOf(user2)).to.equal(0n);
    });

    it("should refuse transactions sent from a contract address", function () {
        const forwarder = chain.deploy(owner, CallForwarder.factory());
        const data = IERC20.encodeFunctionData("transfer", [user2, 1n]);

        expect(() => chain.sendTransaction({ from: forwarder.address, to: token.address, data })).to.throw(
            ChainError,
            "is a contract"
        );
    });

    it("should refuse calls to an address without code", function () {
        const data = IERC20.encodeFunctionData("transfer", [user2, 1n]);

        expect(() => chain.sendTransaction({ from: user1, to: user2, data })).to.throw(
            ChainError,
            "No contract deployed"
        );
    });

    it("should refuse to deploy while a call is executing", function () {
        const nested = (inner: Chain, address: string) => {
            inner.deploy(owner, ERC20Token.factory("Inner", "INR"));
            return new ERC20Token(inner, address, "Outer", "OUT");
        };

        expect(() => chain.deploy(owner, nested)).to.throw(ChainError, "already executing");
    });

    it("should only move time when told to", function () {
        expect(time.latest(chain)).to.equal(GENESIS_TIMESTAMP);

        token.connect(user1).transfer(user2, 1n);
        expect(time.latest(chain)).to.equal(GENESIS_TIMESTAMP);

        time.increase(chain, ONE_DAY);
        expect(time.latest(chain)).to.equal(GENESIS_TIMESTAMP + 86_400n);
    });

    it("should reject moving the clock backwards", function () {
        time.increase(chain, 100);

        expect(() => time.increaseTo(chain, GENESIS_TIMESTAMP)).to.throw(ChainError, "lower than the current");
        expect(() => time.increase(chain, -1)).to.throw(ChainError);
    });
});
