import { expect } from "chai";
import { ZeroAddress } from "ethers";
import { Chain } from "../chain/Chain";
import { ERC20Token } from "../contracts/token/ERC20Token";
import { expectRevert, parseEvents } from "./helpers";

describe("ERC20Token", function () {
    let chain: Chain;
    let token: ERC20Token;
    let owner: string;
    let user1: string;
    let user2: string;
    let spender: string;

    beforeEach(function () {
        chain = new Chain();
        [owner, user1, user2, spender] = chain.getSigners(4);
        token = chain.deploy(owner, ERC20Token.factory("Stable Dollar", "USDS", 6));
        token.connect(owner).mint(user1, 1_000n);
    });

    it("should let only the deployer mint", function () {
        expect(token.connect(owner).totalSupply()).to.equal(1_000n);

        const revert = expectRevert(() => token.connect(user1).mint(user1, 1n), "NotOwner");
        expect(revert.args).to.deep.equal([user1]);
    });

    it("should move balances and emit Transfer", function () {
        const receipt = token.connect(user1).transfer(user2, 400n);

        const [event] = parseEvents(receipt, token, "Transfer");
        expect(event.args.from).to.equal(user1);
        expect(event.args.to).to.equal(user2);
        expect(event.args.value).to.equal(400n);
        expect(token.connect(user1).balanceOf(user1)).to.equal(600n);
        expect(token.connect(user1).balanceOf(user2)).to.equal(400n);
    });

    it("should reject transfers above the balance", function () {
        const revert = expectRevert(() => token.connect(user1).transfer(user2, 1_001n), "ERC20InsufficientBalance");

        expect(revert.args).to.deep.equal([user1, 1_000n, 1_001n]);
    });

    it("should reject transfers to the zero address", function () {
        expectRevert(() => token.connect(user1).transfer(ZeroAddress, 1n), "ERC20InvalidReceiver");
    });

    it("should spend allowances in transferFrom", function () {
        token.connect(user1).approve(spender, 300n);

        token.connect(spender).transferFrom(user1, user2, 200n);

        expect(token.connect(user1).allowance(user1, spender)).to.equal(100n);
        expect(token.connect(user1).balanceOf(user2)).to.equal(200n);
    });

    it("should reject transferFrom above the allowance", function () {
        token.connect(user1).approve(spender, 50n);

        const revert = expectRevert(
            () => token.connect(spender).transferFrom(user1, user2, 51n),
            "ERC20InsufficientAllowance"
        );
        expect(revert.args).to.deep.equal([spender, 50n, 51n]);
        expect(token.connect(user1).allowance(user1, spender)).to.equal(50n);
    });
});
