import { describe, it, expect } from "vitest";
import { isEscrowError } from "../src/errors";
import { InMemoryTokenLedger } from "../src/tokenLedger";
import { ADDR, addr, codeOf } from "./helpers";

const alice = addr(0xa1);
const bob = addr(0xb0);
const carol = addr(0xc0);

function ledger(): InMemoryTokenLedger {
  const l = new InMemoryTokenLedger();
  l.registerToken({ address: ADDR.usdc, symbol: "USDC", decimals: 6 });
  return l;
}

describe("InMemoryTokenLedger", () => {
  it("refuses unknown tokens and out-of-range decimals", () => {
    const l = ledger();
    expect(codeOf(() => l.balanceOf(ADDR.weth, alice))).toBe("UnknownToken");
    expect(() => l.registerToken({ address: ADDR.weth, symbol: "WETH", decimals: 37 })).toThrow(
      "Invalid token decimals for WETH: 37"
    );
  });

  it("applies a batch against running balances", () => {
    const l = ledger();
    l.mint(ADDR.usdc, alice, 5n);

    l.settle([
      { token: ADDR.usdc, from: alice, to: bob, amount: 5n },
      { token: ADDR.usdc, from: bob, to: carol, amount: 3n }
    ]);

    expect([alice, bob, carol].map((holder) => l.balanceOf(ADDR.usdc, holder))).toEqual([0n, 2n, 3n]);
  });

  it("applies nothing when any leg is short", () => {
    const l = ledger();
    l.mint(ADDR.usdc, alice, 12n);

    let caught: unknown;
    try {
      l.settle([
        { token: ADDR.usdc, from: alice, to: bob, amount: 5n },
        { token: ADDR.usdc, from: alice, to: carol, amount: 10n }
      ]);
    } catch (error) {
      caught = error;
    }

    expect(isEscrowError(caught) ? [caught.code, caught.details] : caught).toEqual([
      "InsufficientBalance",
      { token: ADDR.usdc, holder: alice, required: "10", available: "7" }
    ]);
    expect(l.balanceOf(ADDR.usdc, alice)).toBe(12n);
    expect(l.balanceOf(ADDR.usdc, bob)).toBe(0n);
  });

  it("skips zero legs and rejects negative ones", () => {
    const l = ledger();
    l.settle([{ token: ADDR.usdc, from: alice, to: bob, amount: 0n }]);
    expect(l.balanceOf(ADDR.usdc, bob)).toBe(0n);
    expect(() => l.transfer(ADDR.usdc, alice, bob, -1n)).toThrow(RangeError);
  });

  it("records vote delegation and lists holdings", () => {
    const l = ledger();
    l.mint(ADDR.usdc, alice, 9n);
    l.delegate(ADDR.usdc, alice, bob);

    expect(l.delegateOf(ADDR.usdc, alice)).toBe(bob);
    expect(l.delegateOf(ADDR.usdc, bob)).toBeNull();
    expect(l.holdings(alice)).toEqual([{ token: { address: ADDR.usdc, symbol: "USDC", decimals: 6 }, balance: 9n }]);
  });
});
