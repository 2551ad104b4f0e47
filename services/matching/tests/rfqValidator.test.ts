import { describe, it, expect } from "vitest";
import { keccak256, toHex, type Address } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { Ratio } from "../src/fixedPoint";
import { RFQValidator, rfqSignaturePayload } from "../src/rfqValidator";
import type { OptionTerms, RFQInitialization } from "../src/types";
import { ADDR, T0, USDC_UNIT, WAD, asyncCodeOf, feeHandlerWith, optionInfo, setupMarket, type Market } from "./helpers";
import { MockContractWallets } from "./mocks/mockContractWallet";

const CHAIN_ID = 31337;
const PREMIUM = 500n * USDC_UNIT;
const quoter = privateKeyToAccount(keccak256(toHex("test-quoter")));
const UNRECOVERABLE = `0x${"00".repeat(65)}` as const;

interface QuoteOverrides {
  optionInfo?: OptionTerms;
  premium?: bigint;
  validUntil?: number;
  eip1271Maker?: Address | null;
  chainId?: number;
}

async function signedQuote(overrides: QuoteOverrides = {}): Promise<RFQInitialization> {
  const unsigned: RFQInitialization = {
    optionInfo: overrides.optionInfo ?? optionInfo(),
    rfqQuote: {
      premium: overrides.premium ?? PREMIUM,
      validUntil: overrides.validUntil ?? T0 + 3600,
      signature: "0x",
      eip1271Maker: overrides.eip1271Maker ?? null
    }
  };
  const payload = rfqSignaturePayload(unsigned, overrides.chainId ?? CHAIN_ID);
  const signature = await quoter.signMessage({ message: { raw: payload } });
  return { ...unsigned, rfqQuote: { ...unsigned.rfqQuote, signature } };
}

function fund(market: Market, holder: Address = quoter.address): void {
  market.ledger.mint(ADDR.weth, ADDR.owner, 100n * WAD);
  market.ledger.mint(ADDR.usdc, holder, PREMIUM);
}

function take(market: Market, rfq: RFQInitialization, distPartner: Address | null = null) {
  return market.router.takeQuote(ADDR.owner, { escrowOwner: ADDR.owner, rfq, distPartner });
}

describe("recovering the quoter", () => {
  it("recovers the signer of the quote payload", async () => {
    const rfq = await signedQuote();
    const recovery = await new RFQValidator(CHAIN_ID).recoverQuoter(rfq);

    expect(recovery).toEqual({ ok: true, msgHash: rfqSignaturePayload(rfq, CHAIN_ID), quoter: quoter.address });
  });

  it("binds the signature to the chain", async () => {
    const rfq = await signedQuote({ chainId: 1 });
    const recovery = await new RFQValidator(CHAIN_ID).recoverQuoter(rfq);

    expect(recovery.ok).toBe(true);
    expect(recovery.ok ? recovery.quoter : null).not.toBe(quoter.address);
  });

  it("reports an unrecoverable signature", async () => {
    const rfq = await signedQuote();
    const recovery = await new RFQValidator(CHAIN_ID).recoverQuoter({
      ...rfq,
      rfqQuote: { ...rfq.rfqQuote, signature: UNRECOVERABLE }
    });

    expect(recovery.ok).toBe(false);
    expect(recovery.ok ? null : recovery.reason).toMatch(/^Unrecoverable signature/);
  });

  it("toggles a quoter's pause flag", () => {
    const validator = new RFQValidator(CHAIN_ID);
    expect(validator.togglePause(quoter.address)).toBe(true);
    expect(validator.isPaused(quoter.address)).toBe(true);
    expect(validator.togglePause(quoter.address)).toBe(false);
    expect(validator.isPaused(quoter.address)).toBe(false);
  });
});

describe("previewTakeQuote", () => {
  it("checks expiry first, inclusive of validUntil", async () => {
    const market = setupMarket();
    const rfq = await signedQuote();
    const msgHash = rfqSignaturePayload(rfq, CHAIN_ID);

    market.clock.set(T0 + 3601);
    expect(await market.router.previewTakeQuote(rfq, null)).toEqual({ status: "Expired", msgHash });

    market.clock.set(T0 + 3600);
    fund(market);
    expect((await market.router.previewTakeQuote(rfq, null)).status).toBe("Success");
  });

  it("reports the quoter's balance when the premium is not covered", async () => {
    const market = setupMarket();
    const rfq = await signedQuote();

    expect(await market.router.previewTakeQuote(rfq, null)).toEqual({
      status: "InsufficientFunding",
      msgHash: rfqSignaturePayload(rfq, CHAIN_ID),
      quoter: quoter.address,
      balance: 0n
    });
  });

  it("reports paused quoters after the funding check", async () => {
    const market = setupMarket();
    const rfq = await signedQuote();
    market.router.togglePauseQuotes(quoter.address);

    expect((await market.router.previewTakeQuote(rfq, null)).status).toBe("InsufficientFunding");
    fund(market);
    expect((await market.router.previewTakeQuote(rfq, null)).status).toBe("QuotesPaused");
  });

  it("rejects quotes with malformed terms or signatures", async () => {
    const market = setupMarket();
    fund(market);

    const stale = await signedQuote({ optionInfo: optionInfo({ expiry: T0 }) });
    const staleTerms = await market.router.previewTakeQuote(stale, null);
    expect(staleTerms).toEqual({ status: "InvalidQuote", msgHash: rfqSignaturePayload(stale, CHAIN_ID), reason: "InvalidExpiry" });

    const rfq = await signedQuote();
    const unsigned = await market.router.previewTakeQuote(
      { ...rfq, rfqQuote: { ...rfq.rfqQuote, signature: UNRECOVERABLE } },
      null
    );
    expect(unsigned.status).toBe("InvalidQuote");
  });

  it("quotes the match fee split", async () => {
    const market = setupMarket();
    const handler = feeHandlerWith({ match: "0.002" });
    market.router.setFeeHandler(ADDR.routerOwner, handler);
    handler.setDistPartnerFeeShares(ADDR.feeOwner, [ADDR.distPartner], [Ratio.fromDecimal("0.25")]);
    fund(market);

    const preview = await market.router.previewTakeQuote(await signedQuote(), ADDR.distPartner);
    expect(preview.status === "Success" ? [preview.quote.matchFeeProtocol, preview.quote.matchFeeDistPartner] : null).toEqual([
      750_000n,
      250_000n
    ]);
  });
});

describe("takeQuote", () => {
  it("opens a matched escrow and pays the premium to its owner", async () => {
    const market = setupMarket();
    fund(market);
    const rfq = await signedQuote();

    const { escrow, match } = await take(market, rfq);

    expect(match.quoter).toBe(quoter.address);
    expect(escrow.state).toBe("Matched");
    expect(escrow.owner).toBe(ADDR.owner);
    expect(escrow.terms?.strike).toBe(2400n * USDC_UNIT);
    expect(escrow.premiumPaid).toBe(PREMIUM);
    expect(escrow.optionToken.balanceOf(quoter.address)).toBe(100n * WAD);
    expect(market.ledger.balanceOf(ADDR.usdc, ADDR.owner)).toBe(PREMIUM);
    expect(market.ledger.balanceOf(ADDR.usdc, quoter.address)).toBe(0n);
    expect(market.ledger.balanceOf(ADDR.weth, escrow.address)).toBe(100n * WAD);
    expect(market.router.isQuoteExecuted(match.msgHash)).toBe(true);
  });

  it("refuses to execute the same quote twice", async () => {
    const market = setupMarket();
    fund(market);
    const rfq = await signedQuote();
    await take(market, rfq);
    fund(market);

    expect(await asyncCodeOf(() => take(market, rfq))).toBe("QuoteAlreadyExecuted");
    expect((await market.router.previewTakeQuote(rfq, null)).status).toBe("AlreadyExecuted");
    expect(market.router.numEscrows()).toBe(1);
  });

  it("maps preview rejections to errors", async () => {
    const market = setupMarket();
    const rfq = await signedQuote();

    expect(await asyncCodeOf(() => take(market, rfq))).toBe("InsufficientFunding");
    market.clock.set(T0 + 3601);
    expect(await asyncCodeOf(() => take(market, rfq))).toBe("QuoteExpired");
  });

  it("leaves the quote usable when the taker cannot fund notional", async () => {
    const market = setupMarket();
    market.ledger.mint(ADDR.usdc, quoter.address, PREMIUM);
    const rfq = await signedQuote();

    expect(await asyncCodeOf(() => take(market, rfq))).toBe("InsufficientBalance");
    expect(market.router.isQuoteExecuted(rfqSignaturePayload(rfq, CHAIN_ID))).toBe(false);
    expect(market.router.numEscrows()).toBe(0);
    expect(market.ledger.balanceOf(ADDR.usdc, quoter.address)).toBe(PREMIUM);
  });

  it("accepts quotes signed on behalf of a contract wallet", async () => {
    const wallets = new MockContractWallets();
    wallets.deploy(ADDR.other, quoter.address);
    const market = setupMarket({ contractSigners: wallets });
    fund(market, ADDR.other);

    const { escrow, match } = await take(market, await signedQuote({ eip1271Maker: ADDR.other }));

    expect(match.quoter).toBe(ADDR.other);
    expect(escrow.optionToken.balanceOf(ADDR.other)).toBe(100n * WAD);
  });

  it("rejects contract-wallet quotes the wallet does not accept", async () => {
    const wallets = new MockContractWallets();
    const market = setupMarket({ contractSigners: wallets });
    fund(market, ADDR.other);
    const rfq = await signedQuote({ eip1271Maker: ADDR.other });

    expect(await market.router.previewTakeQuote(rfq, null)).toEqual({
      status: "InvalidQuote",
      msgHash: rfqSignaturePayload(rfq, CHAIN_ID),
      reason: "Invalid EIP-1271 signature"
    });
    expect((await setupMarket().router.previewTakeQuote(rfq, null)).status).toBe("InvalidQuote");
  });
});
