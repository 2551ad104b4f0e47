import { describe, it, expect } from "vitest";
import { FeeHandler } from "../src/feeHandler";
import { Ratio } from "../src/fixedPoint";
import { ADDR, codeOf, feeHandlerWith } from "./helpers";

describe("FeeHandler", () => {
  it("rejects fees above the protocol maxima", () => {
    expect(codeOf(() => feeHandlerWith({ match: "0.21" }))).toBe("InvalidMatchFee");
    expect(codeOf(() => feeHandlerWith({ exercise: "0.006" }))).toBe("InvalidExerciseFee");
    expect(codeOf(() => feeHandlerWith({ mint: "0.3" }))).toBe("InvalidMintFee");
    expect(feeHandlerWith({ match: "0.2", exercise: "0.005", mint: "0.2" }).exerciseFee.toString()).toBe("0.005");
  });

  it("only lets the owner change fees", () => {
    const handler = feeHandlerWith({});
    expect(codeOf(() => handler.setMatchFee(ADDR.other, Ratio.fromDecimal("0.01")))).toBe("InvalidSender");

    handler.setMatchFee(ADDR.feeOwner, Ratio.fromDecimal("0.01"));
    handler.setExerciseFee(ADDR.feeOwner, Ratio.fromDecimal("0.001"));
    handler.setMintFee(ADDR.feeOwner, Ratio.fromDecimal("0.02"));
    expect([handler.matchFee, handler.exerciseFee, handler.mintFee].map(String)).toEqual(["0.01", "0.001", "0.02"]);
  });

  it("sets partner shares all at once or not at all", () => {
    const handler = feeHandlerWith({});
    const half = Ratio.fromDecimal("0.5");

    expect(codeOf(() => handler.setDistPartnerFeeShares(ADDR.feeOwner, [], []))).toBe("InvalidArrayLength");
    expect(codeOf(() => handler.setDistPartnerFeeShares(ADDR.feeOwner, [ADDR.distPartner], []))).toBe(
      "InvalidArrayLength"
    );
    expect(
      codeOf(() =>
        handler.setDistPartnerFeeShares(ADDR.feeOwner, [ADDR.distPartner, ADDR.other], [half, Ratio.fromDecimal("1.1")])
      )
    ).toBe("InvalidDistPartnerFeeShare");
    expect(handler.distPartnerFeeShare(ADDR.distPartner).isZero()).toBe(true);

    handler.setDistPartnerFeeShares(ADDR.feeOwner, [ADDR.distPartner], [half]);
    expect(handler.distPartnerFeeShare(ADDR.distPartner).eq(half)).toBe(true);
    expect(handler.distPartnerFeeShare(null).isZero()).toBe(true);
    expect(codeOf(() => handler.setDistPartnerFeeShares(ADDR.feeOwner, [ADDR.distPartner], [half]))).toBe(
      "DistPartnerFeeAlreadySet"
    );
    expect(handler.distPartnerFeeSharesList()).toEqual([[ADDR.distPartner, half]]);
  });

  it("hands control to a new owner", () => {
    const handler = new FeeHandler({
      address: ADDR.feeHandler,
      owner: ADDR.feeOwner,
      matchFee: Ratio.ZERO,
      exerciseFee: Ratio.ZERO,
      mintFee: Ratio.ZERO
    });
    handler.transferOwnership(ADDR.feeOwner, ADDR.other);

    expect(handler.owner).toBe(ADDR.other);
    expect(codeOf(() => handler.setMintFee(ADDR.feeOwner, Ratio.ZERO))).toBe("InvalidSender");
    handler.setMintFee(ADDR.other, Ratio.fromDecimal("0.1"));
    expect(handler.mintFee.toString()).toBe("0.1");
  });
});
