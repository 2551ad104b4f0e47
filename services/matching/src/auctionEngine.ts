import { Ratio } from "./fixedPoint";
import { fromAuctionMatch } from "./optionTerms";
import { computeFees, computePremium, currentAsk } from "./pricingMath";
import type { AuctionSchedule, AuctionTerms, BidPreview, BidQuote, MatchFeeInfo } from "./types";

export type MarketRejection = Extract<
  BidPreview,
  { status: "PremiumTooLow" | "SpotPriceTooLow" | "OutOfRangeSpotPrice" }
>;

export interface BidQuoteInputs {
  relBid: Ratio;
  oracleSpot: bigint;
  underlyingDecimals: number;
  fees: MatchFeeInfo;
  now: number;
}

/**
 * Dutch-auction view over one escrow's schedule. Holds no state of its own; the
 * escrow decides when the auction is open.
 */
export class AuctionEngine {
  constructor(
    readonly terms: AuctionTerms,
    readonly schedule: AuctionSchedule
  ) {}

  currentAsk(now: number): Ratio {
    return currentAsk(this.schedule, now);
  }

  checkPremium(relBid: Ratio, now: number): MarketRejection | null {
    const ask = this.currentAsk(now);
    if (relBid.lt(ask)) {
      return { status: "PremiumTooLow", currAsk: ask };
    }
    return null;
  }

  checkSpot(refSpot: bigint, oracleSpot: bigint): MarketRejection | null {
    if (refSpot < oracleSpot) {
      return { status: "SpotPriceTooLow", oracleSpotPrice: oracleSpot };
    }
    if (oracleSpot < this.schedule.minSpot || oracleSpot > this.schedule.maxSpot) {
      return { status: "OutOfRangeSpotPrice", oracleSpotPrice: oracleSpot };
    }
    return null;
  }

  checkBid(relBid: Ratio, refSpot: bigint, oracleSpot: bigint, now: number): MarketRejection | null {
    return this.checkPremium(relBid, now) ?? this.checkSpot(refSpot, oracleSpot);
  }

  bidQuote(inputs: BidQuoteInputs): BidQuote {
    const matched = fromAuctionMatch(this.terms, this.schedule, inputs.oracleSpot, inputs.now);
    const premiumTokenIsUnderlying = this.terms.advancedSettings.premiumTokenIsUnderlying;
    const premium = computePremium({
      relBid: inputs.relBid,
      notional: this.terms.notional,
      oracleSpot: inputs.oracleSpot,
      underlyingDecimals: inputs.underlyingDecimals,
      premiumTokenIsUnderlying
    });
    const fees = computeFees(premium, inputs.fees.matchFee, inputs.fees.distPartnerShare);

    return {
      strike: matched.strike,
      expiry: matched.expiry,
      earliestExercise: matched.earliestExercise,
      premium,
      premiumToken: premiumTokenIsUnderlying ? this.terms.underlyingToken : this.terms.settlementToken,
      oracleSpotPrice: inputs.oracleSpot,
      currAsk: this.currentAsk(inputs.now),
      matchFeeProtocol: fees.protocolFee,
      matchFeeDistPartner: fees.partnerFee
    };
  }

  matchTerms(oracleSpot: bigint, now: number) {
    return fromAuctionMatch(this.terms, this.schedule, oracleSpot, now);
  }
}
