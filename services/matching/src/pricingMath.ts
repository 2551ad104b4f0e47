import { BASE } from "./constants";
import { Ratio, mulDiv, pow10 } from "./fixedPoint";
import type { AuctionSchedule, MatchFees } from "./types";

export type DecaySchedule = Pick<
  AuctionSchedule,
  "relPremiumStart" | "relPremiumFloor" | "decayStartTime" | "decayDuration"
>;

export function currentAsk(schedule: DecaySchedule, now: number): Ratio {
  const { relPremiumStart, relPremiumFloor, decayStartTime, decayDuration } = schedule;

  if (now < decayStartTime) {
    return relPremiumStart;
  }

  const elapsed = now - decayStartTime;
  if (elapsed >= decayDuration) {
    return relPremiumFloor;
  }

  const range = relPremiumStart.wad - relPremiumFloor.wad;
  const decayed = mulDiv(range, BigInt(elapsed), BigInt(decayDuration));
  return Ratio.fromWad(relPremiumStart.wad - decayed);
}

export function convert(strike: bigint, amount: bigint, decimals: number, roundUp: boolean): bigint {
  return mulDiv(strike, amount, pow10(decimals), roundUp ? "up" : "down");
}

export function computeFees(premium: bigint, matchFeeRate: Ratio, partnerShareRate: Ratio): MatchFees {
  const total = matchFeeRate.applyTo(premium);
  const partnerFee = partnerShareRate.applyTo(total);
  return {
    total,
    protocolFee: total - partnerFee,
    partnerFee
  };
}

export function computeStrike(oracleSpot: bigint, relStrike: Ratio): bigint {
  return relStrike.applyTo(oracleSpot);
}

export interface PremiumInputs {
  relBid: Ratio;
  notional: bigint;
  oracleSpot: bigint;
  underlyingDecimals: number;
  premiumTokenIsUnderlying: boolean;
}

export function computePremium(inputs: PremiumInputs): bigint {
  if (inputs.premiumTokenIsUnderlying) {
    return inputs.relBid.applyTo(inputs.notional);
  }
  return mulDiv(
    inputs.relBid.wad * inputs.oracleSpot,
    inputs.notional,
    BASE * pow10(inputs.underlyingDecimals)
  );
}

export function capRate(rate: Ratio, max: bigint): Ratio {
  return rate.min(Ratio.fromWad(max));
}
