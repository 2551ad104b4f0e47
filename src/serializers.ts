import {
  Ratio,
  type AuctionSchedule,
  type AuctionTerms,
  type BidPreview,
  type BidQuote,
  type EscrowAccount,
  type OptionTerms,
  type RFQInitialization,
  type TakeQuoteMatch,
  type TakeQuotePreview
} from "@strikehouse/matching";
import type {
  AuctionScheduleDto,
  AuctionScheduleInput,
  AuctionTermsInput,
  BidPreviewDto,
  BidQuoteDto,
  EscrowDto,
  OptionInfoInput,
  RfqInput,
  TakeQuoteMatchDto,
  TakeQuotePreviewDto
} from "@strikehouse/shared";

export function toAuctionTerms(input: AuctionTermsInput): AuctionTerms {
  return {
    underlyingToken: input.underlyingToken,
    settlementToken: input.settlementToken,
    notional: input.notional,
    advancedSettings: {
      ...input.advancedSettings,
      borrowCap: Ratio.fromDecimal(input.advancedSettings.borrowCap)
    }
  };
}

export function toOptionTerms(input: OptionInfoInput): OptionTerms {
  return {
    ...toAuctionTerms(input),
    strike: input.strike,
    expiry: input.expiry,
    earliestExercise: input.earliestExercise
  };
}

export function toSchedule(input: AuctionScheduleInput): AuctionSchedule {
  return {
    ...input,
    relStrike: Ratio.fromDecimal(input.relStrike),
    relPremiumStart: Ratio.fromDecimal(input.relPremiumStart),
    relPremiumFloor: Ratio.fromDecimal(input.relPremiumFloor)
  };
}

export function toRfq(input: RfqInput): RFQInitialization {
  return {
    optionInfo: toOptionTerms(input.optionInfo),
    rfqQuote: input.rfqQuote
  };
}

function serializeSchedule(schedule: AuctionSchedule): AuctionScheduleDto {
  return {
    relStrike: schedule.relStrike.toString(),
    relPremiumStart: schedule.relPremiumStart.toString(),
    relPremiumFloor: schedule.relPremiumFloor.toString(),
    decayStartTime: schedule.decayStartTime,
    decayDuration: schedule.decayDuration,
    minSpot: schedule.minSpot.toString(),
    maxSpot: schedule.maxSpot.toString(),
    tenor: schedule.tenor,
    earliestExerciseTenor: schedule.earliestExerciseTenor
  };
}

export function serializeEscrow(escrow: EscrowAccount): EscrowDto {
  const snapshot = escrow.snapshot();
  const settings = snapshot.advancedSettings;
  const ask = snapshot.state === "Unmatched" ? escrow.currentAsk() : null;
  return {
    address: snapshot.address,
    state: snapshot.state,
    owner: snapshot.owner,
    optionMinted: snapshot.optionMinted,
    underlyingToken: snapshot.underlyingToken,
    settlementToken: snapshot.settlementToken,
    notional: snapshot.notional.toString(),
    strike: snapshot.strike?.toString() ?? null,
    expiry: snapshot.expiry,
    earliestExercise: snapshot.earliestExercise,
    advancedSettings: {
      borrowCap: settings.borrowCap.toString(),
      oracle: settings.oracle,
      premiumTokenIsUnderlying: settings.premiumTokenIsUnderlying,
      votingDelegationAllowed: settings.votingDelegationAllowed,
      allowedDelegateRegistry: settings.allowedDelegateRegistry
    },
    schedule: snapshot.schedule ? serializeSchedule(snapshot.schedule) : null,
    currAsk: ask?.toString() ?? null,
    distPartner: snapshot.distPartner,
    premiumPaid: snapshot.premiumPaid.toString(),
    totalBorrowed: snapshot.totalBorrowed.toString(),
    optionToken: {
      name: snapshot.optionToken.name,
      symbol: snapshot.optionToken.symbol,
      decimals: snapshot.optionToken.decimals,
      totalSupply: snapshot.optionToken.totalSupply.toString(),
      holders: snapshot.optionToken.holders.map(([holder, balance]) => ({ holder, balance: balance.toString() }))
    }
  };
}

export function serializeBidQuote(quote: BidQuote): BidQuoteDto {
  return {
    strike: quote.strike.toString(),
    expiry: quote.expiry,
    earliestExercise: quote.earliestExercise,
    premium: quote.premium.toString(),
    premiumToken: quote.premiumToken,
    oracleSpotPrice: quote.oracleSpotPrice.toString(),
    currAsk: quote.currAsk.toString(),
    matchFeeProtocol: quote.matchFeeProtocol.toString(),
    matchFeeDistPartner: quote.matchFeeDistPartner.toString()
  };
}

export function serializeBidPreview(preview: BidPreview): BidPreviewDto {
  switch (preview.status) {
    case "PremiumTooLow":
      return { status: preview.status, currAsk: preview.currAsk.toString() };
    case "SpotPriceTooLow":
    case "OutOfRangeSpotPrice":
      return { status: preview.status, oracleSpotPrice: preview.oracleSpotPrice.toString() };
    case "InsufficientFunding":
      return { status: preview.status, balance: preview.balance.toString() };
    case "Success":
      return { status: preview.status, quote: serializeBidQuote(preview.quote) };
    default:
      return { status: preview.status };
  }
}

export function serializeTakeQuoteMatch(match: TakeQuoteMatch): TakeQuoteMatchDto {
  return {
    msgHash: match.msgHash,
    quoter: match.quoter,
    premium: match.premium.toString(),
    premiumToken: match.premiumToken,
    matchFeeProtocol: match.matchFeeProtocol.toString(),
    matchFeeDistPartner: match.matchFeeDistPartner.toString()
  };
}

export function serializeTakeQuotePreview(preview: TakeQuotePreview): TakeQuotePreviewDto {
  switch (preview.status) {
    case "InsufficientFunding":
      return { ...preview, balance: preview.balance.toString() };
    case "Success":
      return { status: preview.status, quote: serializeTakeQuoteMatch(preview.quote) };
    default:
      return preview;
  }
}

/** Deep copy with bigints and ratios rendered as strings, for audit payloads and operation results. */
export function toWire(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Ratio) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toWire);
  }
  if (value !== null && typeof value === "object") {
    return toWireRecord(value);
  }
  return value;
}

export function toWireRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toWire(entry)]));
}

export function auditEventName(type: string): string {
  return type.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}
