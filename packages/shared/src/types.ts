/** Wire shapes returned by the HTTP service. Amounts are base-unit integer strings; ratios are decimal strings. */

export type EscrowStateDto = "Unmatched" | "Matched" | "Closed";

export interface AdvancedSettingsDto {
  borrowCap: string;
  oracle: string;
  premiumTokenIsUnderlying: boolean;
  votingDelegationAllowed: boolean;
  allowedDelegateRegistry: string | null;
}

export interface AuctionScheduleDto {
  relStrike: string;
  relPremiumStart: string;
  relPremiumFloor: string;
  decayStartTime: number;
  decayDuration: number;
  minSpot: string;
  maxSpot: string;
  tenor: number;
  earliestExerciseTenor: number;
}

export interface EscrowDto {
  address: string;
  state: EscrowStateDto;
  owner: string;
  optionMinted: boolean;
  underlyingToken: string;
  settlementToken: string;
  notional: string;
  strike: string | null;
  expiry: number | null;
  earliestExercise: number | null;
  advancedSettings: AdvancedSettingsDto;
  schedule: AuctionScheduleDto | null;
  currAsk: string | null;
  distPartner: string | null;
  premiumPaid: string;
  totalBorrowed: string;
  optionToken: {
    name: string;
    symbol: string;
    decimals: number;
    totalSupply: string;
    holders: Array<{ holder: string; balance: string }>;
  };
}

export interface BidQuoteDto {
  strike: string;
  expiry: number;
  earliestExercise: number;
  premium: string;
  premiumToken: string;
  oracleSpotPrice: string;
  currAsk: string;
  matchFeeProtocol: string;
  matchFeeDistPartner: string;
}

export type BidPreviewDto =
  | { status: "NotAnAuction" | "OptionAlreadyMinted" | "AuctionCancelled" }
  | { status: "PremiumTooLow"; currAsk: string }
  | { status: "SpotPriceTooLow" | "OutOfRangeSpotPrice"; oracleSpotPrice: string }
  | { status: "InsufficientFunding"; balance: string }
  | { status: "Success"; quote: BidQuoteDto };

export interface TakeQuoteMatchDto {
  msgHash: string;
  quoter: string;
  premium: string;
  premiumToken: string;
  matchFeeProtocol: string;
  matchFeeDistPartner: string;
}

export type TakeQuotePreviewDto =
  | { status: "Expired" | "AlreadyExecuted"; msgHash: string }
  | { status: "InsufficientFunding"; msgHash: string; quoter: string; balance: string }
  | { status: "QuotesPaused"; msgHash: string; quoter: string }
  | { status: "InvalidQuote"; msgHash: string; reason: string }
  | { status: "Success"; quote: TakeQuoteMatchDto };

export interface FeesDto {
  feeHandler: string | null;
  matchFee: string;
  exerciseFee: string;
  mintFee: string;
  distPartnerShares: Array<{ partner: string; share: string }>;
}

export interface BalanceDto {
  token: string;
  symbol: string;
  decimals: number;
  balance: string;
}

export interface ErrorReply {
  status: "error";
  reason: string;
  code?: string;
  category?: string;
  issues?: string[];
}

export interface AuditEntry {
  ts: string;
  event: string;
  payload: Record<string, unknown>;
}
