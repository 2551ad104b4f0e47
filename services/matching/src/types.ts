import type { Address, Hex } from "viem";
import type { Ratio } from "./fixedPoint";

export type EscrowState = "Unmatched" | "Matched" | "Closed";

export interface AdvancedSettings {
  borrowCap: Ratio;
  oracle: Address;
  premiumTokenIsUnderlying: boolean;
  votingDelegationAllowed: boolean;
  allowedDelegateRegistry: Address | null;
}

export interface OptionTerms {
  readonly underlyingToken: Address;
  readonly settlementToken: Address;
  readonly notional: bigint;
  readonly strike: bigint;
  readonly expiry: number;
  readonly earliestExercise: number;
  readonly advancedSettings: Readonly<AdvancedSettings>;
}

export type AuctionTerms = Omit<OptionTerms, "strike" | "expiry" | "earliestExercise">;

export interface AuctionSchedule {
  readonly relStrike: Ratio;
  readonly relPremiumStart: Ratio;
  readonly relPremiumFloor: Ratio;
  readonly decayStartTime: number;
  readonly decayDuration: number;
  readonly minSpot: bigint;
  readonly maxSpot: bigint;
  readonly tenor: number;
  readonly earliestExerciseTenor: number;
}

export interface AuctionInitialization {
  terms: AuctionTerms;
  schedule: AuctionSchedule;
}

export interface RFQQuote {
  premium: bigint;
  validUntil: number;
  signature: Hex;
  eip1271Maker: Address | null;
}

export interface RFQInitialization {
  optionInfo: OptionTerms;
  rfqQuote: RFQQuote;
}

export interface OptionNaming {
  name: string;
  symbol: string;
}

export interface MatchFees {
  total: bigint;
  protocolFee: bigint;
  partnerFee: bigint;
}

export interface BidQuote {
  strike: bigint;
  expiry: number;
  earliestExercise: number;
  premium: bigint;
  premiumToken: Address;
  oracleSpotPrice: bigint;
  currAsk: Ratio;
  matchFeeProtocol: bigint;
  matchFeeDistPartner: bigint;
}

export type BidPreview =
  | { status: "NotAnAuction" }
  | { status: "OptionAlreadyMinted" }
  | { status: "AuctionCancelled" }
  | { status: "PremiumTooLow"; currAsk: Ratio }
  | { status: "SpotPriceTooLow"; oracleSpotPrice: bigint }
  | { status: "OutOfRangeSpotPrice"; oracleSpotPrice: bigint }
  | { status: "InsufficientFunding"; balance: bigint }
  | { status: "Success"; quote: BidQuote };

export type BidStatus = BidPreview["status"];

export interface TakeQuoteMatch {
  msgHash: Hex;
  quoter: Address;
  premium: bigint;
  premiumToken: Address;
  matchFeeProtocol: bigint;
  matchFeeDistPartner: bigint;
  terms: OptionTerms;
}

export type TakeQuotePreview =
  | { status: "Expired"; msgHash: Hex }
  | { status: "AlreadyExecuted"; msgHash: Hex }
  | { status: "InsufficientFunding"; msgHash: Hex; quoter: Address; balance: bigint }
  | { status: "QuotesPaused"; msgHash: Hex; quoter: Address }
  | { status: "InvalidQuote"; msgHash: Hex; reason: string }
  | { status: "Success"; quote: TakeQuoteMatch };

export type TakeQuoteStatus = TakeQuotePreview["status"];

export interface ExerciseResult {
  settlementToken: Address;
  settlementAmount: bigint;
  exerciseFeeAmount: bigint;
  costInUnderlying: bigint | null;
}

export interface BorrowResult {
  settlementToken: Address;
  collateralAmount: bigint;
  collateralFeeAmount: bigint;
}

export interface RepayResult {
  underlyingToken: Address;
  unlockedCollateral: bigint;
}

export interface Transfer {
  token: Address;
  from: Address;
  to: Address;
  amount: bigint;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};

export interface OracleAdapter {
  getPrice(base: Address, quote: Address, oracleData: Hex): bigint;
}

export interface MatchFeeInfo {
  matchFee: Ratio;
  distPartnerShare: Ratio;
}

export interface FeeProvider {
  getMatchFeeInfo(distPartner: Address | null): MatchFeeInfo;
  getMintFeeInfo(distPartner: Address | null): MatchFeeInfo;
  getExerciseFeeRate(): Ratio;
  feeRecipient(): Address | null;
}

export interface DelegationRegistry {
  setDelegate(holder: Address, spaceId: Hex, delegate: Address): void;
}

export interface ContractSignatureVerifier {
  isValidSignature(contract: Address, hash: Hex, signature: Hex): Promise<boolean>;
}
