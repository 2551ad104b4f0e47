export type EscrowErrorCategory =
  | "term-validation"
  | "authorization"
  | "state-mismatch"
  | "temporal"
  | "market"
  | "solvency"
  | "replay"
  | "configuration"
  | "oracle";

const ERROR_CATEGORIES = {
  InvalidTokenPair: "term-validation",
  InvalidNotional: "term-validation",
  InvalidStrike: "term-validation",
  InvalidTenor: "term-validation",
  InvalidEarliestExerciseTenor: "term-validation",
  InvalidExpiry: "term-validation",
  InvalidEarliestExercise: "term-validation",
  InvalidRelPremiums: "term-validation",
  InvalidMinMaxSpot: "term-validation",
  InvalidOracle: "term-validation",
  InvalidBorrowCap: "term-validation",
  InvalidOptionNaming: "term-validation",

  InvalidSender: "authorization",
  NotAnEscrow: "authorization",

  NoOptionMinted: "state-mismatch",
  EscrowClosed: "state-mismatch",
  NotAnAuction: "state-mismatch",
  OptionAlreadyMinted: "state-mismatch",
  AuctionCancelled: "state-mismatch",
  InvalidWithdraw: "state-mismatch",
  OwnerAlreadySet: "state-mismatch",
  NothingToRedeem: "state-mismatch",
  NothingToRepay: "state-mismatch",

  InvalidExerciseTime: "temporal",
  InvalidBorrowTime: "temporal",
  InvalidRepayTime: "temporal",
  QuoteExpired: "temporal",

  PremiumTooLow: "market",
  SpotPriceTooLow: "market",
  OutOfRangeSpotPrice: "market",
  InvalidExercise: "market",

  InsufficientFunding: "solvency",
  InsufficientBalance: "solvency",
  InsufficientOptionBalance: "solvency",
  InvalidExerciseAmount: "solvency",
  InvalidBorrowAmount: "solvency",
  InvalidRepayAmount: "solvency",

  QuoteAlreadyExecuted: "replay",
  InvalidQuote: "replay",
  QuotesPaused: "replay",

  BorrowingNotAllowed: "configuration",
  VotingDelegationNotAllowed: "configuration",
  NoAllowedDelegateRegistry: "configuration",
  InvalidMatchFee: "configuration",
  InvalidExerciseFee: "configuration",
  InvalidMintFee: "configuration",
  InvalidDistPartnerFeeShare: "configuration",
  InvalidArrayLength: "configuration",
  DistPartnerFeeAlreadySet: "configuration",
  FeeHandlerAlreadySet: "configuration",
  InvalidGetEscrowsQuery: "configuration",
  InvalidAddress: "configuration",
  NoFeeRecipient: "configuration",
  NoDistPartner: "configuration",
  UnknownToken: "configuration",

  NoOracle: "oracle",
  InvalidOracleAnswer: "oracle",
  StaleOracleAnswer: "oracle",
  OracleAlreadySet: "oracle"
} as const satisfies Record<string, EscrowErrorCategory>;

export type EscrowErrorCode = keyof typeof ERROR_CATEGORIES;

export class EscrowError extends Error {
  readonly category: EscrowErrorCategory;

  constructor(
    readonly code: EscrowErrorCode,
    message?: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message ?? code);
    this.name = "EscrowError";
    this.category = ERROR_CATEGORIES[code];
  }
}

export function isEscrowError(error: unknown): error is EscrowError {
  return error instanceof EscrowError;
}

export function fail(code: EscrowErrorCode, message?: string, details?: Record<string, unknown>): never {
  throw new EscrowError(code, message, details);
}
