import { getAddress, isAddressEqual, zeroAddress, type Address, type Hex } from "viem";
import { AuctionEngine } from "./auctionEngine";
import { fail } from "./errors";
import type { Ratio } from "./fixedPoint";
import { OptionToken } from "./optionToken";
import { fromDirectMint, fromRFQ, validateAuction } from "./optionTerms";
import { convert } from "./pricingMath";
import type { TokenLedger } from "./tokenLedger";
import type {
  AuctionSchedule,
  AuctionTerms,
  BidPreview,
  BidQuote,
  BorrowResult,
  Clock,
  DelegationRegistry,
  EscrowState,
  ExerciseResult,
  FeeProvider,
  OptionNaming,
  OptionTerms,
  OracleAdapter,
  RepayResult,
  RFQQuote,
  Transfer
} from "./types";

export interface EscrowContext {
  address: Address;
  router: Address;
  ledger: TokenLedger;
  clock: Clock;
  fees: FeeProvider;
  oracles: ReadonlyMap<Address, OracleAdapter>;
  delegationRegistries: ReadonlyMap<Address, DelegationRegistry>;
}

/** Pulls from counterparties, settled in the same ledger batch as the escrow's own pushes. */
export type CounterpartyLegs<R> = (result: R) => readonly Transfer[];

type CallerRole = "router" | "owner" | "ownerOrRouter";

interface Precondition {
  caller: CallerRole;
  states: readonly EscrowState[];
}

export type EscrowOperation =
  | "handleAuctionBid"
  | "handleExercise"
  | "handleBorrow"
  | "handleRepay"
  | "handleWithdraw"
  | "transferOwnership"
  | "redeem"
  | "handleOnChainVoting"
  | "handleOffChainVoting";

export const PRECONDITIONS = {
  handleAuctionBid: { caller: "router", states: ["Unmatched", "Matched", "Closed"] },
  handleExercise: { caller: "router", states: ["Matched"] },
  handleBorrow: { caller: "router", states: ["Matched"] },
  handleRepay: { caller: "router", states: ["Matched"] },
  handleWithdraw: { caller: "ownerOrRouter", states: ["Unmatched", "Matched", "Closed"] },
  transferOwnership: { caller: "owner", states: ["Unmatched", "Matched"] },
  redeem: { caller: "owner", states: ["Matched"] },
  handleOnChainVoting: { caller: "owner", states: ["Unmatched", "Matched"] },
  handleOffChainVoting: { caller: "owner", states: ["Unmatched", "Matched"] }
} as const satisfies Record<EscrowOperation, Precondition>;

export interface AuctionBidParams {
  relBid: Ratio;
  optionReceiver: Address;
  refSpot: bigint;
  oracleData: Hex;
}

export interface ExerciseParams {
  exerciser: Address;
  receiver: Address;
  amount: bigint;
  payInSettlementToken: boolean;
  oracleData: Hex;
}

export interface BorrowParams {
  borrower: Address;
  receiver: Address;
  amount: bigint;
}

export interface RepayParams {
  borrower: Address;
  receiver: Address;
  amount: bigint;
}

export interface WithdrawParams {
  to: Address;
  token: Address;
  amount: bigint;
}

export interface MintFeeSplit {
  protocolFee: bigint;
  partnerFee: bigint;
  feeRecipient: Address | null;
  distPartner: Address | null;
}

export interface EscrowSnapshot {
  address: Address;
  state: EscrowState;
  owner: Address;
  optionMinted: boolean;
  underlyingToken: Address;
  settlementToken: Address;
  notional: bigint;
  strike: bigint | null;
  expiry: number | null;
  earliestExercise: number | null;
  advancedSettings: AuctionTerms["advancedSettings"];
  schedule: AuctionSchedule | null;
  distPartner: Address | null;
  premiumPaid: bigint;
  totalBorrowed: bigint;
  optionToken: {
    name: string;
    symbol: string;
    decimals: number;
    totalSupply: bigint;
    holders: Array<[Address, bigint]>;
  };
}

interface EscrowSeed {
  owner: Address;
  naming: OptionNaming;
  baseTerms: AuctionTerms;
  auction: AuctionEngine | null;
  terms: OptionTerms | null;
  distPartner: Address | null;
}

export class EscrowAccount {
  readonly address: Address;
  readonly optionToken: OptionToken;

  private stateValue: EscrowState;
  private ownerValue: Address;
  private matchedTerms: OptionTerms | null;
  private readonly baseTerms: AuctionTerms;
  private readonly auction: AuctionEngine | null;
  private readonly distPartnerValue: Address | null;
  private premiumPaidValue = 0n;
  private totalBorrowedValue = 0n;
  private borrowed = new Map<Address, bigint>();

  private constructor(
    private readonly ctx: EscrowContext,
    seed: EscrowSeed
  ) {
    this.address = getAddress(ctx.address);
    this.ownerValue = getAddress(seed.owner);
    this.baseTerms = seed.baseTerms;
    this.auction = seed.auction;
    this.matchedTerms = seed.terms;
    this.distPartnerValue = seed.distPartner;
    this.stateValue = seed.terms ? "Matched" : "Unmatched";
    this.optionToken = new OptionToken(
      seed.naming.name,
      seed.naming.symbol,
      ctx.ledger.decimals(seed.baseTerms.underlyingToken)
    );
  }

  static initializeAuction(
    ctx: EscrowContext,
    init: {
      owner: Address;
      terms: AuctionTerms;
      schedule: AuctionSchedule;
      naming: OptionNaming;
      distPartner: Address | null;
    }
  ): EscrowAccount {
    validateAuction(init.terms, init.schedule, (oracle) => ctx.oracles.has(getAddress(oracle)));
    ctx.ledger.decimals(init.terms.settlementToken);
    return new EscrowAccount(ctx, {
      owner: init.owner,
      naming: init.naming,
      baseTerms: init.terms,
      auction: new AuctionEngine(init.terms, init.schedule),
      terms: null,
      distPartner: init.distPartner
    });
  }

  static initializeRFQMatch(
    ctx: EscrowContext,
    init: {
      owner: Address;
      terms: OptionTerms;
      rfqQuote: RFQQuote;
      optionReceiver: Address;
      naming: OptionNaming;
    }
  ): EscrowAccount {
    const terms = fromRFQ(init.terms, ctx.clock.now());
    ctx.ledger.decimals(terms.settlementToken);
    const escrow = new EscrowAccount(ctx, {
      owner: init.owner,
      naming: init.naming,
      baseTerms: terms,
      auction: null,
      terms,
      distPartner: null
    });
    escrow.optionToken.mint(init.optionReceiver, terms.notional);
    escrow.premiumPaidValue = init.rfqQuote.premium;
    return escrow;
  }

  static initializeDirectMint(
    ctx: EscrowContext,
    init: {
      owner: Address;
      terms: OptionTerms;
      optionReceiver: Address;
      naming: OptionNaming;
      mintFees: MintFeeSplit;
    }
  ): EscrowAccount {
    const terms = fromDirectMint(init.terms, ctx.clock.now());
    if (!init.naming.name.trim() || !init.naming.symbol.trim()) {
      fail("InvalidOptionNaming", "Option name and symbol are required");
    }
    ctx.ledger.decimals(terms.settlementToken);

    const { protocolFee, partnerFee, feeRecipient, distPartner } = init.mintFees;
    if (protocolFee + partnerFee > terms.notional) {
      fail("InvalidMintFee", `Mint fees ${protocolFee + partnerFee} exceed notional ${terms.notional}`);
    }

    const escrow = new EscrowAccount(ctx, {
      owner: init.owner,
      naming: init.naming,
      baseTerms: terms,
      auction: null,
      terms,
      distPartner: null
    });
    escrow.optionToken.mint(init.optionReceiver, terms.notional - protocolFee - partnerFee);
    if (protocolFee > 0n) {
      escrow.optionToken.mint(feeRecipient ?? init.optionReceiver, protocolFee);
    }
    if (partnerFee > 0n) {
      escrow.optionToken.mint(distPartner ?? init.optionReceiver, partnerFee);
    }
    return escrow;
  }

  get state(): EscrowState {
    return this.stateValue;
  }

  get owner(): Address {
    return this.ownerValue;
  }

  get optionMinted(): boolean {
    return this.matchedTerms !== null;
  }

  get terms(): OptionTerms | null {
    return this.matchedTerms;
  }

  get schedule(): AuctionSchedule | null {
    return this.auction?.schedule ?? null;
  }

  get distPartner(): Address | null {
    return this.distPartnerValue;
  }

  get premiumPaid(): bigint {
    return this.premiumPaidValue;
  }

  get totalBorrowed(): bigint {
    return this.totalBorrowedValue;
  }

  borrowedAmount(borrower: Address): bigint {
    return this.borrowed.get(getAddress(borrower)) ?? 0n;
  }

  currentAsk(): Ratio | null {
    return this.auction?.currentAsk(this.ctx.clock.now()) ?? null;
  }

  previewBid(relBid: Ratio, refSpot: bigint, oracleData: Hex, now = this.ctx.clock.now()): BidPreview {
    const auction = this.auction;
    if (!auction) {
      return { status: "NotAnAuction" };
    }
    if (this.optionMinted) {
      return { status: "OptionAlreadyMinted" };
    }
    if (this.stateValue === "Closed") {
      return { status: "AuctionCancelled" };
    }

    const premiumRejection = auction.checkPremium(relBid, now);
    if (premiumRejection) {
      return premiumRejection;
    }

    const { underlyingToken, settlementToken, notional } = this.baseTerms;
    const oracleSpot = this.oracle().getPrice(underlyingToken, settlementToken, oracleData);
    const spotRejection = auction.checkSpot(refSpot, oracleSpot);
    if (spotRejection) {
      return spotRejection;
    }

    const balance = this.ctx.ledger.balanceOf(underlyingToken, this.address);
    if (balance < notional) {
      return { status: "InsufficientFunding", balance };
    }

    return {
      status: "Success",
      quote: auction.bidQuote({
        relBid,
        oracleSpot,
        underlyingDecimals: this.optionToken.decimals,
        fees: this.ctx.fees.getMatchFeeInfo(this.distPartnerValue),
        now
      })
    };
  }

  handleAuctionBid(
    caller: Address,
    params: AuctionBidParams,
    legs: CounterpartyLegs<BidQuote> = () => []
  ): BidQuote {
    this.enforce("handleAuctionBid", caller);

    // quote and stored terms share one timestamp
    const now = this.ctx.clock.now();
    const preview = this.previewBid(params.relBid, params.refSpot, params.oracleData, now);
    if (preview.status !== "Success") {
      return fail(preview.status, `Bid rejected: ${preview.status}`);
    }
    const auction = this.requireAuction();
    const quote = preview.quote;
    const terms = auction.matchTerms(quote.oracleSpotPrice, now);

    this.ctx.ledger.settle(legs(quote));

    this.matchedTerms = terms;
    this.stateValue = "Matched";
    this.premiumPaidValue = quote.premium;
    this.optionToken.mint(params.optionReceiver, terms.notional);
    return quote;
  }

  handleExercise(
    caller: Address,
    params: ExerciseParams,
    legs: CounterpartyLegs<ExerciseResult> = () => []
  ): ExerciseResult {
    const terms = this.enforceMatched("handleExercise", caller);
    const now = this.ctx.clock.now();
    if (now < terms.earliestExercise || now > terms.expiry) {
      fail("InvalidExerciseTime", `Exercise window is [${terms.earliestExercise}, ${terms.expiry}]`);
    }
    if (params.amount <= 0n || params.amount > terms.notional) {
      fail("InvalidExerciseAmount", `Exercise amount out of range: ${params.amount}`);
    }
    this.optionToken.assertCanBurn(params.exerciser, params.amount);

    const settlementAmount = convert(terms.strike, params.amount, this.optionToken.decimals, true);
    const exerciseFeeAmount = this.ctx.fees.getExerciseFeeRate().applyTo(settlementAmount);
    const pushes: Transfer[] = [];
    let costInUnderlying: bigint | null = null;

    if (params.payInSettlementToken) {
      pushes.push(this.push(terms.underlyingToken, params.receiver, params.amount));
    } else {
      const price = this.oracle().getPrice(terms.settlementToken, terms.underlyingToken, params.oracleData);
      const cost = convert(price, settlementAmount, this.ctx.ledger.decimals(terms.settlementToken), true);
      if (cost <= 0n || cost > params.amount) {
        fail("InvalidExercise", `Exercise cost in underlying out of range: ${cost}`, {
          costInUnderlying: cost.toString(),
          amount: params.amount.toString()
        });
      }
      costInUnderlying = cost;
      pushes.push(this.push(terms.underlyingToken, this.ownerValue, cost));
      pushes.push(this.push(terms.underlyingToken, params.receiver, params.amount - cost));
    }

    const result: ExerciseResult = {
      settlementToken: terms.settlementToken,
      settlementAmount,
      exerciseFeeAmount,
      costInUnderlying
    };
    this.ctx.ledger.settle([...legs(result), ...pushes]);

    this.optionToken.burn(params.exerciser, params.amount);
    return result;
  }

  handleBorrow(
    caller: Address,
    params: BorrowParams,
    legs: CounterpartyLegs<BorrowResult> = () => []
  ): BorrowResult {
    const terms = this.enforceMatched("handleBorrow", caller);
    const now = this.ctx.clock.now();
    if (now < terms.earliestExercise || now > terms.expiry) {
      fail("InvalidBorrowTime", `Borrow window is [${terms.earliestExercise}, ${terms.expiry}]`);
    }
    const borrowCap = terms.advancedSettings.borrowCap;
    if (borrowCap.isZero()) {
      fail("BorrowingNotAllowed", "Borrowing is disabled for this option");
    }
    const maxBorrowable = borrowCap.applyTo(terms.notional);
    if (params.amount <= 0n || this.totalBorrowedValue + params.amount > maxBorrowable) {
      fail("InvalidBorrowAmount", `Borrow amount exceeds cap of ${maxBorrowable}`, {
        totalBorrowed: this.totalBorrowedValue.toString(),
        requested: params.amount.toString()
      });
    }
    this.optionToken.assertCanBurn(params.borrower, params.amount);

    const collateralAmount = convert(terms.strike, params.amount, this.optionToken.decimals, true);
    const result: BorrowResult = {
      settlementToken: terms.settlementToken,
      collateralAmount,
      collateralFeeAmount: this.ctx.fees.getExerciseFeeRate().applyTo(collateralAmount)
    };
    this.ctx.ledger.settle([
      ...legs(result),
      this.push(terms.underlyingToken, params.receiver, params.amount)
    ]);

    const borrower = getAddress(params.borrower);
    this.optionToken.burn(borrower, params.amount);
    this.borrowed.set(borrower, this.borrowedAmount(borrower) + params.amount);
    this.totalBorrowedValue += params.amount;
    return result;
  }

  handleRepay(
    caller: Address,
    params: RepayParams,
    legs: CounterpartyLegs<RepayResult> = () => []
  ): RepayResult {
    const terms = this.enforceMatched("handleRepay", caller);
    if (this.ctx.clock.now() > terms.expiry) {
      fail("InvalidRepayTime", `Repayment closed at expiry ${terms.expiry}`);
    }
    if (this.totalBorrowedValue === 0n) {
      fail("NothingToRepay", "No outstanding borrows");
    }
    const outstanding = this.borrowedAmount(params.borrower);
    if (params.amount <= 0n || params.amount > outstanding) {
      fail("InvalidRepayAmount", `Repay amount must be within (0, ${outstanding}]`);
    }

    const unlockedCollateral = convert(terms.strike, params.amount, this.optionToken.decimals, false);
    const result: RepayResult = {
      underlyingToken: terms.underlyingToken,
      unlockedCollateral
    };
    this.ctx.ledger.settle([
      ...legs(result),
      this.push(terms.settlementToken, params.receiver, unlockedCollateral)
    ]);

    const borrower = getAddress(params.borrower);
    this.optionToken.mint(borrower, params.amount);
    this.borrowed.set(borrower, outstanding - params.amount);
    this.totalBorrowedValue -= params.amount;
    return result;
  }

  handleWithdraw(caller: Address, params: WithdrawParams): void {
    this.enforce("handleWithdraw", caller);
    const terms = this.matchedTerms;
    if (terms && this.ctx.clock.now() <= terms.expiry) {
      fail("InvalidWithdraw", `Collateral locked until expiry ${terms.expiry}`);
    }

    this.ctx.ledger.settle([this.push(params.token, params.to, params.amount)]);

    if (this.stateValue === "Unmatched") {
      this.stateValue = "Closed";
    } else if (this.stateValue === "Matched" && this.isDrained()) {
      this.stateValue = "Closed";
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.enforce("transferOwnership", caller);
    if (isAddressEqual(newOwner, zeroAddress)) {
      fail("InvalidAddress", "Owner cannot be the zero address");
    }
    if (isAddressEqual(newOwner, this.ownerValue)) {
      fail("OwnerAlreadySet", `Owner is already ${newOwner}`);
    }
    this.ownerValue = getAddress(newOwner);
  }

  redeem(caller: Address, to: Address): bigint {
    const terms = this.enforceMatched("redeem", caller);
    const amount = this.optionToken.balanceOf(this.ownerValue);
    if (amount === 0n) {
      fail("NothingToRedeem", "Owner holds no option tokens");
    }

    this.ctx.ledger.settle([this.push(terms.underlyingToken, to, amount)]);

    this.optionToken.burn(this.ownerValue, amount);
    return amount;
  }

  handleOnChainVoting(caller: Address, delegatee: Address): void {
    this.enforce("handleOnChainVoting", caller);
    if (!this.baseTerms.advancedSettings.votingDelegationAllowed) {
      fail("VotingDelegationNotAllowed", "Voting delegation disabled for this option");
    }
    this.ctx.ledger.delegate(this.baseTerms.underlyingToken, this.address, delegatee);
  }

  handleOffChainVoting(caller: Address, spaceId: Hex, delegate: Address): Address {
    this.enforce("handleOffChainVoting", caller);
    const settings = this.baseTerms.advancedSettings;
    if (!settings.votingDelegationAllowed) {
      fail("VotingDelegationNotAllowed", "Voting delegation disabled for this option");
    }
    const registryAddress = settings.allowedDelegateRegistry;
    const registry = registryAddress ? this.ctx.delegationRegistries.get(getAddress(registryAddress)) : undefined;
    if (!registryAddress || !registry) {
      return fail("NoAllowedDelegateRegistry", "No delegate registry configured for this option");
    }
    registry.setDelegate(this.address, spaceId, delegate);
    return registryAddress;
  }

  snapshot(): EscrowSnapshot {
    const terms = this.matchedTerms;
    return {
      address: this.address,
      state: this.stateValue,
      owner: this.ownerValue,
      optionMinted: this.optionMinted,
      underlyingToken: this.baseTerms.underlyingToken,
      settlementToken: this.baseTerms.settlementToken,
      notional: this.baseTerms.notional,
      strike: terms?.strike ?? null,
      expiry: terms?.expiry ?? null,
      earliestExercise: terms?.earliestExercise ?? null,
      advancedSettings: this.baseTerms.advancedSettings,
      schedule: this.schedule,
      distPartner: this.distPartnerValue,
      premiumPaid: this.premiumPaidValue,
      totalBorrowed: this.totalBorrowedValue,
      optionToken: {
        name: this.optionToken.name,
        symbol: this.optionToken.symbol,
        decimals: this.optionToken.decimals,
        totalSupply: this.optionToken.totalSupply,
        holders: this.optionToken.holders()
      }
    };
  }

  private enforce(operation: EscrowOperation, caller: Address): void {
    const rule: Precondition = PRECONDITIONS[operation];
    const isRouter = isAddressEqual(caller, this.ctx.router);
    const isOwner = isAddressEqual(caller, this.ownerValue);
    const authorized =
      rule.caller === "router" ? isRouter : rule.caller === "owner" ? isOwner : isRouter || isOwner;
    if (!authorized) {
      fail("InvalidSender", `${caller} may not call ${operation}`);
    }
    if (!rule.states.includes(this.stateValue)) {
      if (this.stateValue === "Closed") {
        fail("EscrowClosed", `${operation} unavailable on a closed escrow`);
      }
      fail("NoOptionMinted", `${operation} requires a minted option`);
    }
  }

  private enforceMatched(operation: EscrowOperation, caller: Address): OptionTerms {
    this.enforce(operation, caller);
    const terms = this.matchedTerms;
    if (!terms) {
      return fail("NoOptionMinted", `${operation} requires a minted option`);
    }
    return terms;
  }

  private requireAuction(): AuctionEngine {
    if (!this.auction) {
      return fail("NotAnAuction", "Escrow was not created by an auction");
    }
    return this.auction;
  }

  private oracle(): OracleAdapter {
    const oracle = this.ctx.oracles.get(getAddress(this.baseTerms.advancedSettings.oracle));
    if (!oracle) {
      return fail("InvalidOracle", `Oracle not registered: ${this.baseTerms.advancedSettings.oracle}`);
    }
    return oracle;
  }

  private push(token: Address, to: Address, amount: bigint): Transfer {
    return { token, from: this.address, to, amount };
  }

  private isDrained(): boolean {
    const { underlyingToken, settlementToken } = this.baseTerms;
    return (
      this.ctx.ledger.balanceOf(underlyingToken, this.address) === 0n &&
      this.ctx.ledger.balanceOf(settlementToken, this.address) === 0n
    );
  }
}
