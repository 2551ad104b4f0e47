import {
  getAddress,
  getContractAddress,
  isAddressEqual,
  type Address,
  type Hex
} from "viem";
import { BASE, MAX_EXERCISE_FEE, MAX_MATCH_FEE, MAX_MINT_FEE } from "./constants";
import { fail, type EscrowErrorCode } from "./errors";
import { EscrowAccount, type EscrowContext } from "./escrowAccount";
import type { FeeHandler } from "./feeHandler";
import { Ratio } from "./fixedPoint";
import { capRate, computeFees } from "./pricingMath";
import { RFQValidator, type TakeQuoteContext } from "./rfqValidator";
import type { TokenLedger } from "./tokenLedger";
import {
  systemClock,
  type AuctionSchedule,
  type AuctionTerms,
  type BidPreview,
  type BidQuote,
  type BorrowResult,
  type Clock,
  type ContractSignatureVerifier,
  type DelegationRegistry,
  type ExerciseResult,
  type FeeProvider,
  type MatchFeeInfo,
  type OptionNaming,
  type OptionTerms,
  type OracleAdapter,
  type RepayResult,
  type RFQInitialization,
  type TakeQuoteMatch,
  type TakeQuotePreview,
  type TakeQuoteStatus,
  type Transfer
} from "./types";

type EventBody =
  | {
      type: "CreateAuction";
      escrow: Address;
      sender: Address;
      owner: Address;
      notional: bigint;
      distPartner: Address | null;
    }
  | {
      type: "BidOnAuction";
      escrow: Address;
      bidder: Address;
      optionReceiver: Address;
      relBid: Ratio;
      quote: BidQuote;
    }
  | {
      type: "TakeQuote";
      escrow: Address;
      taker: Address;
      owner: Address;
      quoter: Address;
      msgHash: Hex;
      premium: bigint;
      matchFeeProtocol: bigint;
      matchFeeDistPartner: bigint;
    }
  | {
      type: "MintOption";
      escrow: Address;
      sender: Address;
      owner: Address;
      optionReceiver: Address;
      notional: bigint;
      mintFeeProtocol: bigint;
      mintFeeDistPartner: bigint;
    }
  | { type: "Exercise"; escrow: Address; exerciser: Address; receiver: Address; amount: bigint; result: ExerciseResult }
  | { type: "Borrow"; escrow: Address; borrower: Address; receiver: Address; amount: bigint; result: BorrowResult }
  | { type: "Repay"; escrow: Address; borrower: Address; receiver: Address; amount: bigint; result: RepayResult }
  | { type: "Withdraw"; escrow: Address; sender: Address; to: Address; token: Address; amount: bigint }
  | { type: "Redeem"; escrow: Address; owner: Address; to: Address; amount: bigint }
  | { type: "TransferOwnership"; escrow: Address; oldOwner: Address; newOwner: Address }
  | { type: "OptionTransfer"; escrow: Address; from: Address; to: Address; amount: bigint }
  | { type: "OnChainVotingDelegation"; escrow: Address; delegatee: Address }
  | { type: "OffChainVotingDelegation"; escrow: Address; registry: Address; spaceId: Hex; delegate: Address }
  | { type: "PauseQuotes"; quoter: Address; paused: boolean }
  | { type: "NewFeeHandler"; feeHandler: Address | null };

export type RouterEvent = EventBody & { timestamp: number };
export type RouterEventType = RouterEvent["type"];

const TAKE_QUOTE_ERRORS = {
  Expired: "QuoteExpired",
  AlreadyExecuted: "QuoteAlreadyExecuted",
  InsufficientFunding: "InsufficientFunding",
  QuotesPaused: "QuotesPaused",
  InvalidQuote: "InvalidQuote"
} as const satisfies Record<Exclude<TakeQuoteStatus, "Success">, EscrowErrorCode>;

export interface RouterOptions {
  address: Address;
  owner: Address;
  chainId: number;
  ledger: TokenLedger;
  clock?: Clock;
  feeHandler?: FeeHandler | null;
  contractSigners?: ContractSignatureVerifier;
  onEvent?: (event: RouterEvent) => void;
}

export interface CreateAuctionRequest {
  escrowOwner: Address;
  terms: AuctionTerms;
  schedule: AuctionSchedule;
  distPartner: Address | null;
}

export interface BidRequest {
  optionReceiver: Address;
  relBid: Ratio;
  refSpot: bigint;
  oracleData: Hex;
}

export interface TakeQuoteRequest {
  escrowOwner: Address;
  rfq: RFQInitialization;
  distPartner: Address | null;
}

export interface MintOptionRequest {
  optionReceiver: Address;
  escrowOwner: Address;
  optionInfo: OptionTerms;
  naming: OptionNaming;
  distPartner: Address | null;
}

export interface ExerciseRequest {
  receiver: Address;
  amount: bigint;
  payInSettlementToken: boolean;
  oracleData: Hex;
}

export interface PositionRequest {
  receiver: Address;
  amount: bigint;
}

export interface WithdrawRequest {
  to: Address;
  token: Address;
  amount: bigint;
}

export class Router implements FeeProvider {
  readonly address: Address;
  readonly owner: Address;
  readonly chainId: number;

  private readonly ledger: TokenLedger;
  private readonly clock: Clock;
  private readonly rfq: RFQValidator;
  private readonly onEvent?: (event: RouterEvent) => void;
  private feeHandlerValue: FeeHandler | null;
  private escrows: EscrowAccount[] = [];
  private escrowIndex = new Map<Address, EscrowAccount>();
  private oracles = new Map<Address, OracleAdapter>();
  private delegationRegistries = new Map<Address, DelegationRegistry>();
  private eventLog: RouterEvent[] = [];

  constructor(options: RouterOptions) {
    this.address = getAddress(options.address);
    this.owner = getAddress(options.owner);
    this.chainId = options.chainId;
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.feeHandlerValue = options.feeHandler ?? null;
    this.rfq = new RFQValidator(options.chainId, options.contractSigners);
    this.onEvent = options.onEvent;
  }

  registerOracle(address: Address, oracle: OracleAdapter): void {
    this.oracles.set(getAddress(address), oracle);
  }

  registerDelegationRegistry(address: Address, registry: DelegationRegistry): void {
    this.delegationRegistries.set(getAddress(address), registry);
  }

  get feeHandler(): FeeHandler | null {
    return this.feeHandlerValue;
  }

  get events(): readonly RouterEvent[] {
    return this.eventLog;
  }

  numEscrows(): number {
    return this.escrows.length;
  }

  getEscrows(from: number, num: number): Address[] {
    if (!Number.isInteger(from) || !Number.isInteger(num) || from < 0 || num <= 0 || from + num > this.escrows.length) {
      return fail("InvalidGetEscrowsQuery", `Cannot read ${num} escrows from ${from} of ${this.escrows.length}`);
    }
    return this.escrows.slice(from, from + num).map((escrow) => escrow.address);
  }

  getEscrow(address: Address): EscrowAccount {
    const escrow = this.escrowIndex.get(getAddress(address));
    if (!escrow) {
      return fail("NotAnEscrow", `No escrow at ${address}`);
    }
    return escrow;
  }

  isQuoteExecuted(msgHash: Hex): boolean {
    return this.rfq.isExecuted(msgHash);
  }

  isQuotingPaused(quoter: Address): boolean {
    return this.rfq.isPaused(quoter);
  }

  getMatchFeeInfo(distPartner: Address | null): MatchFeeInfo {
    const handler = this.feeHandlerValue;
    if (!handler) {
      return { matchFee: Ratio.ZERO, distPartnerShare: Ratio.ZERO };
    }
    return {
      matchFee: capRate(handler.matchFee, MAX_MATCH_FEE),
      distPartnerShare: capRate(handler.distPartnerFeeShare(distPartner), BASE)
    };
  }

  getMintFeeInfo(distPartner: Address | null): MatchFeeInfo {
    const handler = this.feeHandlerValue;
    if (!handler) {
      return { matchFee: Ratio.ZERO, distPartnerShare: Ratio.ZERO };
    }
    return {
      matchFee: capRate(handler.mintFee, MAX_MINT_FEE),
      distPartnerShare: capRate(handler.distPartnerFeeShare(distPartner), BASE)
    };
  }

  getExerciseFeeRate(): Ratio {
    const handler = this.feeHandlerValue;
    return handler ? capRate(handler.exerciseFee, MAX_EXERCISE_FEE) : Ratio.ZERO;
  }

  feeRecipient(): Address | null {
    return this.feeHandlerValue?.address ?? null;
  }

  setFeeHandler(sender: Address, feeHandler: FeeHandler | null): void {
    this.requireOwner(sender);
    const current = this.feeHandlerValue;
    if (current === feeHandler || (current && feeHandler && isAddressEqual(current.address, feeHandler.address))) {
      fail("FeeHandlerAlreadySet", "Fee handler unchanged");
    }
    this.feeHandlerValue = feeHandler;
    this.emit({ type: "NewFeeHandler", feeHandler: feeHandler?.address ?? null });
  }

  createAuction(sender: Address, request: CreateAuctionRequest): EscrowAccount {
    const escrow = EscrowAccount.initializeAuction(this.nextContext(), {
      owner: request.escrowOwner,
      terms: request.terms,
      schedule: request.schedule,
      naming: this.defaultNaming(),
      distPartner: request.distPartner
    });

    this.ledger.settle([
      { token: request.terms.underlyingToken, from: sender, to: escrow.address, amount: request.terms.notional }
    ]);

    this.register(escrow);
    this.emit({
      type: "CreateAuction",
      escrow: escrow.address,
      sender,
      owner: escrow.owner,
      notional: request.terms.notional,
      distPartner: request.distPartner
    });
    return escrow;
  }

  previewBid(escrowAddress: Address, relBid: Ratio, refSpot: bigint, oracleData: Hex): BidPreview {
    return this.getEscrow(escrowAddress).previewBid(relBid, refSpot, oracleData);
  }

  bidOnAuction(sender: Address, escrowAddress: Address, request: BidRequest): BidQuote {
    const escrow = this.getEscrow(escrowAddress);
    const quote = escrow.handleAuctionBid(
      this.address,
      {
        relBid: request.relBid,
        optionReceiver: request.optionReceiver,
        refSpot: request.refSpot,
        oracleData: request.oracleData
      },
      (q) =>
        this.premiumLegs(q.premiumToken, sender, escrow.owner, {
          premium: q.premium,
          protocolFee: q.matchFeeProtocol,
          partnerFee: q.matchFeeDistPartner,
          distPartner: escrow.distPartner
        })
    );

    this.emit({
      type: "BidOnAuction",
      escrow: escrow.address,
      bidder: sender,
      optionReceiver: request.optionReceiver,
      relBid: request.relBid,
      quote
    });
    return quote;
  }

  previewTakeQuote(rfq: RFQInitialization, distPartner: Address | null): Promise<TakeQuotePreview> {
    return this.rfq.previewTakeQuote(rfq, distPartner, this.takeQuoteContext());
  }

  async takeQuote(
    sender: Address,
    request: TakeQuoteRequest
  ): Promise<{ escrow: EscrowAccount; match: TakeQuoteMatch }> {
    const recovery = await this.rfq.recoverQuoter(request.rfq);

    // no await past this point: evaluation and commit must not interleave with other calls
    const preview = this.rfq.evaluate(request.rfq, recovery, request.distPartner, this.takeQuoteContext());
    if (preview.status !== "Success") {
      return fail(TAKE_QUOTE_ERRORS[preview.status], `Quote rejected: ${preview.status}`, {
        msgHash: preview.msgHash
      });
    }

    const match = preview.quote;
    const escrow = EscrowAccount.initializeRFQMatch(this.nextContext(), {
      owner: request.escrowOwner,
      terms: match.terms,
      rfqQuote: request.rfq.rfqQuote,
      optionReceiver: match.quoter,
      naming: this.defaultNaming()
    });

    this.ledger.settle([
      { token: match.terms.underlyingToken, from: sender, to: escrow.address, amount: match.terms.notional },
      ...this.premiumLegs(match.premiumToken, match.quoter, escrow.owner, {
        premium: match.premium,
        protocolFee: match.matchFeeProtocol,
        partnerFee: match.matchFeeDistPartner,
        distPartner: request.distPartner
      })
    ]);

    this.rfq.markExecuted(match.msgHash);
    this.register(escrow);
    this.emit({
      type: "TakeQuote",
      escrow: escrow.address,
      taker: sender,
      owner: escrow.owner,
      quoter: match.quoter,
      msgHash: match.msgHash,
      premium: match.premium,
      matchFeeProtocol: match.matchFeeProtocol,
      matchFeeDistPartner: match.matchFeeDistPartner
    });
    return { escrow, match };
  }

  togglePauseQuotes(sender: Address): boolean {
    const paused = this.rfq.togglePause(sender);
    this.emit({ type: "PauseQuotes", quoter: getAddress(sender), paused });
    return paused;
  }

  mintOption(sender: Address, request: MintOptionRequest): EscrowAccount {
    const feeInfo = this.getMintFeeInfo(request.distPartner);
    const fees = computeFees(request.optionInfo.notional, feeInfo.matchFee, feeInfo.distPartnerShare);

    const escrow = EscrowAccount.initializeDirectMint(this.nextContext(), {
      owner: request.escrowOwner,
      terms: request.optionInfo,
      optionReceiver: request.optionReceiver,
      naming: request.naming,
      mintFees: {
        protocolFee: fees.protocolFee,
        partnerFee: fees.partnerFee,
        feeRecipient: this.feeRecipient(),
        distPartner: request.distPartner
      }
    });

    this.ledger.settle([
      {
        token: request.optionInfo.underlyingToken,
        from: sender,
        to: escrow.address,
        amount: request.optionInfo.notional
      }
    ]);

    this.register(escrow);
    this.emit({
      type: "MintOption",
      escrow: escrow.address,
      sender,
      owner: escrow.owner,
      optionReceiver: request.optionReceiver,
      notional: request.optionInfo.notional,
      mintFeeProtocol: fees.protocolFee,
      mintFeeDistPartner: fees.partnerFee
    });
    return escrow;
  }

  exercise(sender: Address, escrowAddress: Address, request: ExerciseRequest): ExerciseResult {
    const escrow = this.getEscrow(escrowAddress);
    const result = escrow.handleExercise(
      this.address,
      {
        exerciser: sender,
        receiver: request.receiver,
        amount: request.amount,
        payInSettlementToken: request.payInSettlementToken,
        oracleData: request.oracleData
      },
      (r) => [
        ...(request.payInSettlementToken
          ? [{ token: r.settlementToken, from: sender, to: escrow.owner, amount: r.settlementAmount }]
          : []),
        ...this.feeLegs(r.settlementToken, sender, r.exerciseFeeAmount)
      ]
    );

    this.emit({
      type: "Exercise",
      escrow: escrow.address,
      exerciser: sender,
      receiver: request.receiver,
      amount: request.amount,
      result
    });
    return result;
  }

  borrow(sender: Address, escrowAddress: Address, request: PositionRequest): BorrowResult {
    const escrow = this.getEscrow(escrowAddress);
    const result = escrow.handleBorrow(
      this.address,
      { borrower: sender, receiver: request.receiver, amount: request.amount },
      (r) => [
        { token: r.settlementToken, from: sender, to: escrow.address, amount: r.collateralAmount },
        ...this.feeLegs(r.settlementToken, sender, r.collateralFeeAmount)
      ]
    );

    this.emit({
      type: "Borrow",
      escrow: escrow.address,
      borrower: sender,
      receiver: request.receiver,
      amount: request.amount,
      result
    });
    return result;
  }

  repay(sender: Address, escrowAddress: Address, request: PositionRequest): RepayResult {
    const escrow = this.getEscrow(escrowAddress);
    const result = escrow.handleRepay(
      this.address,
      { borrower: sender, receiver: request.receiver, amount: request.amount },
      (r) => [{ token: r.underlyingToken, from: sender, to: escrow.address, amount: request.amount }]
    );

    this.emit({
      type: "Repay",
      escrow: escrow.address,
      borrower: sender,
      receiver: request.receiver,
      amount: request.amount,
      result
    });
    return result;
  }

  withdraw(sender: Address, escrowAddress: Address, request: WithdrawRequest): void {
    const escrow = this.getEscrow(escrowAddress);
    if (!isAddressEqual(sender, escrow.owner)) {
      fail("InvalidSender", `${sender} does not own escrow ${escrow.address}`);
    }
    escrow.handleWithdraw(this.address, request);
    this.emit({
      type: "Withdraw",
      escrow: escrow.address,
      sender,
      to: request.to,
      token: request.token,
      amount: request.amount
    });
  }

  redeem(sender: Address, escrowAddress: Address, to: Address): bigint {
    const escrow = this.getEscrow(escrowAddress);
    const amount = escrow.redeem(sender, to);
    this.emit({ type: "Redeem", escrow: escrow.address, owner: escrow.owner, to, amount });
    return amount;
  }

  transferOwnership(sender: Address, escrowAddress: Address, newOwner: Address): void {
    const escrow = this.getEscrow(escrowAddress);
    const oldOwner = escrow.owner;
    escrow.transferOwnership(sender, newOwner);
    this.emit({ type: "TransferOwnership", escrow: escrow.address, oldOwner, newOwner: escrow.owner });
  }

  /** Moves option tokens of one escrow from the sender to another holder. */
  transferOptionToken(sender: Address, escrowAddress: Address, to: Address, amount: bigint): void {
    const escrow = this.getEscrow(escrowAddress);
    escrow.optionToken.transfer(sender, to, amount);
    this.emit({
      type: "OptionTransfer",
      escrow: escrow.address,
      from: getAddress(sender),
      to: getAddress(to),
      amount
    });
  }

  delegateOnChainVoting(sender: Address, escrowAddress: Address, delegatee: Address): void {
    const escrow = this.getEscrow(escrowAddress);
    escrow.handleOnChainVoting(sender, delegatee);
    this.emit({ type: "OnChainVotingDelegation", escrow: escrow.address, delegatee });
  }

  delegateOffChainVoting(sender: Address, escrowAddress: Address, spaceId: Hex, delegate: Address): void {
    const escrow = this.getEscrow(escrowAddress);
    const registry = escrow.handleOffChainVoting(sender, spaceId, delegate);
    this.emit({ type: "OffChainVotingDelegation", escrow: escrow.address, registry, spaceId, delegate });
  }

  private nextContext(): EscrowContext {
    return {
      address: getContractAddress({ from: this.address, nonce: BigInt(this.escrows.length + 1) }),
      router: this.address,
      ledger: this.ledger,
      clock: this.clock,
      fees: this,
      oracles: this.oracles,
      delegationRegistries: this.delegationRegistries
    };
  }

  private defaultNaming(): OptionNaming {
    const index = this.escrows.length;
    return { name: `Option #${index}`, symbol: `OPT-${index}` };
  }

  private register(escrow: EscrowAccount): void {
    this.escrows.push(escrow);
    this.escrowIndex.set(escrow.address, escrow);
  }

  private premiumLegs(
    token: Address,
    payer: Address,
    owner: Address,
    split: { premium: bigint; protocolFee: bigint; partnerFee: bigint; distPartner: Address | null }
  ): Transfer[] {
    const legs: Transfer[] = [
      { token, from: payer, to: owner, amount: split.premium - split.protocolFee - split.partnerFee },
      ...this.feeLegs(token, payer, split.protocolFee)
    ];
    if (split.partnerFee > 0n) {
      if (!split.distPartner) {
        fail("NoDistPartner", `Partner fee ${split.partnerFee} has no distribution partner`);
      }
      legs.push({ token, from: payer, to: split.distPartner, amount: split.partnerFee });
    }
    return legs;
  }

  private feeLegs(token: Address, payer: Address, amount: bigint): Transfer[] {
    if (amount === 0n) {
      return [];
    }
    const recipient = this.feeRecipient();
    if (!recipient) {
      return fail("NoFeeRecipient", `Fee ${amount} has no fee handler to receive it`);
    }
    return [{ token, from: payer, to: recipient, amount }];
  }

  private takeQuoteContext(): TakeQuoteContext {
    return {
      now: this.clock.now(),
      fees: this,
      balanceOf: (token, holder) => this.ledger.balanceOf(token, holder)
    };
  }

  private requireOwner(sender: Address): void {
    if (!isAddressEqual(sender, this.owner)) {
      fail("InvalidSender", `${sender} does not own the router`);
    }
  }

  private emit(event: EventBody): void {
    const entry: RouterEvent = { ...event, timestamp: this.clock.now() };
    this.eventLog.push(entry);
    this.onEvent?.(entry);
  }
}
