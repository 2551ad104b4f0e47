import {
  encodeAbiParameters,
  getAddress,
  hashMessage,
  keccak256,
  recoverMessageAddress,
  zeroAddress,
  zeroHash,
  type Address,
  type Hex
} from "viem";
import { isEscrowError, type EscrowErrorCode } from "./errors";
import { fromRFQ } from "./optionTerms";
import { computeFees } from "./pricingMath";
import type {
  ContractSignatureVerifier,
  FeeProvider,
  OptionTerms,
  RFQInitialization,
  TakeQuotePreview
} from "./types";

const RFQ_PAYLOAD_PARAMETERS = [
  { name: "chainId", type: "uint256" },
  {
    name: "optionInfo",
    type: "tuple",
    components: [
      { name: "underlyingToken", type: "address" },
      { name: "expiry", type: "uint48" },
      { name: "settlementToken", type: "address" },
      { name: "earliestExercise", type: "uint48" },
      { name: "notional", type: "uint128" },
      { name: "strike", type: "uint128" },
      {
        name: "advancedSettings",
        type: "tuple",
        components: [
          { name: "borrowCap", type: "uint64" },
          { name: "oracle", type: "address" },
          { name: "premiumTokenIsUnderlying", type: "bool" },
          { name: "votingDelegationAllowed", type: "bool" },
          { name: "allowedDelegateRegistry", type: "address" }
        ]
      }
    ]
  },
  { name: "premium", type: "uint256" },
  { name: "validUntil", type: "uint256" }
] as const;

export function rfqSignaturePayload(rfq: RFQInitialization, chainId: number): Hex {
  const { optionInfo, rfqQuote } = rfq;
  const settings = optionInfo.advancedSettings;
  return keccak256(
    encodeAbiParameters(RFQ_PAYLOAD_PARAMETERS, [
      BigInt(chainId),
      {
        underlyingToken: optionInfo.underlyingToken,
        expiry: optionInfo.expiry,
        settlementToken: optionInfo.settlementToken,
        earliestExercise: optionInfo.earliestExercise,
        notional: optionInfo.notional,
        strike: optionInfo.strike,
        advancedSettings: {
          borrowCap: settings.borrowCap.wad,
          oracle: settings.oracle,
          premiumTokenIsUnderlying: settings.premiumTokenIsUnderlying,
          votingDelegationAllowed: settings.votingDelegationAllowed,
          allowedDelegateRegistry: settings.allowedDelegateRegistry ?? zeroAddress
        }
      },
      rfqQuote.premium,
      BigInt(rfqQuote.validUntil)
    ])
  );
}

export type QuoterRecovery =
  | { ok: true; msgHash: Hex; quoter: Address }
  | { ok: false; msgHash: Hex; reason: string };

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function recoverQuoter(
  rfq: RFQInitialization,
  chainId: number,
  contractSigners?: ContractSignatureVerifier
): Promise<QuoterRecovery> {
  let msgHash: Hex;
  try {
    msgHash = rfqSignaturePayload(rfq, chainId);
  } catch (error) {
    return { ok: false, msgHash: zeroHash, reason: `Unencodable quote: ${describeFailure(error)}` };
  }

  const { signature, eip1271Maker } = rfq.rfqQuote;

  if (eip1271Maker) {
    if (!contractSigners) {
      return { ok: false, msgHash, reason: "Contract signatures are not supported" };
    }
    const digest = hashMessage({ raw: msgHash });
    const valid = await contractSigners.isValidSignature(eip1271Maker, digest, signature);
    return valid
      ? { ok: true, msgHash, quoter: getAddress(eip1271Maker) }
      : { ok: false, msgHash, reason: "Invalid EIP-1271 signature" };
  }

  try {
    const quoter = await recoverMessageAddress({ message: { raw: msgHash }, signature });
    return { ok: true, msgHash, quoter };
  } catch (error) {
    return { ok: false, msgHash, reason: `Unrecoverable signature: ${describeFailure(error)}` };
  }
}

function validateQuotedTerms(optionInfo: OptionTerms, now: number): OptionTerms | EscrowErrorCode {
  try {
    return fromRFQ(optionInfo, now);
  } catch (error) {
    if (isEscrowError(error)) {
      return error.code;
    }
    throw error;
  }
}

export interface TakeQuoteContext {
  now: number;
  fees: FeeProvider;
  balanceOf(token: Address, holder: Address): bigint;
}

/**
 * Tracks consumed quote hashes and per-quoter pauses. Evaluation is synchronous
 * once the signer is recovered, so a commit can re-run it without yielding.
 */
export class RFQValidator {
  private usedHashes = new Set<Hex>();
  private pausedQuoters = new Set<Address>();

  constructor(
    readonly chainId: number,
    private readonly contractSigners?: ContractSignatureVerifier
  ) {}

  recoverQuoter(rfq: RFQInitialization): Promise<QuoterRecovery> {
    return recoverQuoter(rfq, this.chainId, this.contractSigners);
  }

  async previewTakeQuote(
    rfq: RFQInitialization,
    distPartner: Address | null,
    ctx: TakeQuoteContext
  ): Promise<TakeQuotePreview> {
    const recovery = await this.recoverQuoter(rfq);
    return this.evaluate(rfq, recovery, distPartner, ctx);
  }

  evaluate(
    rfq: RFQInitialization,
    recovery: QuoterRecovery,
    distPartner: Address | null,
    ctx: TakeQuoteContext
  ): TakeQuotePreview {
    const { msgHash } = recovery;
    const { optionInfo, rfqQuote } = rfq;

    if (ctx.now > rfqQuote.validUntil) {
      return { status: "Expired", msgHash };
    }
    if (this.usedHashes.has(msgHash)) {
      return { status: "AlreadyExecuted", msgHash };
    }

    const premiumToken = optionInfo.advancedSettings.premiumTokenIsUnderlying
      ? optionInfo.underlyingToken
      : optionInfo.settlementToken;

    // funding and pause checks need a quoter; without one the quote is simply invalid
    if (!recovery.ok) {
      return { status: "InvalidQuote", msgHash, reason: recovery.reason };
    }
    const balance = ctx.balanceOf(premiumToken, recovery.quoter);
    if (balance < rfqQuote.premium) {
      return { status: "InsufficientFunding", msgHash, quoter: recovery.quoter, balance };
    }
    if (this.pausedQuoters.has(recovery.quoter)) {
      return { status: "QuotesPaused", msgHash, quoter: recovery.quoter };
    }

    const terms = validateQuotedTerms(optionInfo, ctx.now);
    if (typeof terms === "string") {
      return { status: "InvalidQuote", msgHash, reason: terms };
    }

    const feeInfo = ctx.fees.getMatchFeeInfo(distPartner);
    const fees = computeFees(rfqQuote.premium, feeInfo.matchFee, feeInfo.distPartnerShare);
    return {
      status: "Success",
      quote: {
        msgHash,
        quoter: recovery.quoter,
        premium: rfqQuote.premium,
        premiumToken,
        matchFeeProtocol: fees.protocolFee,
        matchFeeDistPartner: fees.partnerFee,
        terms
      }
    };
  }

  markExecuted(msgHash: Hex): void {
    this.usedHashes.add(msgHash);
  }

  isExecuted(msgHash: Hex): boolean {
    return this.usedHashes.has(msgHash);
  }

  togglePause(quoter: Address): boolean {
    const key = getAddress(quoter);
    if (this.pausedQuoters.has(key)) {
      this.pausedQuoters.delete(key);
      return false;
    }
    this.pausedQuoters.add(key);
    return true;
  }

  isPaused(quoter: Address): boolean {
    return this.pausedQuoters.has(getAddress(quoter));
  }
}
