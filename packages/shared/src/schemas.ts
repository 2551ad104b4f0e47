import { getAddress, isAddress, isHex, type Address, type Hex } from "viem";
import { z } from "zod";

export const addressSchema = z
  .custom<Address>((value) => typeof value === "string" && isAddress(value, { strict: false }), {
    message: "expected a 20-byte hex address"
  })
  .transform((value) => getAddress(value));

export const hexSchema = z.custom<Hex>((value) => typeof value === "string" && isHex(value), {
  message: "expected 0x-prefixed hex"
});

/** Token amount in base units, carried as an integer string. */
export const amountSchema = z
  .string()
  .regex(/^\d+$/, "expected a base-unit integer string")
  .transform((value) => BigInt(value));

export const signedIntegerSchema = z
  .string()
  .regex(/^-?\d+$/, "expected an integer string")
  .transform((value) => BigInt(value));

/** Fraction of notional or spot as a decimal string, e.g. "0.015". */
export const ratioSchema = z.string().regex(/^\d+(\.\d{1,18})?$/, "expected a decimal string with at most 18 places");

export const timestampSchema = z.number().int().nonnegative();

export const durationSchema = z.number().int().nonnegative();

export const advancedSettingsSchema = z.object({
  borrowCap: ratioSchema.default("0"),
  oracle: addressSchema,
  premiumTokenIsUnderlying: z.boolean().default(false),
  votingDelegationAllowed: z.boolean().default(false),
  allowedDelegateRegistry: addressSchema.nullable().default(null)
});

export const auctionTermsSchema = z.object({
  underlyingToken: addressSchema,
  settlementToken: addressSchema,
  notional: amountSchema,
  advancedSettings: advancedSettingsSchema
});

export const optionInfoSchema = auctionTermsSchema.extend({
  strike: amountSchema,
  expiry: timestampSchema,
  earliestExercise: timestampSchema
});

export const auctionScheduleSchema = z.object({
  relStrike: ratioSchema,
  relPremiumStart: ratioSchema,
  relPremiumFloor: ratioSchema,
  decayStartTime: timestampSchema,
  decayDuration: durationSchema,
  minSpot: amountSchema,
  maxSpot: amountSchema,
  tenor: durationSchema,
  earliestExerciseTenor: durationSchema
});

export const rfqQuoteSchema = z.object({
  premium: amountSchema,
  validUntil: timestampSchema,
  signature: hexSchema,
  eip1271Maker: addressSchema.nullable().default(null)
});

export const rfqSchema = z.object({
  optionInfo: optionInfoSchema,
  rfqQuote: rfqQuoteSchema
});

const senderSchema = z.object({ sender: addressSchema });

export const createAuctionRequestSchema = senderSchema.extend({
  escrowOwner: addressSchema,
  terms: auctionTermsSchema,
  schedule: auctionScheduleSchema,
  distPartner: addressSchema.nullable().default(null)
});

export const previewBidRequestSchema = z.object({
  relBid: ratioSchema,
  refSpot: amountSchema,
  oracleData: hexSchema.default("0x")
});

export const bidRequestSchema = previewBidRequestSchema.merge(senderSchema).extend({
  optionReceiver: addressSchema
});

export const previewQuoteRequestSchema = z.object({
  rfq: rfqSchema,
  distPartner: addressSchema.nullable().default(null)
});

export const takeQuoteRequestSchema = previewQuoteRequestSchema.merge(senderSchema).extend({
  escrowOwner: addressSchema
});

export const pauseQuotesRequestSchema = senderSchema;

export const mintOptionRequestSchema = senderSchema.extend({
  optionReceiver: addressSchema,
  escrowOwner: addressSchema,
  optionInfo: optionInfoSchema,
  naming: z.object({ name: z.string(), symbol: z.string() }),
  distPartner: addressSchema.nullable().default(null)
});

export const exerciseRequestSchema = senderSchema.extend({
  receiver: addressSchema,
  amount: amountSchema,
  payInSettlementToken: z.boolean().default(true),
  oracleData: hexSchema.default("0x")
});

export const positionRequestSchema = senderSchema.extend({
  receiver: addressSchema,
  amount: amountSchema
});

export const withdrawRequestSchema = senderSchema.extend({
  to: addressSchema,
  token: addressSchema,
  amount: amountSchema
});

export const redeemRequestSchema = senderSchema.extend({
  to: addressSchema
});

export const transferOwnershipRequestSchema = senderSchema.extend({
  newOwner: addressSchema
});

export const optionTransferRequestSchema = senderSchema.extend({
  to: addressSchema,
  amount: amountSchema
});

export const votingRequestSchema = z.discriminatedUnion("kind", [
  senderSchema.extend({ kind: z.literal("onChain"), delegatee: addressSchema }),
  senderSchema.extend({ kind: z.literal("offChain"), spaceId: hexSchema, delegate: addressSchema })
]);

export const oracleAnswerRequestSchema = z.object({
  token: addressSchema,
  answer: signedIntegerSchema,
  updatedAt: timestampSchema.optional()
});

export const faucetRequestSchema = z.object({
  token: addressSchema,
  to: addressSchema,
  amount: amountSchema
});

export const getEscrowsQuerySchema = z.object({
  from: z.coerce.number().int().nonnegative().default(0),
  num: z.coerce.number().int().positive().optional()
});

export const auditLogQuerySchema = z.object({
  limit: z.coerce.number().int().positive().default(200)
});

export const addressParamsSchema = z.object({
  address: addressSchema
});

export const holderParamsSchema = z.object({
  holder: addressSchema
});

export type AuctionTermsInput = z.infer<typeof auctionTermsSchema>;
export type OptionInfoInput = z.infer<typeof optionInfoSchema>;
export type AuctionScheduleInput = z.infer<typeof auctionScheduleSchema>;
export type RfqInput = z.infer<typeof rfqSchema>;
export type VotingRequest = z.infer<typeof votingRequestSchema>;
