import { isAddressEqual, zeroAddress, type Address } from "viem";
import { MAX_UINT128, MAX_UINT48, MIN_EXERCISE_WINDOW } from "./constants";
import { fail } from "./errors";
import { Ratio } from "./fixedPoint";
import { computeStrike } from "./pricingMath";
import type { AdvancedSettings, AuctionSchedule, AuctionTerms, OptionTerms } from "./types";

export type OracleLookup = (oracle: Address) => boolean;

function validateTokenPair(underlying: Address, settlement: Address): void {
  if (
    isAddressEqual(underlying, zeroAddress) ||
    isAddressEqual(settlement, zeroAddress) ||
    isAddressEqual(underlying, settlement)
  ) {
    fail("InvalidTokenPair", "Underlying and settlement tokens must be distinct");
  }
}

function validateNotional(notional: bigint): void {
  if (notional <= 0n || notional > MAX_UINT128) {
    fail("InvalidNotional", `Notional out of range: ${notional}`);
  }
}

function validateBorrowCap(settings: AdvancedSettings): void {
  if (settings.borrowCap.gt(Ratio.ONE)) {
    fail("InvalidBorrowCap", `Borrow cap above 100%: ${settings.borrowCap.toString()}`);
  }
}

function validateTimestamp(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0 && value <= MAX_UINT48;
}

function validateExerciseWindow(expiry: number, earliestExercise: number, now: number): void {
  if (!validateTimestamp(expiry) || expiry <= now) {
    fail("InvalidExpiry", `Expiry must lie in the future: ${expiry}`);
  }
  if (!validateTimestamp(earliestExercise) || earliestExercise + MIN_EXERCISE_WINDOW > expiry) {
    fail(
      "InvalidEarliestExercise",
      `Earliest exercise must leave at least ${MIN_EXERCISE_WINDOW}s before expiry`
    );
  }
}

function freezeTerms(terms: OptionTerms): OptionTerms {
  return Object.freeze({
    ...terms,
    advancedSettings: Object.freeze({ ...terms.advancedSettings })
  });
}

export function validateAuction(
  terms: AuctionTerms,
  schedule: AuctionSchedule,
  isKnownOracle: OracleLookup
): void {
  validateTokenPair(terms.underlyingToken, terms.settlementToken);
  validateNotional(terms.notional);

  if (schedule.relStrike.isZero()) {
    fail("InvalidStrike", "Relative strike must be positive");
  }
  if (!Number.isSafeInteger(schedule.tenor) || schedule.tenor <= 0) {
    fail("InvalidTenor", "Tenor must be positive");
  }
  if (
    !Number.isSafeInteger(schedule.earliestExerciseTenor) ||
    schedule.earliestExerciseTenor < 0 ||
    schedule.earliestExerciseTenor + MIN_EXERCISE_WINDOW > schedule.tenor
  ) {
    fail(
      "InvalidEarliestExerciseTenor",
      `Tenor must exceed earliest exercise tenor by at least ${MIN_EXERCISE_WINDOW}s`
    );
  }
  if (schedule.relPremiumFloor.isZero() || schedule.relPremiumStart.lt(schedule.relPremiumFloor)) {
    fail("InvalidRelPremiums", "Premium start must be at or above a positive floor");
  }
  if (!validateTimestamp(schedule.decayStartTime) || !Number.isSafeInteger(schedule.decayDuration) || schedule.decayDuration < 0) {
    fail("InvalidRelPremiums", "Decay schedule must use non-negative whole seconds");
  }
  if (schedule.minSpot <= 0n || schedule.minSpot > schedule.maxSpot) {
    fail("InvalidMinMaxSpot", `Spot band inverted or empty: [${schedule.minSpot}, ${schedule.maxSpot}]`);
  }

  const oracle = terms.advancedSettings.oracle;
  if (isAddressEqual(oracle, zeroAddress) || !isKnownOracle(oracle)) {
    fail("InvalidOracle", `Oracle not registered: ${oracle}`);
  }
  validateBorrowCap(terms.advancedSettings);
}

export function fromAuctionMatch(
  terms: AuctionTerms,
  schedule: AuctionSchedule,
  oracleSpot: bigint,
  now: number
): OptionTerms {
  const strike = computeStrike(oracleSpot, schedule.relStrike);
  if (strike <= 0n || strike > MAX_UINT128) {
    fail("InvalidStrike", `Strike out of range at match: ${strike}`);
  }

  const expiry = now + schedule.tenor;
  const earliestExercise = now + schedule.earliestExerciseTenor;
  validateExerciseWindow(expiry, earliestExercise, now);

  return freezeTerms({
    underlyingToken: terms.underlyingToken,
    settlementToken: terms.settlementToken,
    notional: terms.notional,
    strike,
    expiry,
    earliestExercise,
    advancedSettings: terms.advancedSettings
  });
}

export function fromRFQ(optionInfo: OptionTerms, now: number): OptionTerms {
  validateTokenPair(optionInfo.underlyingToken, optionInfo.settlementToken);
  validateNotional(optionInfo.notional);
  if (optionInfo.strike <= 0n || optionInfo.strike > MAX_UINT128) {
    fail("InvalidStrike", `Strike out of range: ${optionInfo.strike}`);
  }
  validateExerciseWindow(optionInfo.expiry, optionInfo.earliestExercise, now);
  validateBorrowCap(optionInfo.advancedSettings);
  return freezeTerms(optionInfo);
}

export function fromDirectMint(optionInfo: OptionTerms, now: number): OptionTerms {
  validateTokenPair(optionInfo.underlyingToken, optionInfo.settlementToken);
  validateNotional(optionInfo.notional);
  if (optionInfo.strike > MAX_UINT128) {
    fail("InvalidStrike", `Strike out of range: ${optionInfo.strike}`);
  }
  validateExerciseWindow(optionInfo.expiry, optionInfo.earliestExercise, now);
  validateBorrowCap(optionInfo.advancedSettings);
  return freezeTerms(optionInfo);
}
