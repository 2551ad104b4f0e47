import Decimal from "decimal.js";
import { BASE } from "./constants";

export type Rounding = "down" | "up";

// default precision is 20 significant digits; a WAD ratio above 100 needs more
const ExactDecimal = Decimal.clone({ precision: 80 });
const WAD_DECIMAL = new ExactDecimal(BASE.toString());

export function mulDiv(a: bigint, b: bigint, denominator: bigint, rounding: Rounding = "down"): bigint {
  if (denominator <= 0n) {
    throw new RangeError("mulDiv denominator must be positive");
  }
  if (a < 0n || b < 0n) {
    throw new RangeError("mulDiv operands must be non-negative");
  }
  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "up" && product % denominator !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}

export function pow10(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError(`Invalid decimals: ${decimals}`);
  }
  return 10n ** BigInt(decimals);
}

/**
 * A non-negative ratio scaled by 1e18. Used for every "fraction of notional" or
 * "fraction of spot" value so it never mixes with absolute token amounts.
 */
export class Ratio {
  static readonly ZERO = new Ratio(0n);
  static readonly ONE = new Ratio(BASE);

  private constructor(readonly wad: bigint) {}

  static fromWad(wad: bigint): Ratio {
    if (wad < 0n) {
      throw new RangeError(`Ratio cannot be negative: ${wad}`);
    }
    return new Ratio(wad);
  }

  static fromDecimal(value: Decimal.Value): Ratio {
    const decimal = new ExactDecimal(value);
    if (!decimal.isFinite() || decimal.isNegative()) {
      throw new RangeError(`Invalid ratio: ${value.toString()}`);
    }
    return new Ratio(BigInt(decimal.mul(WAD_DECIMAL).toFixed(0, Decimal.ROUND_DOWN)));
  }

  applyTo(amount: bigint, rounding: Rounding = "down"): bigint {
    return mulDiv(amount, this.wad, BASE, rounding);
  }

  isZero(): boolean {
    return this.wad === 0n;
  }

  eq(other: Ratio): boolean {
    return this.wad === other.wad;
  }

  lt(other: Ratio): boolean {
    return this.wad < other.wad;
  }

  lte(other: Ratio): boolean {
    return this.wad <= other.wad;
  }

  gt(other: Ratio): boolean {
    return this.wad > other.wad;
  }

  gte(other: Ratio): boolean {
    return this.wad >= other.wad;
  }

  min(other: Ratio): Ratio {
    return this.wad <= other.wad ? this : other;
  }

  toDecimal(): Decimal {
    return new ExactDecimal(this.wad.toString()).div(WAD_DECIMAL);
  }

  toString(): string {
    return this.toDecimal().toFixed();
  }
}
