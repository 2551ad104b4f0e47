import { getAddress, isAddressEqual, type Address } from "viem";
import { MAX_EXERCISE_FEE, MAX_MATCH_FEE, MAX_MINT_FEE } from "./constants";
import { fail } from "./errors";
import { Ratio } from "./fixedPoint";

export interface FeeHandlerConfig {
  address: Address;
  owner: Address;
  matchFee: Ratio;
  exerciseFee: Ratio;
  mintFee: Ratio;
}

export class FeeHandler {
  readonly address: Address;
  private ownerValue: Address;
  private matchFeeValue = Ratio.ZERO;
  private exerciseFeeValue = Ratio.ZERO;
  private mintFeeValue = Ratio.ZERO;
  private distPartnerFeeShares = new Map<Address, Ratio>();

  constructor(config: FeeHandlerConfig) {
    this.address = getAddress(config.address);
    this.ownerValue = getAddress(config.owner);
    this.applyMatchFee(config.matchFee);
    this.applyExerciseFee(config.exerciseFee);
    this.applyMintFee(config.mintFee);
  }

  get owner(): Address {
    return this.ownerValue;
  }

  get matchFee(): Ratio {
    return this.matchFeeValue;
  }

  get exerciseFee(): Ratio {
    return this.exerciseFeeValue;
  }

  get mintFee(): Ratio {
    return this.mintFeeValue;
  }

  distPartnerFeeShare(partner: Address | null): Ratio {
    if (!partner) {
      return Ratio.ZERO;
    }
    return this.distPartnerFeeShares.get(getAddress(partner)) ?? Ratio.ZERO;
  }

  distPartnerFeeSharesList(): Array<[Address, Ratio]> {
    return [...this.distPartnerFeeShares.entries()];
  }

  setMatchFee(sender: Address, fee: Ratio): void {
    this.requireOwner(sender);
    this.applyMatchFee(fee);
  }

  setExerciseFee(sender: Address, fee: Ratio): void {
    this.requireOwner(sender);
    this.applyExerciseFee(fee);
  }

  setMintFee(sender: Address, fee: Ratio): void {
    this.requireOwner(sender);
    this.applyMintFee(fee);
  }

  setDistPartnerFeeShares(sender: Address, partners: readonly Address[], shares: readonly Ratio[]): void {
    this.requireOwner(sender);
    if (partners.length === 0 || partners.length !== shares.length) {
      fail("InvalidArrayLength", `Got ${partners.length} partners and ${shares.length} shares`);
    }
    const updates = partners.map((partner, i) => {
      const share = shares[i];
      if (!share || share.gt(Ratio.ONE)) {
        return fail("InvalidDistPartnerFeeShare", `Share for ${partner} exceeds 100%`);
      }
      if (this.distPartnerFeeShare(partner).eq(share)) {
        return fail("DistPartnerFeeAlreadySet", `Share for ${partner} is already ${share.toString()}`);
      }
      return [getAddress(partner), share] as const;
    });
    for (const [partner, share] of updates) {
      this.distPartnerFeeShares.set(partner, share);
    }
  }

  transferOwnership(sender: Address, newOwner: Address): void {
    this.requireOwner(sender);
    this.ownerValue = getAddress(newOwner);
  }

  private requireOwner(sender: Address): void {
    if (!isAddressEqual(sender, this.ownerValue)) {
      fail("InvalidSender", `${sender} does not own the fee handler`);
    }
  }

  private applyMatchFee(fee: Ratio): void {
    if (fee.wad > MAX_MATCH_FEE) {
      fail("InvalidMatchFee", `Match fee above maximum: ${fee.toString()}`);
    }
    this.matchFeeValue = fee;
  }

  private applyExerciseFee(fee: Ratio): void {
    if (fee.wad > MAX_EXERCISE_FEE) {
      fail("InvalidExerciseFee", `Exercise fee above maximum: ${fee.toString()}`);
    }
    this.exerciseFeeValue = fee;
  }

  private applyMintFee(fee: Ratio): void {
    if (fee.wad > MAX_MINT_FEE) {
      fail("InvalidMintFee", `Mint fee above maximum: ${fee.toString()}`);
    }
    this.mintFeeValue = fee;
  }
}
