import { getAddress, isAddressEqual, zeroAddress, type Address } from "viem";
import { fail } from "./errors";

export class OptionToken {
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(
    readonly name: string,
    readonly symbol: string,
    readonly decimals: number
  ) {}

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(getAddress(holder)) ?? 0n;
  }

  holders(): Array<[Address, bigint]> {
    return [...this.balances.entries()].filter(([, balance]) => balance > 0n);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (isAddressEqual(to, zeroAddress)) {
      fail("InvalidAddress", "Option tokens cannot be sent to the zero address");
    }
    this.assertCanBurn(from, amount);
    this.burn(from, amount);
    this.mint(to, amount);
  }

  assertCanBurn(holder: Address, amount: bigint): void {
    const balance = this.balanceOf(holder);
    if (amount < 0n || balance < amount) {
      fail("InsufficientOptionBalance", `Option balance ${balance} below ${amount} for ${holder}`, {
        holder,
        balance: balance.toString(),
        required: amount.toString()
      });
    }
  }

  mint(to: Address, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    const key = getAddress(to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    this.supply += amount;
  }

  burn(from: Address, amount: bigint): void {
    this.assertCanBurn(from, amount);
    if (amount === 0n) {
      return;
    }
    const key = getAddress(from);
    this.balances.set(key, this.balanceOf(key) - amount);
    this.supply -= amount;
  }
}
