import { getAddress, type Address } from "viem";
import { fail } from "./errors";
import type { Transfer } from "./types";

export interface TokenInfo {
  address: Address;
  symbol: string;
  decimals: number;
}

export interface TokenLedger {
  decimals(token: Address): number;
  balanceOf(token: Address, holder: Address): bigint;
  settle(transfers: readonly Transfer[]): void;
  delegate(token: Address, holder: Address, delegatee: Address): void;
}

type BalanceKey = `${Address}:${Address}`;

function balanceKey(token: Address, holder: Address): BalanceKey {
  return `${getAddress(token)}:${getAddress(holder)}`;
}

export class InMemoryTokenLedger implements TokenLedger {
  private tokens = new Map<Address, TokenInfo>();
  private balances = new Map<BalanceKey, bigint>();
  private delegates = new Map<BalanceKey, Address>();

  registerToken(info: TokenInfo): void {
    if (!Number.isInteger(info.decimals) || info.decimals < 0 || info.decimals > 36) {
      throw new Error(`Invalid token decimals for ${info.symbol}: ${info.decimals}`);
    }
    this.tokens.set(getAddress(info.address), { ...info, address: getAddress(info.address) });
  }

  listTokens(): TokenInfo[] {
    return [...this.tokens.values()];
  }

  tokenInfo(token: Address): TokenInfo {
    const info = this.tokens.get(getAddress(token));
    if (!info) {
      return fail("UnknownToken", `Token not registered: ${token}`);
    }
    return info;
  }

  decimals(token: Address): number {
    return this.tokenInfo(token).decimals;
  }

  balanceOf(token: Address, holder: Address): bigint {
    this.tokenInfo(token);
    return this.balances.get(balanceKey(token, holder)) ?? 0n;
  }

  mint(token: Address, to: Address, amount: bigint): void {
    this.tokenInfo(token);
    if (amount < 0n) {
      throw new RangeError("Mint amount must be non-negative");
    }
    const key = balanceKey(token, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    this.settle([{ token, from, to, amount }]);
  }

  settle(transfers: readonly Transfer[]): void {
    const pending = new Map<BalanceKey, bigint>();
    const read = (key: BalanceKey) => pending.get(key) ?? this.balances.get(key) ?? 0n;

    for (const transfer of transfers) {
      this.tokenInfo(transfer.token);
      if (transfer.amount < 0n) {
        throw new RangeError("Transfer amount must be non-negative");
      }
      if (transfer.amount === 0n) {
        continue;
      }
      const fromKey = balanceKey(transfer.token, transfer.from);
      const available = read(fromKey);
      if (available < transfer.amount) {
        fail("InsufficientBalance", `Insufficient ${this.tokenInfo(transfer.token).symbol} balance for ${transfer.from}`, {
          token: transfer.token,
          holder: transfer.from,
          required: transfer.amount.toString(),
          available: available.toString()
        });
      }
      pending.set(fromKey, available - transfer.amount);
      const toKey = balanceKey(transfer.token, transfer.to);
      pending.set(toKey, read(toKey) + transfer.amount);
    }

    for (const [key, balance] of pending) {
      this.balances.set(key, balance);
    }
  }

  delegate(token: Address, holder: Address, delegatee: Address): void {
    this.tokenInfo(token);
    this.delegates.set(balanceKey(token, holder), getAddress(delegatee));
  }

  delegateOf(token: Address, holder: Address): Address | null {
    return this.delegates.get(balanceKey(token, holder)) ?? null;
  }

  holdings(holder: Address): Array<{ token: TokenInfo; balance: bigint }> {
    return this.listTokens().map((token) => ({ token, balance: this.balanceOf(token.address, holder) }));
  }
}
