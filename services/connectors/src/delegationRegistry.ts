import { getAddress, type Address, type Hex } from "viem";
import type { DelegationRegistry } from "@strikehouse/matching";

export class InMemoryDelegationRegistry implements DelegationRegistry {
  private delegations = new Map<string, Address>();

  setDelegate(holder: Address, spaceId: Hex, delegate: Address): void {
    this.delegations.set(`${getAddress(holder)}:${spaceId.toLowerCase()}`, getAddress(delegate));
  }

  delegation(holder: Address, spaceId: Hex): Address | null {
    return this.delegations.get(`${getAddress(holder)}:${spaceId.toLowerCase()}`) ?? null;
  }
}
