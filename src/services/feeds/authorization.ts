import { ethers } from 'ethers';
import { AuthorizationGate } from './feedTypes';

/**
 * Authorizes a fixed set of governance addresses (checksum-insensitive).
 */
export class AllowListAuthorizationGate implements AuthorizationGate {
  private readonly allowed: Set<string>;

  constructor(addresses: string[]) {
    this.allowed = new Set(addresses.map(address => ethers.getAddress(address)));
  }

  async isAuthorized(caller: string): Promise<boolean> {
    if (!ethers.isAddress(caller)) {
      return false;
    }
    return this.allowed.has(ethers.getAddress(caller));
  }
}
