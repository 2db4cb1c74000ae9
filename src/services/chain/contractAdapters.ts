import { ethers } from 'ethers';
import { logger } from '../../utils/logger';
import { ChainError, NotFoundError } from '../../middleware/errorHandler';
import {
  CalculatedFeed,
  FeedId,
  FeedValue,
  FeedValues,
  FeeSchedule,
  Hash32,
  IndexedFeedSource,
  RootPublisher
} from '../feeds/feedTypes';

// Minimal ABIs of the deployed protocol contracts
export const FAST_UPDATER_ABI = [
  'function fetchCurrentFeeds(uint256[] _indices) external payable returns (uint256[] _feeds, int8[] _decimals, uint64 _timestamp)'
];

export const FAST_UPDATES_CONFIGURATION_ABI = [
  'function getFeedIndex(bytes21 _feedId) external view returns (uint256)',
  'function getFeedId(uint256 _index) external view returns (bytes21)',
  'function getFeedIds() external view returns (bytes21[])'
];

export const FEE_CALCULATOR_ABI = [
  'function calculateFeeByIds(bytes21[] _feedIds) external view returns (uint256)',
  'function calculateFeeByIndices(uint256[] _indices) external view returns (uint256)'
];

export const CALCULATED_FEED_ABI = [
  'function feedId() external view returns (bytes21)',
  'function calculateFee() external view returns (uint256)',
  'function getCurrentFeed() external payable returns (uint256 _value, int8 _decimals, uint64 _timestamp)'
];

export const RELAY_ABI = [
  'function merkleRoots(uint256 _protocolId, uint256 _votingRoundId) external view returns (bytes32)'
];

function toBigInt(value: unknown, field: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  throw new ChainError(`Unexpected ${field} in contract result`, { field });
}

function toNumber(value: unknown, field: string): number {
  return Number(toBigInt(value, field));
}

function toHex(value: unknown, field: string): string {
  if (typeof value === 'string' && ethers.isHexString(value)) return value.toLowerCase();
  throw new ChainError(`Unexpected ${field} in contract result`, { field });
}

function toList(value: unknown, field: string): unknown[] {
  if (Array.isArray(value)) return [...value];
  throw new ChainError(`Unexpected ${field} in contract result`, { field });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function call(contract: ethers.Contract, method: string, args: unknown[], value?: bigint): Promise<unknown> {
  try {
    const fn = contract.getFunction(method);
    return value === undefined
      ? await fn.staticCall(...args)
      : await fn.staticCall(...args, { value });
  } catch (error: unknown) {
    if (ethers.isError(error, 'CALL_EXCEPTION')) {
      throw error;
    }
    logger.error('Contract call failed', { method, error: describeError(error) });
    throw new ChainError(`Contract call ${method} failed: ${describeError(error)}`);
  }
}

/**
 * Fast update feeds: configuration (id <-> index) plus the updater that serves values.
 * Payable reads are evaluated with eth_call carrying the forwarded value.
 */
export class FastUpdaterFeedSource implements IndexedFeedSource {
  private readonly updater: ethers.Contract;
  private readonly configuration: ethers.Contract;

  constructor(updaterAddress: string, configurationAddress: string, runner: ethers.ContractRunner) {
    this.updater = new ethers.Contract(updaterAddress, FAST_UPDATER_ABI, runner);
    this.configuration = new ethers.Contract(configurationAddress, FAST_UPDATES_CONFIGURATION_ABI, runner);
  }

  async idToIndex(feedId: FeedId): Promise<number> {
    try {
      return toNumber(await call(this.configuration, 'getFeedIndex', [feedId]), 'index');
    } catch (error: unknown) {
      if (ethers.isError(error, 'CALL_EXCEPTION')) {
        throw new NotFoundError('feed does not exist', { feedId, reason: error.reason ?? undefined });
      }
      throw error;
    }
  }

  async indexToId(index: number): Promise<FeedId> {
    return toHex(await call(this.configuration, 'getFeedId', [index]), 'feedId');
  }

  async listIds(): Promise<FeedId[]> {
    const ids = toList(await call(this.configuration, 'getFeedIds', []), 'feedIds');
    return ids.map(id => toHex(id, 'feedId'));
  }

  async fetchBatch(indices: number[], value: bigint): Promise<FeedValues> {
    const result = toList(await call(this.updater, 'fetchCurrentFeeds', [indices], value), 'feeds');
    return {
      values: toList(result[0], 'feeds').map(v => toBigInt(v, 'feed value')),
      decimals: toList(result[1], 'decimals').map(d => toNumber(d, 'decimals')),
      timestamp: toBigInt(result[2], 'timestamp')
    };
  }
}

export class CalculatedFeedContract implements CalculatedFeed {
  readonly address: string;
  private readonly contract: ethers.Contract;

  constructor(address: string, runner: ethers.ContractRunner) {
    this.address = ethers.getAddress(address);
    this.contract = new ethers.Contract(this.address, CALCULATED_FEED_ABI, runner);
  }

  async feedId(): Promise<FeedId> {
    return toHex(await call(this.contract, 'feedId', []), 'feedId');
  }

  async calculateFee(): Promise<bigint> {
    return toBigInt(await call(this.contract, 'calculateFee', []), 'fee');
  }

  async fetchOne(value: bigint): Promise<FeedValue> {
    const result = toList(await call(this.contract, 'getCurrentFeed', [], value), 'feed');
    return {
      value: toBigInt(result[0], 'feed value'),
      decimals: toNumber(result[1], 'decimals'),
      timestamp: toBigInt(result[2], 'timestamp')
    };
  }
}

export class FeeCalculatorContract implements FeeSchedule {
  private readonly contract: ethers.Contract;

  constructor(address: string, runner: ethers.ContractRunner) {
    this.contract = new ethers.Contract(address, FEE_CALCULATOR_ABI, runner);
  }

  async feeForIds(feedIds: FeedId[]): Promise<bigint> {
    return toBigInt(await call(this.contract, 'calculateFeeByIds', [feedIds]), 'fee');
  }

  async feeForIndices(indices: number[]): Promise<bigint> {
    return toBigInt(await call(this.contract, 'calculateFeeByIndices', [indices]), 'fee');
  }
}

export class RelayRootPublisher implements RootPublisher {
  private readonly contract: ethers.Contract;

  constructor(address: string, runner: ethers.ContractRunner) {
    this.contract = new ethers.Contract(address, RELAY_ABI, runner);
  }

  async rootFor(protocolId: number, votingRoundId: number): Promise<Hash32> {
    return toHex(await call(this.contract, 'merkleRoots', [protocolId, votingRoundId]), 'merkleRoot');
  }
}
