import { ethers } from 'ethers';
import { ValidationError } from '../middleware/errorHandler';
import { normalizeFeedId } from '../services/feeds/feedId';
import { FeedDataWithProof, FeedId } from '../services/feeds/feedTypes';
import { parseUint } from '../utils/serialization';

export function requireFeedIds(value: unknown, field: string): FeedId[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array of feed ids`, field);
  }
  return value.map((item, i) => normalizeFeedId(item, `${field}[${i}]`));
}

export function requireIndex(value: unknown, field: string): number {
  const parsed = parseUint(value);
  if (parsed === undefined || parsed > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError(`${field} must be a non-negative integer`, field);
  }
  return Number(parsed);
}

export function requireIndices(value: unknown, field: string): number[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array of indices`, field);
  }
  return value.map((item, i) => requireIndex(item, `${field}[${i}]`));
}

export function requireAddresses(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty array of addresses`, field);
  }
  return value.map((item, i) => {
    if (typeof item !== 'string' || !ethers.isAddress(item)) {
      throw new ValidationError(`${field}[${i}] must be an address`, `${field}[${i}]`);
    }
    return item;
  });
}

/** Attached payment in wei; defaults to zero. */
export function optionalValue(value: unknown): bigint {
  if (value === undefined) {
    return 0n;
  }
  const parsed = parseUint(value);
  if (parsed === undefined) {
    throw new ValidationError('value must be a non-negative integer amount of wei', 'value');
  }
  return parsed;
}

export type FeedSelector =
  | { kind: 'feedId'; feedId: FeedId }
  | { kind: 'feedIds'; feedIds: FeedId[] }
  | { kind: 'index'; index: number }
  | { kind: 'indices'; indices: number[] };

/**
 * Reads exactly one of feedId, feedIds, index or indices from a request body.
 */
export function requireFeedSelector(body: Record<string, unknown>): FeedSelector {
  const present = ['feedId', 'feedIds', 'index', 'indices'].filter(key => body[key] !== undefined);
  if (present.length !== 1) {
    throw new ValidationError('exactly one of feedId, feedIds, index or indices is required');
  }
  switch (present[0]) {
    case 'feedId':
      return { kind: 'feedId', feedId: normalizeFeedId(body.feedId) };
    case 'feedIds':
      return { kind: 'feedIds', feedIds: requireFeedIds(body.feedIds, 'feedIds') };
    case 'index':
      return { kind: 'index', index: requireIndex(body.index, 'index') };
    default:
      return { kind: 'indices', indices: requireIndices(body.indices, 'indices') };
  }
}

export function requireBody(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

function requireInteger(value: unknown, field: string, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${field} must be an integer in [${min}, ${max}]`, field);
  }
  return value;
}

export function requireFeedDataWithProof(body: Record<string, unknown>): FeedDataWithProof {
  const { proof, body: data } = body;
  if (!Array.isArray(proof)) {
    throw new ValidationError('proof must be an array of 32 byte hashes', 'proof');
  }
  const hashes = proof.map((item, i) => {
    if (typeof item !== 'string' || !/^0x[0-9a-fA-F]{64}$/.test(item)) {
      throw new ValidationError(`proof[${i}] must be a 32 byte hash`, `proof[${i}]`);
    }
    return item.toLowerCase();
  });
  const feed = requireBody(data);
  return {
    proof: hashes,
    body: {
      votingRoundId: requireInteger(feed.votingRoundId, 'body.votingRoundId', 0, 0xffffffff),
      id: normalizeFeedId(feed.id, 'body.id'),
      value: requireInteger(feed.value, 'body.value', -(2 ** 31), 2 ** 31 - 1),
      turnoutBIPS: requireInteger(feed.turnoutBIPS, 'body.turnoutBIPS', 0, 0xffff),
      decimals: requireInteger(feed.decimals, 'body.decimals', -128, 127)
    }
  };
}
