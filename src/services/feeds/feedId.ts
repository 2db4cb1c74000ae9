import { ethers } from 'ethers';
import { ValidationError } from '../../middleware/errorHandler';
import { FeedId } from './feedTypes';

export const FEED_ID_BYTES = 21;
export const MAX_FEED_NAME_BYTES = FEED_ID_BYTES - 1;

export const ZERO_FEED_ID: FeedId = ethers.hexlify(new Uint8Array(FEED_ID_BYTES));

// Categories [32, 64) belong to calculated feeds
const CALCULATED_CATEGORY_MIN = 32;
const CALCULATED_CATEGORY_MAX = 64;

export interface FeedIdParts {
  category: number;
  name: string;
}

export function feedCategory(feedId: FeedId): number {
  return parseInt(feedId.slice(2, 4), 16);
}

export function isCalculatedFeedId(feedId: FeedId): boolean {
  const category = feedCategory(feedId);
  return category >= CALCULATED_CATEGORY_MIN && category < CALCULATED_CATEGORY_MAX;
}

export function isFeedId(value: unknown): value is FeedId {
  return typeof value === 'string' && ethers.isHexString(value, FEED_ID_BYTES);
}

export function isZeroFeedId(feedId: FeedId): boolean {
  return feedId.toLowerCase() === ZERO_FEED_ID;
}

/**
 * Lowercases a feed id so it can be used as a map key.
 * Throws ValidationError when the value is not 21 bytes of hex.
 */
export function normalizeFeedId(value: unknown, field: string = 'feedId'): FeedId {
  if (!isFeedId(value)) {
    throw new ValidationError(`${field} must be a 0x-prefixed ${FEED_ID_BYTES} byte hex string`, field);
  }
  return value.toLowerCase();
}

/**
 * Encodes category and name as a feed id: the category byte followed by the
 * UTF-8 name, right padded with zero bytes.
 */
export function encodeFeedId(parts: FeedIdParts): FeedId {
  if (!Number.isInteger(parts.category) || parts.category < 0 || parts.category > 255) {
    throw new ValidationError(`Invalid feed category: ${parts.category}`, 'category');
  }
  const name = ethers.toUtf8Bytes(parts.name);
  if (name.length > MAX_FEED_NAME_BYTES) {
    throw new ValidationError(`Feed name too long: ${parts.name}`, 'name');
  }
  return ethers.zeroPadBytes(ethers.concat([Uint8Array.of(parts.category), name]), FEED_ID_BYTES);
}

export function encodeFeedIds(parts: FeedIdParts[]): FeedId[] {
  return parts.map(encodeFeedId);
}

export function decodeFeedId(feedId: FeedId): FeedIdParts {
  const bytes = ethers.getBytes(normalizeFeedId(feedId));
  let end = bytes.length;
  while (end > 1 && bytes[end - 1] === 0) {
    end--;
  }
  return {
    category: bytes[0],
    name: ethers.toUtf8String(bytes.slice(1, end))
  };
}
