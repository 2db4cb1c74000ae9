import { ethers } from 'ethers';
import { InvalidProofError } from '../../middleware/errorHandler';
import { normalizeFeedId } from './feedId';
import { FeedData, FeedDataWithProof, Hash32, RootPublisher } from './feedTypes';

const FEED_DATA_TYPES = ['uint32', 'bytes21', 'int32', 'uint16', 'int8'];

/** keccak256 of the ABI encoded (votingRoundId, id, value, turnoutBIPS, decimals) tuple */
export function hashFeedData(body: FeedData): Hash32 {
  const encoded = ethers.AbiCoder.defaultAbiCoder().encode(FEED_DATA_TYPES, [
    body.votingRoundId,
    normalizeFeedId(body.id, 'body.id'),
    body.value,
    body.turnoutBIPS,
    body.decimals
  ]);
  return ethers.keccak256(encoded);
}

/** Hashes the pair in ascending byte order so either sibling order gives the same node. */
export function hashPair(a: Hash32, b: Hash32): Hash32 {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right
    ? ethers.keccak256(ethers.concat([left, right]))
    : ethers.keccak256(ethers.concat([right, left]));
}

export function processProof(proof: readonly Hash32[], leaf: Hash32): Hash32 {
  return proof.reduce((node, sibling) => hashPair(node, sibling), leaf.toLowerCase());
}

export class ProofVerifier {
  constructor(
    private readonly rootPublisher: RootPublisher,
    private readonly protocolId: number
  ) {}

  /** Resolves to true or rejects with InvalidProofError. */
  async verify(feedData: FeedDataWithProof): Promise<true> {
    const leaf = hashFeedData(feedData.body);
    const root = await this.rootPublisher.rootFor(this.protocolId, feedData.body.votingRoundId);
    if (processProof(feedData.proof, leaf) !== root.toLowerCase()) {
      throw new InvalidProofError(feedData.body.votingRoundId);
    }
    return true;
  }
}
