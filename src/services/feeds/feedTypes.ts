// Feed registry data types and collaborator interfaces

/**
 * Hex-encoded 21 byte feed id, lowercase with 0x prefix (44 characters).
 * The first byte is the feed category.
 */
export type FeedId = string;

/** 32 byte hash, lowercase hex with 0x prefix. */
export type Hash32 = string;

export interface FeedValue {
  value: bigint;
  decimals: number;
  timestamp: bigint;
}

export interface FeedValues {
  values: bigint[];
  decimals: number[];
  timestamp: bigint;
}

export interface FeedValueInWei {
  value: bigint;
  timestamp: bigint;
}

export interface FeedValuesInWei {
  values: bigint[];
  timestamp: bigint;
}

/**
 * Feed record produced by the voting protocol. Only used as the payload
 * hashed into the Merkle tree published for each voting round.
 */
export interface FeedData {
  readonly votingRoundId: number; // uint32
  readonly id: FeedId;
  readonly value: number; // int32
  readonly turnoutBIPS: number; // uint16
  readonly decimals: number; // int8
}

export interface FeedDataWithProof {
  readonly proof: readonly Hash32[];
  readonly body: FeedData;
}

export interface FeedIdChange {
  oldFeedId: FeedId;
  newFeedId: FeedId;
}

export interface CalculatedFeedInfo {
  feedId: FeedId;
  address: string;
}

/**
 * Index-addressed ("fast update") feed source.
 */
export interface IndexedFeedSource {
  /** Rejects when the feed is not configured. */
  idToIndex(feedId: FeedId): Promise<number>;
  /** Zero feed id when the index is unused. */
  indexToId(index: number): Promise<FeedId>;
  /** All configured ids by index; removed slots hold the zero feed id. */
  listIds(): Promise<FeedId[]>;
  fetchBatch(indices: number[], value: bigint): Promise<FeedValues>;
}

/**
 * Derived feed computed on demand by an external contract.
 */
export interface CalculatedFeed {
  readonly address: string;
  feedId(): Promise<FeedId>;
  calculateFee(): Promise<bigint>;
  fetchOne(value: bigint): Promise<FeedValue>;
}

export interface FeeSchedule {
  feeForIds(feedIds: FeedId[]): Promise<bigint>;
  feeForIndices(indices: number[]): Promise<bigint>;
}

export interface RootPublisher {
  rootFor(protocolId: number, votingRoundId: number): Promise<Hash32>;
}

export interface AuthorizationGate {
  isAuthorized(caller: string): Promise<boolean>;
}
