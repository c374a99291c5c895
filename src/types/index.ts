/**
 * Types for the block stream
 * A "block number" is a Solana slot.
 */

/**
 * A fully fetched block, as emitted to the sink
 */
export interface Block {
  number: number;
  parentNumber: number;
  hash: string;
  timestamp: number | null;   // seconds since epoch, as reported by the node
  height: number | null;
  transactions: string[];     // first signature of each transaction
  transactionCount: number;
}

export type LatestBlockResult =
  | { ok: true; blockNumber: number }
  | { ok: false; error: Error };

/**
 * Outcome of fetching one block by number.
 * - found: block data returned
 * - not-found: provider has no data for it (yet)
 * - skipped: provider positively reports the slot will never hold a block
 * - error: transport fault or malformed data
 */
export type BlockFetchResult =
  | { kind: 'found'; block: Block }
  | { kind: 'not-found' }
  | { kind: 'skipped' }
  | { kind: 'error'; error: Error };

/**
 * Capability the streamer needs from a remote data source
 */
export interface ProviderClient {
  getLatestBlockNumber(): Promise<LatestBlockResult>;
  getBlock(blockNumber: number): Promise<BlockFetchResult>;
}

export interface Provider {
  readonly name: string;
  readonly client: ProviderClient;
}

/**
 * Accepted provider specifications, resolved once into a Provider
 */
export type ProviderSpec =
  | string
  | { url: string; name?: string }
  | { client: ProviderClient; name?: string };

/**
 * Watermark of the stream. `lastBlock` is null until the first successful poll.
 */
export interface StreamCursor {
  lastBlock: number | null;
  lastBlockTime: number | null;   // wall-clock ms
}

/**
 * Where emitted blocks go
 */
export interface BlockSink {
  emit(block: Block, providerName: string): void | Promise<void>;
}
