import type {
  Block,
  BlockFetchResult,
  BlockSink,
  LatestBlockResult,
  Provider,
  ProviderClient,
} from '../types/index.js';

/**
 * Build a test block for slot `n`
 */
export function makeBlock(n: number): Block {
  return {
    number: n,
    parentNumber: n - 1,
    hash: `hash-${n}`,
    timestamp: 1000 + 10 * n,
    height: n,
    transactions: [`sig-${n}`],
    transactionCount: 1,
  };
}

/**
 * In-memory provider client. Holds blocks 1..latest unless told otherwise.
 */
export class FakeChain implements ProviderClient {
  latest: number;
  latestError: Error | null = null;

  /** Slots whose getBlock fails with a transport error */
  readonly failing = new Set<number>();
  /** Slots the provider has no data for yet */
  readonly missing = new Set<number>();
  /** Slots the provider reports as skipped */
  readonly skipped = new Set<number>();

  latestCalls = 0;
  readonly blockCalls: number[] = [];

  constructor(latest: number) {
    this.latest = latest;
  }

  async getLatestBlockNumber(): Promise<LatestBlockResult> {
    this.latestCalls++;
    if (this.latestError) {
      return { ok: false, error: this.latestError };
    }
    return { ok: true, blockNumber: this.latest };
  }

  async getBlock(blockNumber: number): Promise<BlockFetchResult> {
    this.blockCalls.push(blockNumber);
    if (this.failing.has(blockNumber)) {
      return { kind: 'error', error: new Error(`block ${blockNumber} unavailable`) };
    }
    if (this.skipped.has(blockNumber)) {
      return { kind: 'skipped' };
    }
    if (this.missing.has(blockNumber) || blockNumber > this.latest) {
      return { kind: 'not-found' };
    }
    return { kind: 'found', block: makeBlock(blockNumber) };
  }
}

export function provider(name: string, client: ProviderClient): Provider {
  return { name, client };
}

/**
 * Sink that remembers (block number, provider) pairs
 */
export class RecordingSink implements BlockSink {
  readonly emitted: Array<[number, string]> = [];

  emit(block: Block, providerName: string): void {
    this.emitted.push([block.number, providerName]);
  }

  numbers(): number[] {
    return this.emitted.map(([n]) => n);
  }
}

/**
 * Sleep stand-in that records requested delays and returns immediately
 */
export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
