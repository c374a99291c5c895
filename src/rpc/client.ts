/**
 * Solana provider client
 *
 * Wraps a @solana/web3.js Connection and turns every RPC outcome into an
 * explicit result variant, so the streamer never branches on exceptions.
 */

import {
  Connection,
  SolanaJSONRPCError,
  SolanaJSONRPCErrorCode,
  type Commitment,
  type Finality,
} from '@solana/web3.js';
import type { Block, BlockFetchResult, LatestBlockResult, ProviderClient } from '../types/index.js';
import { MalformedBlockError } from './errors.js';
import { toError, withTimeout } from '../utils/time.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('rpc');

/**
 * The parts of a getBlock response the stream reads
 */
export interface RawBlock {
  blockhash: string;
  parentSlot: number;
  blockTime: number | null;
  blockHeight?: number | null;
  transactions: Array<{ transaction: { signatures: string[] } }>;
}

/**
 * Subset of Connection used by the client (a Connection satisfies it)
 */
export interface SlotSource {
  getSlot(commitment?: Commitment): Promise<number>;
  getBlock(
    slot: number,
    config: { commitment?: Finality; maxSupportedTransactionVersion?: number; rewards?: boolean }
  ): Promise<RawBlock | null>;
}

export interface SolanaClientOptions {
  commitment: Finality;
  timeoutMs: number;
}

export class SolanaProviderClient implements ProviderClient {
  constructor(
    private readonly source: SlotSource,
    private readonly options: SolanaClientOptions
  ) {}

  async getLatestBlockNumber(): Promise<LatestBlockResult> {
    try {
      const slot = await withTimeout(
        this.source.getSlot(this.options.commitment),
        this.options.timeoutMs,
        'getSlot'
      );
      return { ok: true, blockNumber: slot };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  async getBlock(blockNumber: number): Promise<BlockFetchResult> {
    let raw: RawBlock | null;
    try {
      raw = await withTimeout(
        this.source.getBlock(blockNumber, {
          commitment: this.options.commitment,
          maxSupportedTransactionVersion: 0,
          rewards: false,
        }),
        this.options.timeoutMs,
        `getBlock(${blockNumber})`
      );
    } catch (error) {
      return classifyBlockError(error);
    }

    if (raw === null) {
      return { kind: 'not-found' };
    }

    try {
      return { kind: 'found', block: toBlock(blockNumber, raw) };
    } catch (error) {
      return { kind: 'error', error: toError(error) };
    }
  }
}

function classifyBlockError(error: unknown): BlockFetchResult {
  if (error instanceof SolanaJSONRPCError) {
    switch (error.code) {
      case SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_SLOT_SKIPPED:
      case SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_LONG_TERM_STORAGE_SLOT_SKIPPED:
        return { kind: 'skipped' };
      case SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_BLOCK_NOT_AVAILABLE:
      case SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_BLOCK_STATUS_NOT_AVAILABLE_YET:
        return { kind: 'not-found' };
    }
  }
  return { kind: 'error', error: toError(error) };
}

/**
 * Validate a getBlock response and convert it into a Block
 */
export function toBlock(blockNumber: number, raw: RawBlock): Block {
  if (typeof raw.blockhash !== 'string' || raw.blockhash.length === 0) {
    throw new MalformedBlockError(blockNumber, 'missing blockhash');
  }
  if (!Number.isInteger(raw.parentSlot)) {
    throw new MalformedBlockError(blockNumber, 'missing parent slot');
  }
  if (!Array.isArray(raw.transactions)) {
    throw new MalformedBlockError(blockNumber, 'missing transactions');
  }

  const transactions: string[] = [];
  for (const entry of raw.transactions) {
    const signature = entry.transaction.signatures[0];
    if (typeof signature !== 'string') {
      throw new MalformedBlockError(blockNumber, 'transaction without signature');
    }
    transactions.push(signature);
  }

  return {
    number: blockNumber,
    parentNumber: raw.parentSlot,
    hash: raw.blockhash,
    timestamp: raw.blockTime,
    height: raw.blockHeight ?? null,
    transactions,
    transactionCount: transactions.length,
  };
}

/**
 * Create a client backed by a new Connection to `url`
 */
export function createSolanaClient(url: string, options: SolanaClientOptions): SolanaProviderClient {
  const connection = new Connection(url, {
    commitment: options.commitment,
    disableRetryOnRateLimit: true, // failover handles retries
  });
  logger.debug({ url: redactUrl(url) }, 'Created new connection');
  return new SolanaProviderClient(connection, options);
}

/**
 * Hide API keys embedded in provider URLs before logging them
 */
export function redactUrl(url: string): string {
  return url.replace(/api[-_]?key=[\w-]+/gi, '***');
}
