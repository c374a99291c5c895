/**
 * Calls into a ProviderClient that never reject: a client that throws
 * instead of returning a result variant is reported as an error result.
 */

import type { BlockFetchResult, LatestBlockResult, ProviderClient } from '../types/index.js';
import { toError } from '../utils/time.js';

export async function fetchLatest(client: ProviderClient): Promise<LatestBlockResult> {
  try {
    return await client.getLatestBlockNumber();
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

export async function fetchBlock(client: ProviderClient, blockNumber: number): Promise<BlockFetchResult> {
  try {
    return await client.getBlock(blockNumber);
  } catch (error) {
    return { kind: 'error', error: toError(error) };
  }
}
