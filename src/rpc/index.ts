/**
 * RPC Module - Solana provider clients and the failover pool
 */

export {
  ProviderPool,
  type ProviderPoolOptions,
  type PoolStats,
} from './pool.js';

export {
  SolanaProviderClient,
  createSolanaClient,
  toBlock,
  redactUrl,
  type RawBlock,
  type SlotSource,
  type SolanaClientOptions,
} from './client.js';

export { resolveProvider, inferName } from './providers.js';

export { fetchLatest, fetchBlock } from './guard.js';

export {
  ProviderConfigError,
  NoWorkingProvidersError,
  MalformedBlockError,
  RpcTimeoutError,
} from './errors.js';
