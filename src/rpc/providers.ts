/**
 * Provider resolution
 *
 * Turns each accepted ProviderSpec into a named Provider once, before any
 * polling starts.
 */

import type { Provider, ProviderSpec } from '../types/index.js';
import { createSolanaClient, type SolanaClientOptions } from './client.js';

export const DEFAULT_CLIENT_OPTIONS: SolanaClientOptions = {
  commitment: 'confirmed',
  timeoutMs: 10_000,
};

/**
 * Infer provider name from URL
 */
export function inferName(url: string, index: number): string {
  if (url.includes('helius')) return `helius-${index}`;
  if (url.includes('quicknode')) return `quicknode-${index}`;
  if (url.includes('alchemy')) return `alchemy-${index}`;
  if (url.includes('triton')) return `triton-${index}`;
  if (url.includes('mainnet-beta.solana.com')) return `public-${index}`;
  if (url.includes('ankr')) return `ankr-${index}`;
  if (url.includes('chainstack')) return `chainstack-${index}`;
  return `rpc-${index}`;
}

export function resolveProvider(
  spec: ProviderSpec,
  index: number,
  clientOptions: SolanaClientOptions = DEFAULT_CLIENT_OPTIONS
): Provider {
  if (typeof spec === 'string') {
    return { name: inferName(spec, index), client: createSolanaClient(spec, clientOptions) };
  }
  if ('client' in spec) {
    return { name: spec.name ?? `provider-${index}`, client: spec.client };
  }
  return {
    name: spec.name ?? inferName(spec.url, index),
    client: createSolanaClient(spec.url, clientOptions),
  };
}
