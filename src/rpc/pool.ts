/**
 * Provider Pool with Failover Backoff
 *
 * Features:
 * - Ordered providers with a single active selection
 * - Liveness check of every provider at construction
 * - Cyclic failover with exponential backoff per provider
 * - Failure counters keyed by provider name that persist across switches
 */

import type { Provider, ProviderSpec } from '../types/index.js';
import { NoWorkingProvidersError, ProviderConfigError } from './errors.js';
import { DEFAULT_CLIENT_OPTIONS, resolveProvider } from './providers.js';
import type { SolanaClientOptions } from './client.js';
import { fetchLatest } from './guard.js';
import { backoffUnits, sleep, toError, type SleepFn } from '../utils/time.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('pool');

// =============================================================================
// Types
// =============================================================================

export interface ProviderPoolOptions {
  /** Upper bound on backoff, in time units (default: 300) */
  backoffCap: number;
  /** Length of one backoff time unit in ms (default: 1000) */
  backoffUnitMs: number;
  /** Used to wait out the backoff */
  sleep: SleepFn;
  /** Passed to clients created from URL specs */
  clientOptions: SolanaClientOptions;
}

export interface PoolStats {
  activeProvider: string;
  activeIndex: number;
  rotations: number;
  providers: {
    [name: string]: {
      failures: number;
      active: boolean;
    };
  };
}

const DEFAULT_POOL_OPTIONS: ProviderPoolOptions = {
  backoffCap: 300,
  backoffUnitMs: 1000,
  sleep,
  clientOptions: DEFAULT_CLIENT_OPTIONS,
};

// =============================================================================
// Provider Pool
// =============================================================================

export class ProviderPool {
  private readonly providers: Provider[];
  private readonly failures: Map<string, number> = new Map();
  private readonly options: ProviderPoolOptions;

  private currentIndex = 0;
  private rotations = 0;

  /**
   * Build a pool over already-resolved providers. No liveness check is run;
   * use ProviderPool.create for that.
   */
  constructor(providers: Provider[], options: Partial<ProviderPoolOptions> = {}) {
    if (providers.length === 0) {
      throw new ProviderConfigError('No providers configured');
    }
    this.providers = [...providers];
    this.options = { ...DEFAULT_POOL_OPTIONS, ...options };
  }

  /**
   * Resolve every provider, check it once, and keep the ones that answer.
   *
   * @throws ProviderConfigError when `specs` is empty
   * @throws NoWorkingProvidersError when every liveness check fails
   */
  static async create(
    specs: ProviderSpec[],
    options: Partial<ProviderPoolOptions> = {}
  ): Promise<ProviderPool> {
    if (specs.length === 0) {
      throw new ProviderConfigError('No providers configured');
    }

    const clientOptions = options.clientOptions ?? DEFAULT_CLIENT_OPTIONS;
    const working: Provider[] = [];

    for (const [index, spec] of specs.entries()) {
      let provider: Provider;
      try {
        provider = resolveProvider(spec, index, clientOptions);
      } catch (error) {
        logger.warn({ index, error: toError(error).message }, 'Dropping provider that could not be resolved');
        continue;
      }

      const check = await fetchLatest(provider.client);
      if (!check.ok) {
        logger.warn(
          { provider: provider.name, error: check.error.message },
          'Dropping provider that failed liveness check'
        );
        continue;
      }

      logger.debug({ provider: provider.name, latest: check.blockNumber }, 'Provider passed liveness check');
      working.push(provider);
    }

    if (working.length === 0) {
      throw new NoWorkingProvidersError(specs.length);
    }

    logger.info(
      { providers: working.map((p) => p.name) },
      `Provider pool initialized with ${working.length} of ${specs.length} providers`
    );

    return new ProviderPool(working, options);
  }

  /**
   * Currently selected provider
   */
  active(): Provider {
    return this.providers[this.currentIndex];
  }

  get activeIndex(): number {
    return this.currentIndex;
  }

  get size(): number {
    return this.providers.length;
  }

  /**
   * Consecutive failures recorded against a provider name (never reset)
   */
  failureCount(name: string): number {
    return this.failures.get(name) ?? 0;
  }

  /**
   * Charge a failure to the active provider, wait out its backoff, then move
   * to the next provider in cyclic order.
   */
  async recordFailureAndRotate(reason: string): Promise<void> {
    const previous = this.active();
    const failures = this.failureCount(previous.name) + 1;
    this.failures.set(previous.name, failures);

    const units = backoffUnits(failures, this.options.backoffCap);
    logger.warn(
      { provider: previous.name, failures, backoff: units, reason },
      'Provider failure, backing off before switching'
    );

    await this.options.sleep(units * this.options.backoffUnitMs);

    this.currentIndex = (this.currentIndex + 1) % this.providers.length;
    this.rotations++;

    const next = this.active();
    logger.warn(
      { from: previous.name, to: next.name },
      `Switching provider from ${previous.name} to ${next.name}`
    );
  }

  /**
   * Get pool statistics
   */
  getStats(): PoolStats {
    const stats: PoolStats = {
      activeProvider: this.active().name,
      activeIndex: this.currentIndex,
      rotations: this.rotations,
      providers: {},
    };

    for (const [index, provider] of this.providers.entries()) {
      stats.providers[provider.name] = {
        failures: this.failureCount(provider.name),
        active: index === this.currentIndex,
      };
    }

    return stats;
  }
}
