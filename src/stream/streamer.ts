/**
 * Block Streamer
 *
 * Polls the active provider of a ProviderPool, emits every new block exactly
 * once and in increasing order, and fails over when the provider errors or
 * stops producing blocks.
 *
 * Each cycle:
 *   1. fetch the latest block number (error -> rotate)
 *   2. fetch and emit lastBlock+1 .. latest (not-found -> wait, error -> rotate)
 *   3. no progress for longer than the delay threshold -> rotate (stall), whether
 *      the provider reports nothing new or keeps answering not-found
 *   4. sleep the poll interval, unless the cycle rotated
 */

import type { BlockSink, StreamCursor } from '../types/index.js';
import type { ProviderPool, PoolStats } from '../rpc/pool.js';
import { fetchBlock, fetchLatest } from '../rpc/guard.js';
import { sleep, type SleepFn } from '../utils/time.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('streamer');

// =============================================================================
// Types
// =============================================================================

export interface StreamerOptions {
  /** Seconds between polls (default: 5) */
  pollIntervalSec: number;
  /** Seconds without a new block before the provider counts as stalled (default: 60) */
  blockDelayThresholdSec: number;
  /** Start from a known watermark instead of the provider's latest block */
  initialCursor?: StreamCursor;
  /** Wall clock in ms */
  now: () => number;
  sleep: SleepFn;
}

export type RotationCause = 'latest-unavailable' | 'block-fetch-failed' | 'stalled';

export interface CycleOutcome {
  emitted: number;
  skipped: number;
  /** Why the cycle rotated the pool, if it did */
  rotated: RotationCause | null;
  /** Block the provider did not have yet; retried next cycle */
  waitingOn: number | null;
}

export interface StreamerStats {
  cursor: StreamCursor;
  cycles: number;
  emitted: number;
  skipped: number;
  pool: PoolStats;
}

interface Position {
  lastBlock: number;
  lastBlockTime: number;
}

const DEFAULT_STREAMER_OPTIONS: StreamerOptions = {
  pollIntervalSec: 5,
  blockDelayThresholdSec: 60,
  now: () => Date.now(),
  sleep,
};

// =============================================================================
// Streamer
// =============================================================================

export class BlockStreamer {
  private readonly options: StreamerOptions;
  private position: Position | null = null;

  private cycles = 0;
  private emitted = 0;
  private skipped = 0;

  constructor(
    private readonly pool: ProviderPool,
    private readonly sink: BlockSink,
    options: Partial<StreamerOptions> = {}
  ) {
    this.options = { ...DEFAULT_STREAMER_OPTIONS, ...options };

    const initial = this.options.initialCursor;
    if (initial && initial.lastBlock !== null) {
      this.position = {
        lastBlock: initial.lastBlock,
        lastBlockTime: initial.lastBlockTime ?? this.options.now(),
      };
    }
  }

  /**
   * Snapshot of the watermark
   */
  get cursor(): StreamCursor {
    return this.position
      ? { ...this.position }
      : { lastBlock: null, lastBlockTime: null };
  }

  /**
   * Poll until `maxCycles` cycles have run (forever when omitted)
   */
  async run(options: { maxCycles?: number } = {}): Promise<void> {
    const maxCycles = options.maxCycles ?? Infinity;

    for (let cycle = 0; cycle < maxCycles; cycle++) {
      const outcome = await this.runCycle();

      // A rotation already waited out its backoff
      if (outcome.rotated === null) {
        await this.options.sleep(this.options.pollIntervalSec * 1000);
      }
    }
  }

  /**
   * One poll against the active provider, without the trailing poll sleep
   */
  async runCycle(): Promise<CycleOutcome> {
    this.cycles++;

    const provider = this.pool.active();
    const outcome: CycleOutcome = { emitted: 0, skipped: 0, rotated: null, waitingOn: null };

    const latest = await fetchLatest(provider.client);
    if (!latest.ok) {
      logger.error(
        { provider: provider.name, error: latest.error.message },
        `Failed to fetch latest block from ${provider.name}`
      );
      await this.rotate(outcome, 'latest-unavailable');
      return outcome;
    }

    const latestBlock = latest.blockNumber;
    let lastBlock: number;

    if (this.position === null) {
      // No replay: the first block emitted is the current latest
      lastBlock = latestBlock - 1;
      this.advanceTo(lastBlock);
      logger.info({ block: latestBlock, provider: provider.name }, 'Starting block stream');
    } else {
      lastBlock = this.position.lastBlock;
    }

    if (latestBlock > lastBlock) {
      for (let n = lastBlock + 1; n <= latestBlock; n++) {
        const result = await fetchBlock(provider.client, n);

        if (result.kind === 'not-found') {
          logger.warn(
            { block: n, provider: provider.name },
            `Block ${n} not available from ${provider.name} yet, retrying next cycle`
          );
          outcome.waitingOn = n;
          break;
        }

        if (result.kind === 'error') {
          logger.error(
            { block: n, provider: provider.name, error: result.error.message },
            `Error retrieving block ${n} from ${provider.name}`
          );
          await this.rotate(outcome, 'block-fetch-failed');
          break;
        }

        if (result.kind === 'skipped') {
          logger.warn({ block: n, provider: provider.name }, `Slot ${n} was skipped, moving past it`);
          this.advanceTo(n);
          outcome.skipped++;
          this.skipped++;
          continue;
        }

        await this.sink.emit(result.block, provider.name);
        this.advanceTo(n);
        outcome.emitted++;
        this.emitted++;
      }

      // A block that stays unavailable past the threshold is a stall too
      if (outcome.waitingOn !== null) {
        await this.rotateIfStalled(outcome, provider.name);
      }
      return outcome;
    }

    if (latestBlock < lastBlock) {
      logger.debug({ provider: provider.name, latest: latestBlock, lastBlock }, 'Provider is behind the stream');
    }

    await this.rotateIfStalled(outcome, provider.name);
    return outcome;
  }

  /**
   * Get streamer statistics
   */
  getStats(): StreamerStats {
    return {
      cursor: this.cursor,
      cycles: this.cycles,
      emitted: this.emitted,
      skipped: this.skipped,
      pool: this.pool.getStats(),
    };
  }

  private advanceTo(blockNumber: number): void {
    this.position = { lastBlock: blockNumber, lastBlockTime: this.options.now() };
  }

  private lastBlockTime(): number {
    return this.position ? this.position.lastBlockTime : this.options.now();
  }

  private async rotateIfStalled(outcome: CycleOutcome, providerName: string): Promise<void> {
    const idleMs = this.options.now() - this.lastBlockTime();
    if (idleMs <= this.options.blockDelayThresholdSec * 1000) return;

    logger.warn(
      { provider: providerName, idleSec: Math.round(idleMs / 1000) },
      `No new block for ${this.options.blockDelayThresholdSec}s from ${providerName}. Triggering failover.`
    );
    await this.rotate(outcome, 'stalled');
  }

  private async rotate(outcome: CycleOutcome, cause: RotationCause): Promise<void> {
    outcome.rotated = cause;
    await this.pool.recordFailureAndRotate(cause);
  }
}
