/**
 * Solana Block Stream
 *
 * Polls the configured RPC providers and logs every new block once, in order,
 * failing over between providers when one errors or stalls.
 *
 * Usage:
 *   RPC_URLS="https://a.example|primary,https://b.example|backup" npm start
 */

import 'dotenv/config';
import { config } from './config/index.js';
import { ProviderPool, NoWorkingProvidersError } from './rpc/index.js';
import { BlockStreamer, LogBlockSink } from './stream/index.js';
import { logger } from './utils/logger.js';

async function run(): Promise<void> {
  logger.info(
    {
      providers: config.rpc.providers.length,
      pollIntervalSec: config.stream.pollIntervalSec,
      blockDelayThresholdSec: config.stream.blockDelayThresholdSec,
    },
    'Block stream starting'
  );

  const pool = await ProviderPool.create(config.rpc.providers, {
    backoffCap: config.stream.backoffCap,
    backoffUnitMs: config.stream.backoffUnitMs,
    clientOptions: {
      commitment: config.rpc.commitment,
      timeoutMs: config.rpc.timeoutMs,
    },
  });

  const streamer = new BlockStreamer(pool, new LogBlockSink(), {
    pollIntervalSec: config.stream.pollIntervalSec,
    blockDelayThresholdSec: config.stream.blockDelayThresholdSec,
  });

  // Handle shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal, ...streamer.getStats() }, 'Shutting down block stream');
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await streamer.run();
}

run().catch((err) => {
  if (err instanceof NoWorkingProvidersError) {
    logger.fatal({ attempted: err.attempted }, err.message);
  } else {
    logger.fatal({ error: err }, 'Block stream failed');
  }
  process.exit(1);
});
