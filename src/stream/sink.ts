import type { Block, BlockSink } from '../types/index.js';
import { createChildLogger, type Logger } from '../utils/logger.js';

/**
 * Writes one structured log line per emitted block
 */
export class LogBlockSink implements BlockSink {
  constructor(private readonly log: Logger = createChildLogger('blocks')) {}

  emit(block: Block, providerName: string): void {
    this.log.info(
      {
        block_number: block.number,
        timestamp: block.timestamp,
        transaction_count: block.transactionCount,
        transactions: block.transactions,
        provider: providerName,
        hash: block.hash,
      },
      'block'
    );
  }
}
