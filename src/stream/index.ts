/**
 * Stream Module - polling state machine and block sinks
 */

export {
  BlockStreamer,
  type StreamerOptions,
  type StreamerStats,
  type CycleOutcome,
  type RotationCause,
} from './streamer.js';

export { LogBlockSink } from './sink.js';
