/**
 * RPC / provider pool errors
 */

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderConfigError';
  }
}

/**
 * Every configured provider failed its liveness check
 */
export class NoWorkingProvidersError extends Error {
  constructor(readonly attempted: number) {
    super(`No working providers (${attempted} attempted)`);
    this.name = 'NoWorkingProvidersError';
  }
}

/**
 * A provider returned block data that cannot be turned into a Block
 */
export class MalformedBlockError extends Error {
  constructor(readonly blockNumber: number, reason: string) {
    super(`Malformed block ${blockNumber}: ${reason}`);
    this.name = 'MalformedBlockError';
  }
}

export class RpcTimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'RpcTimeoutError';
  }
}
