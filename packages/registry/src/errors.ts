import type { Log } from '@chainfeed/core';

/**
 * A registry log with a known topic could not be decoded
 */
export class RegistryDecodeError extends Error {
  constructor(
    public readonly eventName: string,
    public readonly log: Log,
    public readonly originalError: Error
  ) {
    super(
      `Failed to decode ${eventName} log ${log.logIndex} in block ${log.blockNumber}: ${originalError.message}`
    );
    this.name = 'RegistryDecodeError';
  }
}

/**
 * Wire data is not a valid message of the expected kind
 */
export class MessageParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MessageParseError';
  }
}
