/**
 * Log entity representing an EVM event log
 */
export interface Log {
  /** Block number where log was emitted */
  readonly blockNumber: bigint;
  /** Block hash */
  readonly blockHash: `0x${string}`;
  /** Transaction hash */
  readonly transactionHash: `0x${string}`;
  /** Transaction index in block */
  readonly transactionIndex: number;
  /** Log index in block */
  readonly logIndex: number;
  /** Contract address that emitted the log (lowercase) */
  readonly address: `0x${string}`;
  /** First topic (event signature) */
  readonly topic0: `0x${string}` | null;
  /** Second topic (indexed param) */
  readonly topic1: `0x${string}` | null;
  /** Third topic (indexed param) */
  readonly topic2: `0x${string}` | null;
  /** Fourth topic (indexed param) */
  readonly topic3: `0x${string}` | null;
  /** Non-indexed data */
  readonly data: `0x${string}`;
  /** Whether the log was removed (reorg) */
  readonly removed: boolean;
}

/**
 * Log fields as returned by the RPC client, quantities already decoded
 */
export interface RawLog {
  address: `0x${string}`;
  topics: readonly `0x${string}`[];
  data: `0x${string}`;
  blockNumber: bigint;
  blockHash: `0x${string}`;
  transactionHash: `0x${string}`;
  transactionIndex: number;
  logIndex: number;
  removed: boolean;
}

/**
 * Create a Log from raw RPC data
 */
export function createLog(raw: RawLog): Log {
  return {
    blockNumber: raw.blockNumber,
    blockHash: raw.blockHash,
    transactionHash: raw.transactionHash,
    transactionIndex: raw.transactionIndex,
    logIndex: raw.logIndex,
    address: lowercaseHex(raw.address),
    topic0: raw.topics[0] ?? null,
    topic1: raw.topics[1] ?? null,
    topic2: raw.topics[2] ?? null,
    topic3: raw.topics[3] ?? null,
    data: raw.data,
    removed: raw.removed,
  };
}

/**
 * Log filter for querying logs
 */
export interface LogFilter {
  /** Contract addresses to filter */
  address: `0x${string}` | readonly `0x${string}`[];
  /** Event signatures to filter */
  topics?: (`0x${string}` | `0x${string}`[] | null)[];
  /** Start block */
  fromBlock: bigint;
  /** End block */
  toBlock: bigint;
}

/**
 * Non-null topics of a log in order, in the shape ABI decoders take
 */
export function getLogTopics(log: Log): [] | [`0x${string}`, ...`0x${string}`[]] {
  if (log.topic0 === null) return [];
  const rest = [log.topic1, log.topic2, log.topic3].filter(
    (topic): topic is `0x${string}` => topic !== null
  );
  return [log.topic0, ...rest];
}

/**
 * Get unique ordering key for a log
 */
export function getLogOrderKey(log: Log): string {
  return `${log.blockNumber.toString().padStart(20, '0')}-${log.transactionIndex.toString().padStart(10, '0')}-${log.logIndex.toString().padStart(10, '0')}`;
}

/**
 * Compare two logs by their order in the chain
 */
export function compareLogs(a: Log, b: Log): number {
  if (a.blockNumber !== b.blockNumber) {
    return a.blockNumber < b.blockNumber ? -1 : 1;
  }
  if (a.transactionIndex !== b.transactionIndex) {
    return a.transactionIndex - b.transactionIndex;
  }
  return a.logIndex - b.logIndex;
}

function lowercaseHex(value: `0x${string}`): `0x${string}` {
  return `0x${value.slice(2).toLowerCase()}`;
}
