/**
 * Call action of a parity-style trace
 */
export interface TraceAction {
  readonly from: `0x${string}` | null;
  readonly to: `0x${string}` | null;
  readonly callType: string | null;
  readonly input: `0x${string}` | null;
  readonly value: bigint;
  readonly gas: bigint;
}

/**
 * Result of a successful trace
 */
export interface TraceResult {
  readonly gasUsed: bigint;
  readonly output: `0x${string}` | null;
}

/**
 * Call trace as returned by `trace_block`
 */
export interface Trace {
  readonly blockNumber: bigint;
  readonly blockHash: `0x${string}`;
  readonly transactionHash: `0x${string}` | null;
  readonly transactionPosition: number | null;
  /** call, create, suicide or reward */
  readonly type: string;
  readonly traceAddress: readonly number[];
  readonly subtraces: number;
  readonly action: TraceAction;
  readonly result: TraceResult | null;
  readonly error: string | null;
}

/**
 * Trace in its JSON-RPC wire form (quantities hex-encoded)
 */
export interface RawTrace {
  blockNumber: number;
  blockHash: `0x${string}`;
  transactionHash?: `0x${string}` | null;
  transactionPosition?: number | null;
  type: string;
  traceAddress: number[];
  subtraces: number;
  action: {
    from?: `0x${string}`;
    to?: `0x${string}`;
    callType?: string;
    input?: `0x${string}`;
    value?: `0x${string}`;
    gas?: `0x${string}`;
  };
  result?: {
    gasUsed?: `0x${string}`;
    output?: `0x${string}`;
  } | null;
  error?: string;
}

/**
 * Create a Trace from raw RPC data
 */
export function createTrace(raw: RawTrace): Trace {
  return {
    blockNumber: BigInt(raw.blockNumber),
    blockHash: raw.blockHash,
    transactionHash: raw.transactionHash ?? null,
    transactionPosition: raw.transactionPosition ?? null,
    type: raw.type,
    traceAddress: raw.traceAddress,
    subtraces: raw.subtraces,
    action: {
      from: raw.action.from ?? null,
      to: raw.action.to ?? null,
      callType: raw.action.callType ?? null,
      input: raw.action.input ?? null,
      value: BigInt(raw.action.value ?? '0x0'),
      gas: BigInt(raw.action.gas ?? '0x0'),
    },
    result: raw.result
      ? {
          gasUsed: BigInt(raw.result.gasUsed ?? '0x0'),
          output: raw.result.output ?? null,
        }
      : null,
    error: raw.error ?? null,
  };
}
