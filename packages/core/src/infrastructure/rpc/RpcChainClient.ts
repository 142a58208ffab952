import {
  BlockNotFoundError,
  createPublicClient,
  hexToBigInt,
  hexToNumber,
  http,
  rpcSchema,
  toHex,
  type Hex,
  type PublicRpcSchema,
  type RpcLog,
  type Transport,
} from 'viem';
import type { Block } from '../../domain/entities/Block.ts';
import { createBlock } from '../../domain/entities/Block.ts';
import type { Log, LogFilter } from '../../domain/entities/Log.ts';
import { createLog } from '../../domain/entities/Log.ts';
import type { RawTrace, Trace } from '../../domain/entities/Trace.ts';
import { createTrace } from '../../domain/entities/Trace.ts';
import type { IChainClient } from '../../application/ports/IChainClient.ts';

/**
 * Public methods plus the parity trace namespace
 */
type ChainRpcSchema = [
  ...PublicRpcSchema,
  {
    Method: 'trace_block';
    Parameters: [block: Hex];
    ReturnType: RawTrace[] | null;
  },
];

function createClient(transport: Transport) {
  return createPublicClient({
    transport,
    rpcSchema: rpcSchema<ChainRpcSchema>(),
  });
}

type ConfirmedRpcLog = RpcLog & {
  blockNumber: Hex;
  blockHash: Hex;
  transactionHash: Hex;
  transactionIndex: Hex;
  logIndex: Hex;
};

function isConfirmed(log: RpcLog): log is ConfirmedRpcLog {
  return (
    log.blockNumber !== null &&
    log.blockHash !== null &&
    log.transactionHash !== null &&
    log.transactionIndex !== null &&
    log.logIndex !== null
  );
}

/**
 * Chain client implementation using viem
 */
export class RpcChainClient implements IChainClient {
  readonly chainId: number;
  readonly url: string;
  private readonly client: ReturnType<typeof createClient>;

  constructor(params: {
    chainId: number;
    url: string;
    timeout?: number;
    retryCount?: number;
    /** Replaces the HTTP transport (tests use viem's `custom`) */
    transport?: Transport;
  }) {
    this.chainId = params.chainId;
    this.url = params.url;
    this.client = createClient(
      params.transport ??
        http(params.url, {
          timeout: params.timeout ?? 30_000,
          retryCount: params.retryCount ?? 3,
          retryDelay: 1000,
        })
    );
  }

  async getBlockNumber(): Promise<bigint> {
    return this.client.getBlockNumber({ cacheTime: 0 });
  }

  async getBlock(blockNumber: bigint): Promise<Block | null> {
    try {
      const block = await this.client.getBlock({
        blockNumber,
        includeTransactions: false,
      });

      return createBlock({
        number: block.number,
        hash: block.hash,
        parentHash: block.parentHash,
        timestamp: block.timestamp,
        transactions: block.transactions,
      });
    } catch (error) {
      if (error instanceof BlockNotFoundError) return null;
      throw error;
    }
  }

  async traceBlock(blockNumber: bigint): Promise<Trace[]> {
    const traces = await this.client.request({
      method: 'trace_block',
      params: [toHex(blockNumber)],
    });
    return (traces ?? []).map(createTrace);
  }

  async getLogs(filter: LogFilter): Promise<Log[]> {
    const rawLogs = await this.client.request({
      method: 'eth_getLogs',
      params: [
        {
          address: typeof filter.address === 'string' ? filter.address : [...filter.address],
          topics: filter.topics,
          fromBlock: toHex(filter.fromBlock),
          toBlock: toHex(filter.toBlock),
        },
      ],
    });

    // Pending logs carry no position and are left out
    return rawLogs.filter(isConfirmed).map((log) =>
      createLog({
        address: log.address,
        topics: log.topics,
        data: log.data,
        blockNumber: hexToBigInt(log.blockNumber),
        blockHash: log.blockHash,
        transactionHash: log.transactionHash,
        transactionIndex: hexToNumber(log.transactionIndex),
        logIndex: hexToNumber(log.logIndex),
        removed: log.removed,
      })
    );
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.client.getBlockNumber({ cacheTime: 0 });
      return true;
    } catch {
      return false;
    }
  }
}
