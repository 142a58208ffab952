import { encodeAbiParameters, encodeEventTopics, type Hex } from 'viem';
import type { Log } from '@chainfeed/core';
import { createLogFixture } from '@chainfeed/testing';
import { AgentRegistryAbi, DispatchAbi, ScannerRegistryAbi } from './contracts/abis.ts';

/**
 * Where a fixture log sits in the chain
 */
export interface LogPosition {
  blockNumber: bigint;
  logIndex: number;
  address: `0x${string}`;
  transactionIndex?: number;
}

function onlyHex(topics: readonly (Hex | Hex[] | null)[]): Hex[] {
  return topics.filter((topic): topic is Hex => typeof topic === 'string');
}

export function agentUpdatedLog(
  at: LogPosition,
  event: { agentId: bigint; by: `0x${string}`; metadata: string; chainIds: bigint[] }
): Log {
  return createLogFixture({
    ...at,
    topics: onlyHex(
      encodeEventTopics({
        abi: AgentRegistryAbi,
        eventName: 'AgentUpdated',
        args: { agentId: event.agentId, by: event.by },
      })
    ),
    data: encodeAbiParameters([{ type: 'string' }, { type: 'uint256[]' }], [event.metadata, event.chainIds]),
  });
}

export function agentEnabledLog(at: LogPosition, event: { agentId: bigint; enabled: boolean }): Log {
  return createLogFixture({
    ...at,
    topics: onlyHex(
      encodeEventTopics({
        abi: AgentRegistryAbi,
        eventName: 'AgentEnabled',
        args: { agentId: event.agentId, enabled: event.enabled },
      })
    ),
    data: encodeAbiParameters([{ type: 'uint8' }, { type: 'bool' }], [1, event.enabled]),
  });
}

export function scannerUpdatedLog(
  at: LogPosition,
  event: { scannerId: bigint; chainId: bigint; metadata: string }
): Log {
  return createLogFixture({
    ...at,
    topics: onlyHex(
      encodeEventTopics({
        abi: ScannerRegistryAbi,
        eventName: 'ScannerUpdated',
        args: { scannerId: event.scannerId, chainId: event.chainId },
      })
    ),
    data: encodeAbiParameters([{ type: 'string' }], [event.metadata]),
  });
}

export function scannerEnabledLog(at: LogPosition, event: { scannerId: bigint; enabled: boolean }): Log {
  return createLogFixture({
    ...at,
    topics: onlyHex(
      encodeEventTopics({
        abi: ScannerRegistryAbi,
        eventName: 'ScannerEnabled',
        args: { scannerId: event.scannerId, enabled: event.enabled },
      })
    ),
    data: encodeAbiParameters([{ type: 'uint8' }, { type: 'bool' }], [2, event.enabled]),
  });
}

export function linkLog(at: LogPosition, event: { agentId: bigint; scannerId: bigint; enable: boolean }): Log {
  return createLogFixture({
    ...at,
    topics: onlyHex(encodeEventTopics({ abi: DispatchAbi, eventName: 'Link' })),
    data: encodeAbiParameters(
      [{ type: 'uint256' }, { type: 'uint256' }, { type: 'bool' }],
      [event.agentId, event.scannerId, event.enable]
    ),
  });
}
