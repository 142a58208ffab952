import { getAddress, toHex } from 'viem';
import type {
  AgentMessage,
  AgentSaveMessage,
  DispatchMessage,
  ScannerMessage,
  ScannerSaveMessage,
} from './types.ts';

export function newAgentSaveMessage(
  event: {
    agentId: bigint;
    by: `0x${string}`;
    metadata: string;
    chainIds: readonly bigint[];
  },
  txHash: `0x${string}`
): AgentSaveMessage {
  return {
    action: 'SaveAgent',
    agentId: toHex(event.agentId),
    txHash,
    enabled: true,
    // Registry events carry no separate name
    name: event.metadata,
    chainIds: event.chainIds.map((chainId) => Number(chainId)),
    metadata: event.metadata,
    owner: getAddress(event.by),
  };
}

export function newAgentMessage(
  event: { agentId: bigint; enabled: boolean },
  txHash: `0x${string}`
): AgentMessage {
  return {
    action: event.enabled ? 'EnableAgent' : 'DisableAgent',
    agentId: toHex(event.agentId),
    txHash,
  };
}

export function newScannerSaveMessage(
  event: { scannerId: bigint; chainId: bigint; metadata: string },
  txHash: `0x${string}`
): ScannerSaveMessage {
  return {
    action: 'SaveScanner',
    scannerId: toHex(event.scannerId),
    txHash,
    enabled: true,
    chainId: Number(event.chainId),
    metadata: event.metadata,
  };
}

export function newScannerMessage(
  event: { scannerId: bigint; enabled: boolean },
  txHash: `0x${string}`
): ScannerMessage {
  return {
    action: event.enabled ? 'EnableScanner' : 'DisableScanner',
    scannerId: toHex(event.scannerId),
    txHash,
  };
}

export function newDispatchMessage(
  event: { agentId: bigint; scannerId: bigint; enable: boolean },
  txHash: `0x${string}`
): DispatchMessage {
  return {
    action: event.enable ? 'Link' : 'Unlink',
    agentId: toHex(event.agentId),
    scannerId: toHex(event.scannerId),
    txHash,
  };
}
