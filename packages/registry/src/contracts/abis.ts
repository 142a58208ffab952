import type { Abi } from 'viem';

/**
 * Agent registry ABI (events only)
 */
export const AgentRegistryAbi = [
  {
    type: 'event',
    name: 'AgentUpdated',
    inputs: [
      { type: 'uint256', name: 'agentId', indexed: true },
      { type: 'address', name: 'by', indexed: true },
      { type: 'string', name: 'metadata', indexed: false },
      { type: 'uint256[]', name: 'chainIds', indexed: false },
    ],
  },
  {
    type: 'event',
    name: 'AgentEnabled',
    inputs: [
      { type: 'uint256', name: 'agentId', indexed: true },
      { type: 'bool', name: 'enabled', indexed: true },
      { type: 'uint8', name: 'permission', indexed: false },
      { type: 'bool', name: 'value', indexed: false },
    ],
  },
] as const satisfies Abi;

/**
 * Scanner registry ABI (events only)
 */
export const ScannerRegistryAbi = [
  {
    type: 'event',
    name: 'ScannerUpdated',
    inputs: [
      { type: 'uint256', name: 'scannerId', indexed: true },
      { type: 'uint256', name: 'chainId', indexed: true },
      { type: 'string', name: 'metadata', indexed: false },
    ],
  },
  {
    type: 'event',
    name: 'ScannerEnabled',
    inputs: [
      { type: 'uint256', name: 'scannerId', indexed: true },
      { type: 'bool', name: 'enabled', indexed: true },
      { type: 'uint8', name: 'permission', indexed: false },
      { type: 'bool', name: 'value', indexed: false },
    ],
  },
] as const satisfies Abi;

/**
 * Dispatch contract ABI (events only)
 */
export const DispatchAbi = [
  {
    type: 'event',
    name: 'Link',
    inputs: [
      { type: 'uint256', name: 'agentId', indexed: false },
      { type: 'uint256', name: 'scannerId', indexed: false },
      { type: 'bool', name: 'enable', indexed: false },
    ],
  },
] as const satisfies Abi;
