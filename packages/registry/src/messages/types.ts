/**
 * Registry message actions, as they appear in the `action` tag on the wire
 */
export const MessageAction = {
  SaveAgent: 'SaveAgent',
  EnableAgent: 'EnableAgent',
  DisableAgent: 'DisableAgent',
  SaveScanner: 'SaveScanner',
  EnableScanner: 'EnableScanner',
  DisableScanner: 'DisableScanner',
  Link: 'Link',
  Unlink: 'Unlink',
} as const;

export type MessageAction = (typeof MessageAction)[keyof typeof MessageAction];

/**
 * Agent metadata saved or updated on the agent registry
 */
export interface AgentSaveMessage {
  action: 'SaveAgent';
  /** Agent ID as a 0x-prefixed hex quantity */
  agentId: string;
  txHash: string;
  enabled: boolean;
  name: string;
  chainIds: number[];
  metadata: string;
  /** Checksummed address of the account that saved the agent */
  owner: string;
}

/**
 * Agent enabled or disabled
 */
export interface AgentMessage {
  action: 'EnableAgent' | 'DisableAgent';
  agentId: string;
  txHash: string;
}

/**
 * Scanner metadata saved or updated on the scanner registry
 */
export interface ScannerSaveMessage {
  action: 'SaveScanner';
  scannerId: string;
  txHash: string;
  enabled: boolean;
  chainId: number;
  metadata: string;
}

/**
 * Scanner enabled or disabled
 */
export interface ScannerMessage {
  action: 'EnableScanner' | 'DisableScanner';
  scannerId: string;
  txHash: string;
}

/**
 * Agent linked to or unlinked from a scanner
 */
export interface DispatchMessage {
  action: 'Link' | 'Unlink';
  agentId: string;
  scannerId: string;
  txHash: string;
}

export type RegistryMessage =
  | AgentSaveMessage
  | AgentMessage
  | ScannerSaveMessage
  | ScannerMessage
  | DispatchMessage;
