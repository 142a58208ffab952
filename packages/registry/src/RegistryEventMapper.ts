import type { ContractsConfig } from '@chainfeed/config';
import { Address, type Log } from '@chainfeed/core';
import {
  parseAgentEnabled,
  parseAgentUpdated,
  parseLink,
  parseScannerEnabled,
  parseScannerUpdated,
} from './contracts/decode.ts';
import {
  AGENT_ENABLED_TOPIC,
  AGENT_UPDATED_TOPIC,
  LINK_TOPIC,
  SCANNER_ENABLED_TOPIC,
  SCANNER_UPDATED_TOPIC,
} from './contracts/topics.ts';
import {
  newAgentMessage,
  newAgentSaveMessage,
  newDispatchMessage,
  newScannerMessage,
  newScannerSaveMessage,
} from './messages/build.ts';
import type { RegistryMessage } from './messages/types.ts';

/**
 * Registry contract a log can come from
 */
export type ContractRole = keyof ContractsConfig;

const CONTRACT_ROLES = ['agentRegistry', 'scannerRegistry', 'dispatch'] as const satisfies readonly ContractRole[];

/**
 * Classifies registry logs by emitting contract and topic, and turns
 * them into registry messages
 */
export class RegistryEventMapper {
  private readonly roles: Map<`0x${string}`, ContractRole> = new Map();

  constructor(contracts: ContractsConfig) {
    for (const role of CONTRACT_ROLES) {
      this.roles.set(Address.from(contracts[role]).lowercase, role);
    }
  }

  /**
   * Addresses of every mapped contract, lowercased
   */
  addresses(): `0x${string}`[] {
    return [...this.roles.keys()];
  }

  /**
   * Role of the contract that emitted the log, if it is one of ours
   */
  roleOf(log: Log): ContractRole | null {
    const address = Address.tryFrom(log.address);
    return address ? (this.roles.get(address.lowercase) ?? null) : null;
  }

  /**
   * Message for a registry log; null for foreign contracts and unknown topics
   */
  map(log: Log): RegistryMessage | null {
    switch (this.roleOf(log)) {
      case 'agentRegistry':
        return this.mapAgentRegistry(log);
      case 'scannerRegistry':
        return this.mapScannerRegistry(log);
      case 'dispatch':
        return this.mapDispatch(log);
      case null:
        return null;
    }
  }

  private mapAgentRegistry(log: Log): RegistryMessage | null {
    switch (log.topic0) {
      case AGENT_UPDATED_TOPIC:
        return newAgentSaveMessage(parseAgentUpdated(log), log.transactionHash);
      case AGENT_ENABLED_TOPIC:
        return newAgentMessage(parseAgentEnabled(log), log.transactionHash);
      default:
        return null;
    }
  }

  private mapScannerRegistry(log: Log): RegistryMessage | null {
    switch (log.topic0) {
      case SCANNER_UPDATED_TOPIC:
        return newScannerSaveMessage(parseScannerUpdated(log), log.transactionHash);
      case SCANNER_ENABLED_TOPIC:
        return newScannerMessage(parseScannerEnabled(log), log.transactionHash);
      default:
        return null;
    }
  }

  private mapDispatch(log: Log): RegistryMessage | null {
    switch (log.topic0) {
      case LINK_TOPIC:
        return newDispatchMessage(parseLink(log), log.transactionHash);
      default:
        return null;
    }
  }
}
