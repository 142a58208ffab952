import type {
  AgentMessage,
  AgentSaveMessage,
  DispatchMessage,
  ScannerMessage,
  ScannerSaveMessage,
} from "@chainfeed/registry";

export interface AgentState {
  id: string;
  owner: string;
  metadata: string;
  chainIds: number[];
  enabled: boolean;
}

export interface ScannerState {
  id: string;
  chainId: number;
  metadata: string;
  enabled: boolean;
}

/**
 * In-memory view of the registries, rebuilt from messages
 */
export class RegistryDirectory {
  readonly agents = new Map<string, AgentState>();
  readonly scanners = new Map<string, ScannerState>();
  /** Agent IDs linked to each scanner */
  readonly links = new Map<string, Set<string>>();

  saveAgent(message: AgentSaveMessage): void {
    this.agents.set(message.agentId, {
      id: message.agentId,
      owner: message.owner,
      metadata: message.metadata,
      chainIds: message.chainIds,
      enabled: message.enabled,
    });
  }

  setAgentEnabled(message: AgentMessage): void {
    const agent = this.agents.get(message.agentId);
    if (agent) agent.enabled = message.action === "EnableAgent";
  }

  saveScanner(message: ScannerSaveMessage): void {
    this.scanners.set(message.scannerId, {
      id: message.scannerId,
      chainId: message.chainId,
      metadata: message.metadata,
      enabled: message.enabled,
    });
  }

  setScannerEnabled(message: ScannerMessage): void {
    const scanner = this.scanners.get(message.scannerId);
    if (scanner) scanner.enabled = message.action === "EnableScanner";
  }

  link(message: DispatchMessage): void {
    const agents = this.links.get(message.scannerId) ?? new Set<string>();
    if (message.action === "Link") {
      agents.add(message.agentId);
    } else {
      agents.delete(message.agentId);
    }
    this.links.set(message.scannerId, agents);
  }

  /**
   * Enabled agents assigned to an enabled scanner
   */
  assignments(scannerId: string): AgentState[] {
    if (!this.scanners.get(scannerId)?.enabled) return [];
    return [...(this.links.get(scannerId) ?? [])]
      .map((agentId) => this.agents.get(agentId))
      .filter((agent): agent is AgentState => agent !== undefined && agent.enabled);
  }
}
