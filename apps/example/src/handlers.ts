import type { RegistryHandlers } from "@chainfeed/registry";
import { RegistryDirectory } from "./directory.ts";

export const directory = new RegistryDirectory();

/**
 * Handlers loaded by `chainfeed listen --handlers ./src/handlers.ts`
 */
export const handlers: RegistryHandlers = {
  saveAgent: (message, { logger }) => {
    directory.saveAgent(message);
    logger.info("Agent saved", { agentId: message.agentId, owner: message.owner });
  },

  agentAction: (message, { logger }) => {
    directory.setAgentEnabled(message);
    logger.info(message.action === "EnableAgent" ? "Agent enabled" : "Agent disabled", {
      agentId: message.agentId,
    });
  },

  saveScanner: (message, { logger }) => {
    directory.saveScanner(message);
    logger.info("Scanner saved", { scannerId: message.scannerId, chainId: message.chainId });
  },

  scannerAction: (message) => {
    directory.setScannerEnabled(message);
  },

  dispatch: (message, { logger }) => {
    directory.link(message);
    logger.debug(`${message.action} agent ${message.agentId} on scanner ${message.scannerId}`);
  },
};
