import type { Block, ILogger, Log } from '@chainfeed/core';
import type {
  AgentMessage,
  AgentSaveMessage,
  DispatchMessage,
  RegistryMessage,
  ScannerMessage,
  ScannerSaveMessage,
} from './messages/types.ts';

/**
 * Passed to every message handler
 */
export interface HandlerContext {
  /** Scoped to the log's block, transaction and contract */
  logger: ILogger;
  log: Log;
}

export type MessageHandler<T extends RegistryMessage> = (
  message: T,
  context: HandlerContext
) => Promise<void> | void;

/**
 * Handlers by message kind; every one is optional
 */
export interface RegistryHandlers {
  saveAgent?: MessageHandler<AgentSaveMessage>;
  agentAction?: MessageHandler<AgentMessage>;
  saveScanner?: MessageHandler<ScannerSaveMessage>;
  scannerAction?: MessageHandler<ScannerMessage>;
  dispatch?: MessageHandler<DispatchMessage>;
  /** Runs once per block after all of its logs */
  afterBlock?: (block: Block) => Promise<void> | void;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}

/**
 * Invoke the handler registered for the message kind.
 * Resolves to false when no handler is registered.
 */
export async function dispatchMessage(
  message: RegistryMessage,
  handlers: RegistryHandlers,
  context: HandlerContext
): Promise<boolean> {
  switch (message.action) {
    case 'SaveAgent':
      if (!handlers.saveAgent) return false;
      await handlers.saveAgent(message, context);
      return true;
    case 'EnableAgent':
    case 'DisableAgent':
      if (!handlers.agentAction) return false;
      await handlers.agentAction(message, context);
      return true;
    case 'SaveScanner':
      if (!handlers.saveScanner) return false;
      await handlers.saveScanner(message, context);
      return true;
    case 'EnableScanner':
    case 'DisableScanner':
      if (!handlers.scannerAction) return false;
      await handlers.scannerAction(message, context);
      return true;
    case 'Link':
    case 'Unlink':
      if (!handlers.dispatch) return false;
      await handlers.dispatch(message, context);
      return true;
    default:
      return assertNever(message);
  }
}
