// Contracts
export { AgentRegistryAbi, ScannerRegistryAbi, DispatchAbi } from './contracts/abis.ts';
export {
  AGENT_UPDATED_TOPIC,
  AGENT_ENABLED_TOPIC,
  SCANNER_UPDATED_TOPIC,
  SCANNER_ENABLED_TOPIC,
  LINK_TOPIC,
} from './contracts/topics.ts';
export {
  parseAgentUpdated,
  parseAgentEnabled,
  parseScannerUpdated,
  parseScannerEnabled,
  parseLink,
} from './contracts/decode.ts';

// Messages
export { MessageAction } from './messages/types.ts';
export type {
  AgentSaveMessage,
  AgentMessage,
  ScannerSaveMessage,
  ScannerMessage,
  DispatchMessage,
  RegistryMessage,
} from './messages/types.ts';
export {
  newAgentSaveMessage,
  newAgentMessage,
  newScannerSaveMessage,
  newScannerMessage,
  newDispatchMessage,
} from './messages/build.ts';
export {
  parseAgentSave,
  parseAgentMessage,
  parseScannerSave,
  parseScannerMessage,
  parseDispatchMessage,
  parseMessage,
  serializeMessage,
} from './messages/parse.ts';

// Mapping and dispatch
export { RegistryEventMapper } from './RegistryEventMapper.ts';
export type { ContractRole } from './RegistryEventMapper.ts';
export { dispatchMessage } from './dispatch.ts';
export type { HandlerContext, MessageHandler, RegistryHandlers } from './dispatch.ts';
export { RegistryListener } from './RegistryListener.ts';
export type { RegistryListenerOptions } from './RegistryListener.ts';

// Errors
export { RegistryDecodeError, MessageParseError } from './errors.ts';
