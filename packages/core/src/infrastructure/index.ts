export { Logger, createLogger } from './logging/Logger.ts';
export { RpcChainClient } from './rpc/RpcChainClient.ts';
