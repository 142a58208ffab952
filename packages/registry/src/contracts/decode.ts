import { decodeEventLog } from 'viem';
import { getLogTopics, type Log } from '@chainfeed/core';
import { toError } from '@chainfeed/feeds';
import { RegistryDecodeError } from '../errors.ts';
import { AgentRegistryAbi, DispatchAbi, ScannerRegistryAbi } from './abis.ts';

function decoding<T>(eventName: string, log: Log, decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    throw new RegistryDecodeError(eventName, log, toError(error));
  }
}

const MAX_CHAIN_ID = BigInt(Number.MAX_SAFE_INTEGER);

/** Chain IDs travel as JSON numbers in messages */
function checkChainId(chainId: bigint): void {
  if (chainId > MAX_CHAIN_ID) {
    throw new Error(`chain ID ${chainId} exceeds ${Number.MAX_SAFE_INTEGER}`);
  }
}

export function parseAgentUpdated(log: Log) {
  return decoding('AgentUpdated', log, () => {
    const { args } = decodeEventLog({
      abi: AgentRegistryAbi,
      eventName: 'AgentUpdated',
      topics: getLogTopics(log),
      data: log.data,
    });
    args.chainIds.forEach(checkChainId);
    return args;
  });
}

export function parseAgentEnabled(log: Log) {
  return decoding('AgentEnabled', log, () =>
    decodeEventLog({
      abi: AgentRegistryAbi,
      eventName: 'AgentEnabled',
      topics: getLogTopics(log),
      data: log.data,
    }).args
  );
}

export function parseScannerUpdated(log: Log) {
  return decoding('ScannerUpdated', log, () => {
    const { args } = decodeEventLog({
      abi: ScannerRegistryAbi,
      eventName: 'ScannerUpdated',
      topics: getLogTopics(log),
      data: log.data,
    });
    checkChainId(args.chainId);
    return args;
  });
}

export function parseScannerEnabled(log: Log) {
  return decoding('ScannerEnabled', log, () =>
    decodeEventLog({
      abi: ScannerRegistryAbi,
      eventName: 'ScannerEnabled',
      topics: getLogTopics(log),
      data: log.data,
    }).args
  );
}

export function parseLink(log: Log) {
  return decoding('Link', log, () =>
    decodeEventLog({
      abi: DispatchAbi,
      eventName: 'Link',
      topics: getLogTopics(log),
      data: log.data,
    }).args
  );
}
