import { toEventSelector } from 'viem';

export const AGENT_UPDATED_TOPIC = toEventSelector('AgentUpdated(uint256,address,string,uint256[])');
export const AGENT_ENABLED_TOPIC = toEventSelector('AgentEnabled(uint256,bool,uint8,bool)');
export const SCANNER_UPDATED_TOPIC = toEventSelector('ScannerUpdated(uint256,uint256,string)');
export const SCANNER_ENABLED_TOPIC = toEventSelector('ScannerEnabled(uint256,bool,uint8,bool)');
export const LINK_TOPIC = toEventSelector('Link(uint256,uint256,bool)');
