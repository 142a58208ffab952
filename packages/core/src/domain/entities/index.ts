// Block exports
export type { Block, BlockEvent, BlockRange } from './Block.ts';
export { createBlock, createBlockEvent, createBlockRange, blockRangeSize } from './Block.ts';

// Log exports
export type { Log, RawLog, LogFilter } from './Log.ts';
export { createLog, getLogTopics, getLogOrderKey, compareLogs } from './Log.ts';

// Trace exports
export type { Trace, TraceAction, TraceResult, RawTrace } from './Trace.ts';
export { createTrace } from './Trace.ts';
