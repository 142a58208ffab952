export { loadHandlers, printingHandlers } from './handlers.ts';
export { parseBlockCount, parseBlockNumber, parseRate } from './args.ts';
