#!/usr/bin/env node
import { program } from 'commander';
import { increaseVerbosity, parseBlockCount, parseBlockNumber, parseRate } from './args.ts';
import { backfillCommand } from './commands/backfill.ts';
import { lastCommand } from './commands/last.ts';
import { listenCommand } from './commands/listen.ts';

program
  .name('chainfeed')
  .description('Follow registry contracts and dispatch their events')
  .version('0.1.0');

// Listen command - follow the chain
program
  .command('listen')
  .description('Follow the chain from the configured start block')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Increase verbosity', increaseVerbosity, 0)
  .option('--handlers <module>', 'Module exporting message handlers (default: print JSON lines)')
  .action(listenCommand);

// Last command - one-off pass over recent blocks
program
  .command('last')
  .description('Handle the registry logs of the most recent blocks once')
  .argument('<blocks>', 'Number of blocks back from the head', parseBlockCount)
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Increase verbosity', increaseVerbosity, 0)
  .option('--handlers <module>', 'Module exporting message handlers (default: print JSON lines)')
  .action(lastCommand);

// Backfill command - bounded, rate-limited range
program
  .command('backfill')
  .description('Handle a bounded block range')
  .requiredOption('--from <block>', 'First block, inclusive', parseBlockNumber)
  .requiredOption('--to <block>', 'Last block, inclusive', parseBlockNumber)
  .option('--rate <blocks>', 'Blocks per second', parseRate, 10)
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Increase verbosity', increaseVerbosity, 0)
  .option('--handlers <module>', 'Module exporting message handlers (default: print JSON lines)')
  .action(backfillCommand);

await program.parseAsync();
