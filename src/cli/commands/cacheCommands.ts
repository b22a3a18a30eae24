import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const cacheCommand = new Command('cache')
  .description('Inspect or maintain the response cache')
  .addCommand(
    new Command('stats')
      .description('Count cached responses')
      .option('--cache-db <path>', 'SQLite response cache path')
      .action(async (options) => {
        await executeHandler('cache:stats', options);
      })
  )
  .addCommand(
    new Command('clear')
      .description('Remove every cached response')
      .option('--cache-db <path>', 'SQLite response cache path')
      .action(async (options) => {
        await executeHandler('cache:clear', options);
      })
  )
  .addCommand(
    new Command('prune')
      .description('Remove cached responses older than the TTL')
      .option('--cache-db <path>', 'SQLite response cache path')
      .option('--ttl-days <n>', 'Age limit in days (default: configured TTL)')
      .action(async (options) => {
        await executeHandler('cache:prune', options);
      })
  );
