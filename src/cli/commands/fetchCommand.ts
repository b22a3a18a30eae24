import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const fetchCommand = new Command('fetch')
  .description('Fetch one catalog entry by A-number (online, JSON)')
  .argument('<id>', 'A-number like A000045')
  .option('--base-url <url>', 'Catalog base URL (default: https://oeis.org)')
  .option('--timeout-ms <n>', 'HTTP timeout in milliseconds')
  .option('--cache-db <path>', 'SQLite response cache path')
  .option('--cache-ttl-days <n>', 'Ignore cached responses older than this')
  .option('--cache <policy>', 'Response cache policy: use|refresh|bypass', 'use')
  .action(async (id, options) => {
    await executeHandler('fetch', { id, ...options });
  });
