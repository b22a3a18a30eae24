import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const probeCommand = new Command('probe')
  .description('Probe integer terms against the catalog (default command)')
  .argument('[terms]', 'Terms like "1,2,3,6,11,23"')
  .option('--terms-file <file>', 'Read terms from a text file (comma/space-separated)')
  .option('--max-hits <n>', 'Maximum number of hits to report', '10')
  .option('--rank <policy>', "Ranking: 'strict' or 'prefer-early' (smaller alignment index wins ties)", 'strict')
  .option('--min-match-len <n>', 'Drop hits whose consecutive match is shorter than this', '0')
  .option('--relax', 'When nothing matches, retry with trailing terms dropped one at a time', false)
  .option('--relax-min-terms <n>', 'Never shorten the query below this many terms', '3')
  .option('--relax-max-steps <n>', 'Cap on shortened retries')
  .option('--explain-top', 'Explain where the query first diverges from the top hit', false)
  .option('--no-online', 'Disable the online lookup')
  .option('--offline-stripped <path>', 'Path to a stripped or stripped.gz dump')
  .option('--offline-names <path>', 'Path to a names or names.gz dump')
  .option('--offline-max-scan <n>', 'Stop reading the stripped dump after N lines')
  .option('--strict-providers', 'Fail instead of skipping a source whose lookup fails', false)
  .option('--base-url <url>', 'Catalog base URL (default: https://oeis.org)')
  .option('--timeout-ms <n>', 'HTTP timeout in milliseconds')
  .option('--max-query-terms <n>', 'Maximum terms sent to the online search')
  .option('--cache-db <path>', 'SQLite response cache path')
  .option('--cache-ttl-days <n>', 'Ignore cached responses older than this')
  .option('--cache <policy>', 'Response cache policy: use|refresh|bypass', 'use')
  .option('--json-out <file>', 'Also write the JSON report to a file')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (terms, options) => {
    await executeHandler('probe', { terms, ...options });
  });
