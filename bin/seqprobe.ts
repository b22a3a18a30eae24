#!/usr/bin/env node
import { Command } from 'commander';
import { probeCommand } from '../src/cli/commands/probeCommand';
import { fetchCommand } from '../src/cli/commands/fetchCommand';
import { cacheCommand } from '../src/cli/commands/cacheCommands';
import { readPackageVersion } from '../src/core/version';

const COMMANDS = new Set(['probe', 'fetch', 'cache', 'help']);

/** Bare terms (`seqprobe 1,2,3`) run the probe command. */
export function routeArgv(argv: string[]): string[] {
  const sub = argv[2];
  const isHelpFlag = sub === '-h' || sub === '--help';
  const isVersionFlag = sub === '-V' || sub === '--version';
  if (sub !== undefined && (COMMANDS.has(sub) || isHelpFlag || isVersionFlag)) return argv;
  return [...argv.slice(0, 2), 'probe', ...argv.slice(2)];
}

function main() {
  const program = new Command();
  program
    .name('seqprobe')
    .description('seqprobe: identify integer sequences against the OEIS (online search + offline dumps)')
    .version(readPackageVersion());

  program.addCommand(probeCommand, { isDefault: true });
  program.addCommand(fetchCommand);
  program.addCommand(cacheCommand);
  program.parse(routeArgv(process.argv));
}

if (require.main === module) main();
