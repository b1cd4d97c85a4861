#!/usr/bin/env node

import { Command, Option } from 'commander';
import { analyzeAction } from './commands/analyze';
import type { AnalyzeOptions } from './commands/analyze';
import { CLI_VERSION } from './version';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('detect_oscillation')
    .description('Detect focus oscillation (hunting) in a watch log')
    .version(CLI_VERSION)
    // Variadic so a wrong argument count reaches the command's usage message.
    .argument('[watch_log_file...]', 'Watch log to analyze')
    .option('--config <path>', 'Config file (default: ~/.config/focuslog/config.json)')
    .option('--strict', 'Fail on malformed focus fields instead of skipping them')
    .addOption(new Option('--axis <axis>', 'Coordinate to sample').choices(['x', 'y', 'z']))
    .option('--field <name>', 'JSON key of the coordinate array (default: focus)')
    .option('--window <n>', 'Trailing transitions searched for cycles (default: 50)', (v: string) => Number(v))
    .addOption(new Option('--exit-codes <mode>', 'Exit code contract').choices(['binary', 'tri-state']))
    .action((files: string[], opts: AnalyzeOptions) => {
      analyzeAction(files, opts);
    });

  return program;
}

if (require.main === module) {
  buildProgram().parse();
}
