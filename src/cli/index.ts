#!/usr/bin/env node
/**
 * tickbridge CLI
 *
 * Replays timer scenarios against the host timing module
 */

import { readFileSync } from 'fs';
import path from 'path';
import { Command } from 'commander';
import { formatRecord, parseScenario, runScenario } from './simulate';

function readVersion(): string {
  // Same relative location from src/cli and dist/cli
  const pkgPath = path.resolve(__dirname, '../../package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
  if (
    typeof pkg === 'object' &&
    pkg !== null &&
    'version' in pkg &&
    typeof pkg.version === 'string'
  ) {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tickbridge')
    .description('tickbridge CLI - Simulate guest timers against the host frame clock')
    .version(readVersion());

  program
    .command('simulate')
    .description('Replay a scenario file and print every outbound call and state change')
    .argument('<scenario>', 'Scenario JSON file (e.g., examples/scenarios/basic.json)')
    .option('--json', 'Print one JSON record per line')
    .option('--debug', 'Log timing internals')
    .action((scenarioPath: string, opts: { json?: boolean; debug?: boolean }) => {
      try {
        const raw: unknown = JSON.parse(readFileSync(path.resolve(scenarioPath), 'utf8'));
        const records = runScenario(parseScenario(raw), {
          debug: opts.debug ?? false,
          logger: opts.debug ? console : undefined,
        });
        for (const record of records) {
          console.log(opts.json ? JSON.stringify(record) : formatRecord(record));
        }
      } catch (error) {
        console.error('Simulate failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parse();
}
