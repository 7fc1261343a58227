#!/usr/bin/env node

import { listBundledScenarios, parseRunArgs, runScenarioCommand } from './run.js';

const args = process.argv.slice(2);
const command = args[0];
const commandArgs = args.slice(1);

function showHelp() {
  console.log(`
ticklab CLI

Usage:
  ticklab run <file> [options]    Run a snippet on the virtual event loop and print the output order
  ticklab list                    List bundled example scenarios
  ticklab help                    Show this help message

Options:
  --trace             Print every scheduler event
  --max-ticks <n>     Stop after n ticks (default: 10000)

Examples:
  npx ticklab run scenarios/timeout-vs-microtask.js
  npx ticklab run frame-vs-microtask --trace
  npx ticklab list
`);
}

function hasHelpFlag(list: string[]): boolean {
  return list.includes('--help') || list.includes('-h') || list.includes('help');
}

function main(): number {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return 0;
  }

  if (command === 'list') {
    const names = listBundledScenarios();
    if (names.length === 0) {
      console.log('No bundled scenarios found.');
      return 0;
    }
    for (const name of names) console.log(`  ${name}`);
    return 0;
  }

  if (command === 'run') {
    if (hasHelpFlag(commandArgs)) {
      showHelp();
      return 0;
    }

    const { options, issues } = parseRunArgs(commandArgs);
    if (!options) {
      for (const issue of issues) console.error(`❌ ${issue}`);
      console.error('Run "ticklab help" for usage.');
      return 1;
    }
    return runScenarioCommand(options, (line) => console.log(line));
  }

  console.error(`❌ Unknown command: ${command}`);
  showHelp();
  return 1;
}

process.exitCode = main();
