import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { formatScenarioResult } from '../scenario/format.js';
import { parseScenario } from '../scenario/parser.js';
import { runScenario } from '../scenario/runner.js';
import { ScenarioSyntaxError, type ScenarioStep } from '../scenario/types.js';

export type Print = (line: string) => void;

export interface RunCommandOptions {
  file: string;
  trace: boolean;
  maxTicks: number | undefined;
}

const SCENARIO_EXTENSION = '.js';

export function bundledScenariosDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../scenarios');
}

export function listBundledScenarios(): string[] {
  const dir = bundledScenariosDir();
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(SCENARIO_EXTENSION))
    .map((name) => name.slice(0, -SCENARIO_EXTENSION.length))
    .sort();
}

/**
 * Finds the scenario file: a path relative to `cwd`, or the name of a
 * bundled scenario (with or without `.js`).
 */
export function resolveScenarioPath(file: string, cwd: string = process.cwd()): string | null {
  const direct = path.resolve(cwd, file);
  if (fs.existsSync(direct) && fs.statSync(direct).isFile()) return direct;

  const name = file.endsWith(SCENARIO_EXTENSION) ? file : `${file}${SCENARIO_EXTENSION}`;
  const bundled = path.join(bundledScenariosDir(), name);
  if (fs.existsSync(bundled)) return bundled;

  return null;
}

/** Parses `run` arguments. Returns a list of issues instead of throwing. */
export function parseRunArgs(args: string[]): { options: RunCommandOptions | null; issues: string[] } {
  const issues: string[] = [];
  let file: string | null = null;
  let trace = false;
  let maxTicks: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--trace') {
      trace = true;
    } else if (arg === '--max-ticks') {
      const raw = args[i + 1];
      const value = raw === undefined ? Number.NaN : Number(raw);
      if (!Number.isInteger(value) || value <= 0) {
        issues.push('--max-ticks expects a positive integer');
      } else {
        maxTicks = value;
      }
      i++;
    } else if (arg.startsWith('-')) {
      issues.push(`Unknown option: ${arg}`);
    } else if (file === null) {
      file = arg;
    } else {
      issues.push(`Unexpected argument: ${arg}`);
    }
  }

  if (file === null) issues.push('Missing scenario file');

  if (issues.length > 0 || file === null) return { options: null, issues };
  return { options: { file, trace, maxTicks }, issues };
}

/** Runs one scenario file and prints the report. Returns the exit code. */
export function runScenarioCommand(options: RunCommandOptions, print: Print, cwd?: string): number {
  const scenarioPath = resolveScenarioPath(options.file, cwd);
  if (!scenarioPath) {
    print(`❌ Scenario not found: ${options.file}`);
    return 1;
  }

  const source = fs.readFileSync(scenarioPath, 'utf-8');

  let steps: ScenarioStep[];
  try {
    steps = parseScenario(source);
  } catch (error) {
    if (error instanceof ScenarioSyntaxError) {
      print(`❌ ${path.basename(scenarioPath)}: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const result = runScenario(steps, { trace: options.trace, maxTicks: options.maxTicks });
  for (const line of formatScenarioResult(result, { trace: options.trace })) print(line);

  return result.quiescent ? 0 : 1;
}
