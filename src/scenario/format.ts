import { describeErrorKind } from '../core/errors.js';
import { formatTraceEvent } from '../core/trace.js';
import type { ScenarioResult } from './runner.js';

export interface FormatOptions {
  trace?: boolean;
}

/** Plain-text report printed by the CLI. */
export function formatScenarioResult(result: ScenarioResult, options: FormatOptions = {}): string[] {
  const lines: string[] = [];

  lines.push('Output:');
  if (result.output.length === 0) lines.push('  (nothing logged)');
  result.output.forEach((line, index) => lines.push(`  ${index + 1}. ${line}`));

  if (result.errors.length > 0) {
    lines.push('');
    lines.push('Errors:');
    for (const report of result.errors) {
      const where = report.label ? ` (${report.label})` : '';
      lines.push(`  Uncaught ${describeErrorKind(report.kind)}${where}: ${report.error.message}`);
    }
  }

  if (options.trace) {
    lines.push('');
    lines.push('Trace:');
    for (const event of result.trace) lines.push(`  ${formatTraceEvent(event)}`);
  }

  lines.push('');
  const state = result.quiescent ? 'quiescent' : 'stopped with work queued';
  lines.push(`Finished after ${result.ticks} tick(s) at t=${result.endedAt}ms, ${state}.`);

  return lines;
}
