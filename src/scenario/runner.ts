import { createScheduler, type Scheduler } from '../core/scheduler.js';
import { toError, type TaskErrorReport } from '../core/errors.js';
import type { TraceEvent } from '../core/trace.js';
import type { CallbackStep, ScenarioStep } from './types.js';

export interface RunScenarioOptions {
  /** Record trace events. Default: false. */
  trace?: boolean;
  /** Tick cap passed to `runUntilQuiescent`. */
  maxTicks?: number;
}

export interface ScenarioResult {
  /** `console.log` lines in the order they were printed. */
  output: string[];
  errors: TaskErrorReport[];
  trace: TraceEvent[];
  ticks: number;
  /** Virtual time when the run stopped. */
  endedAt: number;
  quiescent: boolean;
}

function labelFor(step: CallbackStep): string {
  return `${step.type}@${step.line}`;
}

function submit(scheduler: Scheduler, step: CallbackStep, run: (steps: ScenarioStep[]) => void): void {
  const body = () => run(step.body);
  const options = { label: labelFor(step) };

  switch (step.type) {
    case 'setTimeout':
      scheduler.setTimer(body, step.delay, options);
      return;
    case 'setImmediate':
      scheduler.setImmediate(body, options);
      return;
    case 'promiseThen':
      scheduler.resolve(undefined, options).then(body);
      return;
    case 'queueMicrotask':
      scheduler.queueMicrotask(body, options);
      return;
    case 'nextTick':
      scheduler.queueNextTick(body, options);
      return;
    case 'requestAnimationFrame':
      scheduler.requestAnimationFrame(body, options);
      return;
  }
}

/**
 * Runs a parsed scenario on a fresh scheduler until it goes quiet.
 *
 * A `throw` in the main script ends the script (like an uncaught error in a
 * page script) and is recorded with kind `synchronous`; work it already
 * queued still runs.
 */
export function runScenario(steps: ScenarioStep[], options: RunScenarioOptions = {}): ScenarioResult {
  const output: string[] = [];
  const errors: TaskErrorReport[] = [];
  const scheduler = createScheduler({
    trace: options.trace === true,
    maxTicks: options.maxTicks,
    onError: (report) => errors.push(report),
  });

  const run = (list: ScenarioStep[]): void => {
    for (const step of list) {
      if (step.type === 'log') {
        output.push(step.message);
      } else if (step.type === 'throw') {
        throw new Error(step.message);
      } else {
        submit(scheduler, step, run);
      }
    }
  };

  try {
    scheduler.runSynchronous(() => run(steps), { label: 'main' });
  } catch (reason) {
    errors.push({
      kind: 'synchronous',
      error: toError(reason),
      reason,
      taskId: null,
      label: 'main',
      at: scheduler.now(),
    });
  }

  const ticks = scheduler.runUntilQuiescent();

  return {
    output,
    errors,
    trace: scheduler.trace.getEvents(),
    ticks,
    endedAt: scheduler.now(),
    quiescent: scheduler.isQuiescent(),
  };
}
