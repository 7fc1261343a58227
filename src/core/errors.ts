import type { TaskKind } from './task.js';

/**
 * Where a reported failure came from.
 *
 * `synchronous` never reaches the sink (it is rethrown to the caller of
 * `runSynchronous`); it is listed so hosts can share one vocabulary.
 * `scheduler` covers run-loop faults such as an exceeded tick cap.
 */
export type TaskErrorKind = TaskKind | 'unhandledRejection' | 'synchronous' | 'scheduler';

export interface TaskErrorReport {
  kind: TaskErrorKind;
  /** Normalized error. */
  error: Error;
  /** The value that was actually thrown or rejected with. */
  reason: unknown;
  taskId: number | null;
  label: string | undefined;
  /** Virtual time at which the failure happened. */
  at: number;
}

export type ErrorSink = (report: TaskErrorReport) => void;

/**
 * Reported when a run-loop cap is hit (microtask iterations or ticks).
 * Whatever was still queued for the capped phase has been discarded.
 */
export class SchedulerLimitError extends Error {
  readonly limit: number;
  readonly discarded: number;

  constructor(message: string, limit: number, discarded: number) {
    super(message);
    this.name = 'SchedulerLimitError';
    this.limit = limit;
    this.discarded = discarded;
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  try {
    return new Error(JSON.stringify(value) ?? String(value));
  } catch {
    return new Error(String(value));
  }
}

const KIND_LABELS: Record<TaskErrorKind, string> = {
  microtask: 'microtask',
  timer: 'timer',
  animationFrame: 'animation frame',
  nextTick: 'nextTick callback',
  immediate: 'immediate',
  unhandledRejection: 'promise rejection (unhandled)',
  synchronous: 'synchronous script',
  scheduler: 'scheduler',
};

export function describeErrorKind(kind: TaskErrorKind): string {
  return KIND_LABELS[kind];
}

/** Used when a scheduler is created without `onError`. */
export const defaultErrorSink: ErrorSink = (report) => {
  const where = report.label ? ` in "${report.label}"` : '';
  console.error(`[ticklab] Uncaught ${describeErrorKind(report.kind)} error${where}:`, report.error);
};
