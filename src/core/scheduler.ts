/**
 * Virtual event-loop scheduler.
 *
 * Models how an engine orders work on one thread:
 * - `runSynchronous` is the call stack: the action runs to completion and
 *   everything it submits is queued, never run inline.
 * - Microtasks (and Node-style nextTicks) drain fully before anything else.
 * - Each tick runs the pending animation-frame batch, then at most one due
 *   timer, then the immediates queued before the check phase.
 *
 * Time is virtual and only moves when the caller advances it, so ordering is
 * deterministic. Every scheduler is independent; there is no ambient loop.
 *
 * Invariants:
 * - Queues are FIFO; timers are ordered by (dueTime, sequence).
 * - A timer never runs before its due time.
 * - Only `runSynchronous` throws outward. Queue-driven failures go to the
 *   error sink and never stop the drain or the tick.
 */

import { createVirtualClock, normalizeDuration, type VirtualClock } from './clock.js';
import { spawn, type AsyncBody } from './coroutine.js';
import {
  defaultErrorSink,
  SchedulerLimitError,
  toError,
  type ErrorSink,
  type TaskErrorKind,
  type TaskErrorReport,
} from './errors.js';
import { SimPromise, type Executor, type PromiseHost } from './promise.js';
import {
  normalizeLabel,
  viewTask,
  type BatchTask,
  type QueuedTaskView,
  type ScheduleOptions,
  type Task,
  type TaskAction,
  type TaskKind,
  type TimerTask,
} from './task.js';
import { TimerHeap } from './timer-heap.js';
import { createTraceRecorder, type TraceOptions, type TraceRecorder } from './trace.js';

/**
 * Scheduler defaults.
 */
export interface SchedulerConfig {
  /**
   * Microtask runs allowed in one drain before the rest are discarded and a
   * `SchedulerLimitError` is reported. Default: Infinity, so an endless
   * producer starves the loop exactly like a real engine.
   */
  maxMicrotaskIterations: number;

  /** Tick cap for `runUntilQuiescent`. Default: 10000. */
  maxTicks: number;

  /** Trace ring size. Default: 500. */
  maxTraceEvents: number;
}

const schedulerConfig: SchedulerConfig = {
  maxMicrotaskIterations: Infinity,
  maxTicks: 10_000,
  maxTraceEvents: 500,
};

/**
 * Change the defaults used by schedulers created afterwards.
 *
 * Example:
 * ```ts
 * configureScheduler({ maxMicrotaskIterations: 10_000 });
 * ```
 */
export function configureScheduler(config: Partial<SchedulerConfig>): void {
  Object.assign(schedulerConfig, config);
}

export function getSchedulerConfig(): Readonly<SchedulerConfig> {
  return { ...schedulerConfig };
}

export interface SchedulerOptions extends Partial<SchedulerConfig> {
  /** Virtual time source. Default: a fresh clock starting at 0. */
  clock?: VirtualClock;
  /** Receives every queue-driven failure. Default: `console.error`. */
  onError?: ErrorSink;
  /** `true` enables tracing with default options. */
  trace?: TraceOptions | boolean;
}

export interface RunUntilQuiescentOptions {
  /**
   * Fixed time step per tick. When omitted, time only moves when nothing is
   * runnable, and then jumps straight to the next timer's due time.
   */
  advanceBy?: number;
  /** Default: scheduler `maxTicks`. */
  maxTicks?: number;
}

export interface SchedulerSnapshot {
  now: number;
  /** Number of actions currently on the call stack. */
  stackDepth: number;
  ticks: number;
  nextTicks: QueuedTaskView[];
  microtasks: QueuedTaskView[];
  /** In the order they will run. */
  timers: QueuedTaskView[];
  animationFrames: QueuedTaskView[];
  immediates: QueuedTaskView[];
  pendingRejections: number;
}

export interface Scheduler {
  readonly clock: VirtualClock;
  readonly trace: TraceRecorder;

  now(): number;

  runSynchronous(action: TaskAction, options?: ScheduleOptions): void;
  queueMicrotask(action: TaskAction, options?: ScheduleOptions): void;
  queueNextTick(action: TaskAction, options?: ScheduleOptions): void;

  setTimer(action: TaskAction, delayMs?: number, options?: ScheduleOptions): number;
  setInterval(action: TaskAction, intervalMs?: number, options?: ScheduleOptions): number;
  cancelTimer(handle: number): void;

  requestAnimationFrame(action: TaskAction, options?: ScheduleOptions): number;
  cancelAnimationFrame(handle: number): void;

  setImmediate(action: TaskAction, options?: ScheduleOptions): number;
  clearImmediate(handle: number): void;

  drainMicrotasks(): void;
  runOneTick(advanceVirtualTimeBy?: number): boolean;
  runUntilQuiescent(options?: RunUntilQuiescentOptions): number;
  /** Stops a running `runUntilQuiescent` after its current tick. */
  halt(): void;

  isQuiescent(): boolean;
  /** True while any action is on the call stack. */
  isRunning(): boolean;
  getSnapshot(): SchedulerSnapshot;

  resolve<T>(value: T | PromiseLike<T>, options?: ScheduleOptions): SimPromise<T>;
  reject<T = never>(reason: unknown, options?: ScheduleOptions): SimPromise<T>;
  promise<T>(executor: Executor<T>, options?: ScheduleOptions): SimPromise<T>;
  spawn<T>(body: AsyncBody<T>, options?: ScheduleOptions): SimPromise<T>;
}

const warnedMessages = new Set<string>();

function warnOnce(message: string): void {
  if (warnedMessages.has(message)) return;
  warnedMessages.add(message);
  console.warn(`[ticklab] ${message}`);
}

function normalizeDelay(delayMs: number | undefined): number {
  if (typeof delayMs !== 'number' || !Number.isFinite(delayMs)) return 0;
  return Math.max(0, delayMs);
}

function resolveTraceOptions(trace: SchedulerOptions['trace']): TraceOptions {
  if (trace === true) return { enabled: true };
  if (trace === false || trace === undefined) return {};
  return trace;
}

export function createScheduler(options: SchedulerOptions = {}): Scheduler {
  const config: SchedulerConfig = {
    maxMicrotaskIterations: options.maxMicrotaskIterations ?? schedulerConfig.maxMicrotaskIterations,
    maxTicks: options.maxTicks ?? schedulerConfig.maxTicks,
    maxTraceEvents: options.maxTraceEvents ?? schedulerConfig.maxTraceEvents,
  };
  const clock = options.clock ?? createVirtualClock();
  const sink = options.onError ?? defaultErrorSink;
  const traceOptions = resolveTraceOptions(options.trace);
  const trace = createTraceRecorder({
    ...traceOptions,
    maxEvents: traceOptions.maxEvents ?? config.maxTraceEvents,
  });

  let nextSequence = 1;
  let stackDepth = 0;
  let ticks = 0;
  let isDraining = false;
  let isTicking = false;
  let halted = false;

  const nextTickQueue: Task[] = [];
  const microtaskQueue: Task[] = [];
  const timers = new TimerHeap();
  /** Live timers by handle, including an interval while its callback runs. */
  const timerIndex = new Map<number, TimerTask>();
  let frameBatch: BatchTask[] = [];
  let runningFrames: BatchTask[] = [];
  let immediateQueue: BatchTask[] = [];
  let runningImmediates: BatchTask[] = [];
  const pendingRejections = new Set<SimPromise<unknown>>();
  let executed = 0;

  function createTask(kind: TaskKind, action: TaskAction, options: ScheduleOptions | undefined): Task {
    const sequence = nextSequence++;
    return { id: sequence, kind, action, sequence, label: normalizeLabel(options) };
  }

  function traceEnqueue(task: Task, detail?: Record<string, unknown>): void {
    trace.emit({
      type: 'task.enqueue',
      at: clock.now(),
      taskId: task.id,
      kind: task.kind,
      label: task.label,
      detail,
    });
  }

  function report(kind: TaskErrorKind, reason: unknown, task: Task | null, label?: string): void {
    const error = toError(reason);
    const entry: TaskErrorReport = {
      kind,
      error,
      reason,
      taskId: task ? task.id : null,
      label: task ? task.label : label,
      at: clock.now(),
    };

    trace.emit({
      type: 'task.error',
      at: entry.at,
      taskId: task ? task.id : undefined,
      kind,
      label: entry.label,
      detail: { message: error.message },
    });

    try {
      sink(entry);
    } catch (sinkError) {
      console.error('[ticklab] Error sink threw:', sinkError);
    }
  }

  function runTask(task: Task): void {
    trace.emit({ type: 'task.run', at: clock.now(), taskId: task.id, kind: task.kind, label: task.label });
    executed++;
    stackDepth++;
    try {
      task.action();
    } catch (reason) {
      report(task.kind, reason, task);
    } finally {
      stackDepth--;
    }
  }

  function hasMicrotaskWork(): boolean {
    return nextTickQueue.length > 0 || microtaskQueue.length > 0;
  }

  function discardMicrotasks(limit: number): void {
    const discarded = nextTickQueue.length + microtaskQueue.length;
    for (const task of [...nextTickQueue, ...microtaskQueue]) {
      trace.emit({ type: 'task.discard', at: clock.now(), taskId: task.id, kind: task.kind, label: task.label });
    }
    nextTickQueue.length = 0;
    microtaskQueue.length = 0;
    report(
      'microtask',
      new SchedulerLimitError(
        `Scheduler exceeded ${limit} microtask iterations. ` +
          `Possible infinite loop detected. Remaining ${discarded} tasks discarded.`,
        limit,
        discarded
      ),
      null
    );
  }

  function flushUnhandledRejections(): void {
    if (pendingRejections.size === 0) return;
    const rejected = [...pendingRejections];
    pendingRejections.clear();
    for (const promise of rejected) {
      report('unhandledRejection', promise.peekValue(), null, promise.label);
    }
  }

  function drainMicrotasks(): void {
    // A microtask calling drainMicrotasks() must not reorder the outer drain.
    if (isDraining) return;
    if (stackDepth > 0) {
      warnOnce('drainMicrotasks() was called from inside a running action and was ignored.');
      return;
    }
    isDraining = true;

    let iterations = 0;
    const maxIterations = config.maxMicrotaskIterations;

    try {
      while (hasMicrotaskWork()) {
        while (nextTickQueue.length > 0 && iterations < maxIterations) {
          const task = nextTickQueue.shift();
          if (task) runTask(task);
          iterations++;
        }
        while (microtaskQueue.length > 0 && iterations < maxIterations) {
          const task = microtaskQueue.shift();
          if (task) runTask(task);
          iterations++;
        }
        if (iterations >= maxIterations && hasMicrotaskWork()) {
          discardMicrotasks(maxIterations);
        }
      }
    } finally {
      isDraining = false;
    }

    flushUnhandledRejections();
  }

  function runFrameBatch(): void {
    if (frameBatch.length === 0) return;
    // Callbacks requested from inside the batch land in the next one.
    runningFrames = frameBatch;
    frameBatch = [];
    try {
      for (const task of runningFrames) {
        if (task.cancelled) continue;
        task.ran = true;
        runTask(task);
      }
    } finally {
      runningFrames = [];
    }
  }

  function rearmInterval(task: TimerTask, period: number): void {
    task.sequence = nextSequence++;
    task.dueTime = clock.now() + period;
    timers.push(task);
    traceEnqueue(task, { dueTime: task.dueTime, interval: period });
  }

  function runDueTimer(): void {
    const next = timers.peek();
    if (!next || next.dueTime > clock.now()) return;

    timers.pop();
    // A one-shot timer is already spent; an interval stays cancellable from its own callback.
    if (next.interval === null) timerIndex.delete(next.id);
    runTask(next);

    if (next.interval !== null && !next.cancelled) {
      rearmInterval(next, next.interval);
    }
  }

  function runCheckPhase(): void {
    if (immediateQueue.length === 0) return;
    runningImmediates = immediateQueue;
    immediateQueue = [];
    try {
      for (const task of runningImmediates) {
        if (task.cancelled) continue;
        task.ran = true;
        runTask(task);
        drainMicrotasks();
      }
    } finally {
      runningImmediates = [];
    }
  }

  function hasRunnableWork(): boolean {
    if (hasMicrotaskWork() || frameBatch.length > 0 || immediateQueue.length > 0) return true;
    // The next drain reports them.
    if (pendingRejections.size > 0) return true;
    const next = timers.peek();
    return next !== undefined && next.dueTime <= clock.now();
  }

  function advance(ms: number): void {
    if (ms <= 0) return;
    const from = clock.now();
    const to = clock.advance(ms);
    trace.emit({ type: 'time.advance', at: to, detail: { from, by: ms } });
  }

  function cancelBatchTask(handle: number, queued: BatchTask[], running: BatchTask[]): BatchTask | undefined {
    const index = queued.findIndex((task) => task.id === handle);
    if (index !== -1) {
      const [task] = queued.splice(index, 1);
      task.cancelled = true;
      return task;
    }
    const task = running.find((candidate) => candidate.id === handle);
    if (!task || task.cancelled || task.ran) return undefined;
    task.cancelled = true;
    return task;
  }

  function traceCancel(task: Task): void {
    trace.emit({ type: 'task.cancel', at: clock.now(), taskId: task.id, kind: task.kind, label: task.label });
  }

  const promiseHost: PromiseHost = {
    queueMicrotask: (action, options) => scheduler.queueMicrotask(action, options),
    trackRejection: (promise) => {
      pendingRejections.add(promise);
    },
    untrackRejection: (promise) => {
      pendingRejections.delete(promise);
    },
  };

  const scheduler: Scheduler = {
    clock,
    trace,

    now() {
      return clock.now();
    },

    runSynchronous(action, options) {
      const label = normalizeLabel(options);
      stackDepth++;
      trace.emit({ type: 'stack.push', at: clock.now(), label, detail: { depth: stackDepth } });
      try {
        action();
      } finally {
        stackDepth--;
        trace.emit({ type: 'stack.pop', at: clock.now(), label, detail: { depth: stackDepth } });
      }
    },

    queueMicrotask(action, options) {
      const task = createTask('microtask', action, options);
      microtaskQueue.push(task);
      traceEnqueue(task);
    },

    queueNextTick(action, options) {
      const task = createTask('nextTick', action, options);
      nextTickQueue.push(task);
      traceEnqueue(task);
    },

    setTimer(action, delayMs, options) {
      const delay = normalizeDelay(delayMs);
      const task: TimerTask = {
        ...createTask('timer', action, options),
        kind: 'timer',
        dueTime: clock.now() + delay,
        cancelled: false,
        interval: null,
      };
      timers.push(task);
      timerIndex.set(task.id, task);
      traceEnqueue(task, { dueTime: task.dueTime });
      return task.id;
    },

    setInterval(action, intervalMs, options) {
      const period = Math.max(1, normalizeDelay(intervalMs));
      const task: TimerTask = {
        ...createTask('timer', action, options),
        kind: 'timer',
        dueTime: clock.now() + period,
        cancelled: false,
        interval: period,
      };
      timers.push(task);
      timerIndex.set(task.id, task);
      traceEnqueue(task, { dueTime: task.dueTime, interval: period });
      return task.id;
    },

    cancelTimer(handle) {
      const task = timerIndex.get(handle);
      if (!task) return;
      task.cancelled = true;
      timers.remove(handle);
      timerIndex.delete(handle);
      traceCancel(task);
    },

    requestAnimationFrame(action, options) {
      const task: BatchTask = {
        ...createTask('animationFrame', action, options),
        kind: 'animationFrame',
        cancelled: false,
        ran: false,
      };
      frameBatch.push(task);
      traceEnqueue(task);
      return task.id;
    },

    cancelAnimationFrame(handle) {
      const task = cancelBatchTask(handle, frameBatch, runningFrames);
      if (task) traceCancel(task);
    },

    setImmediate(action, options) {
      const task: BatchTask = {
        ...createTask('immediate', action, options),
        kind: 'immediate',
        cancelled: false,
        ran: false,
      };
      immediateQueue.push(task);
      traceEnqueue(task);
      return task.id;
    },

    clearImmediate(handle) {
      const task = cancelBatchTask(handle, immediateQueue, runningImmediates);
      if (task) traceCancel(task);
    },

    drainMicrotasks,

    runOneTick(advanceVirtualTimeBy) {
      if (isTicking || stackDepth > 0) {
        warnOnce('runOneTick() was called from inside a running action and was ignored.');
        return false;
      }

      isTicking = true;
      ticks++;
      const before = executed;

      try {
        advance(normalizeDuration(advanceVirtualTimeBy));
        trace.emit({ type: 'tick.start', at: clock.now(), detail: { tick: ticks } });

        drainMicrotasks();
        runFrameBatch();
        drainMicrotasks();
        runDueTimer();
        drainMicrotasks();
        runCheckPhase();
      } finally {
        isTicking = false;
        trace.emit({ type: 'tick.end', at: clock.now(), detail: { tick: ticks, ran: executed - before } });
      }

      return executed > before;
    },

    runUntilQuiescent(runOptions = {}) {
      if (isTicking || stackDepth > 0) {
        warnOnce('runUntilQuiescent() was called from inside a running action and was ignored.');
        return 0;
      }

      const maxTicks = runOptions.maxTicks ?? config.maxTicks;
      const step = runOptions.advanceBy === undefined ? undefined : normalizeDuration(runOptions.advanceBy);
      let count = 0;
      halted = false;

      while (!scheduler.isQuiescent() && !halted) {
        if (count >= maxTicks) {
          report(
            'scheduler',
            new SchedulerLimitError(
              `runUntilQuiescent() stopped after ${maxTicks} ticks with work still queued.`,
              maxTicks,
              0
            ),
            null
          );
          break;
        }

        let by = step ?? 0;
        if (step === undefined && !hasRunnableWork()) {
          const next = timers.peek();
          if (next) by = next.dueTime - clock.now();
        }

        scheduler.runOneTick(by);
        count++;
      }

      halted = false;
      return count;
    },

    halt() {
      halted = true;
    },

    isQuiescent() {
      return (
        stackDepth === 0 &&
        !hasMicrotaskWork() &&
        pendingRejections.size === 0 &&
        timers.size === 0 &&
        frameBatch.length === 0 &&
        immediateQueue.length === 0
      );
    },

    isRunning() {
      return stackDepth > 0;
    },

    getSnapshot() {
      return {
        now: clock.now(),
        stackDepth,
        ticks,
        nextTicks: nextTickQueue.map(viewTask),
        microtasks: microtaskQueue.map(viewTask),
        timers: timers.toSortedArray().map(viewTask),
        animationFrames: frameBatch.map(viewTask),
        immediates: immediateQueue.map(viewTask),
        pendingRejections: pendingRejections.size,
      };
    },

    resolve<T>(value: T | PromiseLike<T>, options?: ScheduleOptions) {
      if (value instanceof SimPromise && options === undefined) return value;
      return new SimPromise<T>(promiseHost, (resolve) => resolve(value), normalizeLabel(options));
    },

    reject<T = never>(reason: unknown, options?: ScheduleOptions) {
      return new SimPromise<T>(promiseHost, (_resolve, reject) => reject(reason), normalizeLabel(options));
    },

    promise<T>(executor: Executor<T>, options?: ScheduleOptions) {
      return new SimPromise<T>(promiseHost, executor, normalizeLabel(options));
    },

    spawn<T>(body: AsyncBody<T>, options?: ScheduleOptions) {
      return spawn(promiseHost, body, normalizeLabel(options));
    },
  };

  return scheduler;
}
