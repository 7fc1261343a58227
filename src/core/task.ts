/**
 * Task model shared by every queue of the scheduler.
 *
 * `microtask`, `timer` and `animationFrame` are the generic event-loop kinds.
 * `nextTick` and `immediate` model Node's extra phases and are opt-in.
 */
export type TaskKind = 'microtask' | 'timer' | 'animationFrame' | 'nextTick' | 'immediate';

export type TaskAction = () => void;

export interface ScheduleOptions {
  /** Optional name shown in traces and error reports. */
  label?: string;
}

export interface Task {
  /** Stable identity; also the handle returned to callers. */
  id: number;
  kind: TaskKind;
  action: TaskAction;
  /** Submission order. Re-armed intervals take a fresh value. */
  sequence: number;
  label: string | undefined;
}

export interface TimerTask extends Task {
  kind: 'timer';
  dueTime: number;
  cancelled: boolean;
  /** Re-arm period for `setInterval`, `null` for one-shot timers. */
  interval: number | null;
}

/** Frame callbacks and immediates run from a batch snapshot and can be cancelled mid-batch. */
export interface BatchTask extends Task {
  kind: 'animationFrame' | 'immediate';
  cancelled: boolean;
  ran: boolean;
}

/** Read-only view of a queued task, as exposed by snapshots. */
export interface QueuedTaskView {
  id: number;
  kind: TaskKind;
  sequence: number;
  label: string | undefined;
  dueTime?: number;
}

export function viewTask(task: Task | TimerTask): QueuedTaskView {
  const view: QueuedTaskView = {
    id: task.id,
    kind: task.kind,
    sequence: task.sequence,
    label: task.label,
  };
  if ('dueTime' in task) view.dueTime = task.dueTime;
  return view;
}

export function normalizeLabel(options: ScheduleOptions | undefined): string | undefined {
  if (!options || typeof options.label !== 'string') return undefined;
  const trimmed = options.label.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
