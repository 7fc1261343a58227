import type { TaskErrorKind } from './errors.js';
import type { TaskKind } from './task.js';

export type TraceEventType =
  | 'stack.push'
  | 'stack.pop'
  | 'task.enqueue'
  | 'task.run'
  | 'task.cancel'
  | 'task.error'
  | 'task.discard'
  | 'tick.start'
  | 'tick.end'
  | 'time.advance';

export interface TraceEvent {
  type: TraceEventType;
  /** Virtual time of the event. */
  at: number;
  taskId?: number;
  kind?: TaskKind | TaskErrorKind;
  label?: string;
  /** Extra event data: due time, tick number, stack depth, error message. */
  detail?: Record<string, unknown>;
}

export interface TraceOptions {
  /** Record events. Default: false. */
  enabled?: boolean;
  /** Ring size of the event log. Default: scheduler config `maxTraceEvents`. */
  maxEvents?: number;
}

export interface TraceRecorder {
  isEnabled(): boolean;
  setEnabled(next: boolean): void;
  emit(event: TraceEvent): void;
  /** Listeners are called for every recorded event. Returns an unsubscribe function. */
  subscribe(listener: (event: TraceEvent) => void): () => void;
  getEvents(): TraceEvent[];
  reset(): void;
}

/**
 * Per-scheduler event log.
 *
 * Keeps the last `maxEvents` events. A throwing listener is logged and does
 * not affect other listeners or the scheduler.
 */
export function createTraceRecorder(options: TraceOptions & { maxEvents: number }): TraceRecorder {
  let enabled = options.enabled ?? false;
  const maxEvents = Math.max(1, Math.floor(options.maxEvents));
  const listeners = new Set<(event: TraceEvent) => void>();
  let events: TraceEvent[] = [];

  return {
    isEnabled() {
      return enabled;
    },

    setEnabled(next: boolean) {
      enabled = next;
    },

    emit(event: TraceEvent) {
      if (!enabled) return;

      events.push(event);
      if (events.length > maxEvents) {
        events = events.slice(events.length - maxEvents);
      }

      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          console.error('[ticklab] Trace listener threw:', error);
        }
      }
    },

    subscribe(listener: (event: TraceEvent) => void) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    getEvents() {
      return events.map((event) => ({ ...event }));
    },

    reset() {
      events = [];
    },
  };
}

/** One-line rendering used by the CLI. */
export function formatTraceEvent(event: TraceEvent): string {
  const parts = [`t=${event.at}`, event.type];
  if (event.kind) parts.push(event.kind);
  if (event.taskId !== undefined) parts.push(`#${event.taskId}`);
  if (event.label) parts.push(JSON.stringify(event.label));
  if (event.detail) {
    for (const [key, value] of Object.entries(event.detail)) {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(' ');
}
