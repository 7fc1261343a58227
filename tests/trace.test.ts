import { test } from "node:test";
import assert from "node:assert/strict";

import { createScheduler } from "../src/core/scheduler.js";
import { formatTraceEvent, type TraceEvent } from "../src/core/trace.js";

test("tracing is off by default", () => {
  const scheduler = createScheduler({ onError: () => {} });

  scheduler.queueMicrotask(() => {});
  scheduler.runOneTick();

  assert.deepEqual(scheduler.trace.getEvents(), []);
});

test("trace records the call stack, queues and ticks in order", () => {
  const scheduler = createScheduler({ trace: true, onError: () => {} });

  scheduler.runSynchronous(() => {
    scheduler.queueMicrotask(() => {}, { label: "job" });
  }, { label: "main" });
  scheduler.runOneTick();

  const events = scheduler.trace.getEvents();
  assert.deepEqual(
    events.map((event) => event.type),
    ["stack.push", "task.enqueue", "stack.pop", "tick.start", "task.run", "tick.end"]
  );
  assert.deepEqual(events[1], { type: "task.enqueue", at: 0, taskId: 1, kind: "microtask", label: "job", detail: undefined });
  assert.deepEqual(events[0].detail, { depth: 1 });
  assert.equal(events[0].label, "main");
  assert.deepEqual(events[5].detail, { tick: 1, ran: 1 });
});

test("advancing time emits time.advance before the tick starts", () => {
  const scheduler = createScheduler({ trace: true, onError: () => {} });

  scheduler.runOneTick(25);

  const [advance, start] = scheduler.trace.getEvents();
  assert.deepEqual(advance, { type: "time.advance", at: 25, detail: { from: 0, by: 25 } });
  assert.equal(start.type, "tick.start");
});

test("trace keeps only the most recent events", () => {
  const scheduler = createScheduler({ trace: { enabled: true, maxEvents: 3 }, onError: () => {} });

  for (let i = 0; i < 5; i++) scheduler.queueMicrotask(() => {});

  assert.deepEqual(
    scheduler.trace.getEvents().map((event) => event.taskId),
    [3, 4, 5]
  );
});

test("trace listeners can unsubscribe and a throwing listener is isolated", (t) => {
  const consoleError = t.mock.method(console, "error", () => {});
  const scheduler = createScheduler({ trace: true, onError: () => {} });
  const seen: TraceEvent[] = [];

  scheduler.trace.subscribe(() => {
    throw new Error("listener failed");
  });
  const unsubscribe = scheduler.trace.subscribe((event) => seen.push(event));

  scheduler.queueMicrotask(() => {});
  unsubscribe();
  scheduler.queueMicrotask(() => {});

  assert.equal(seen.length, 1);
  assert.equal(seen[0].taskId, 1);
  assert.equal(consoleError.mock.calls.length, 2);
  assert.equal(consoleError.mock.calls[0].arguments[0], "[ticklab] Trace listener threw:");
});

test("errors and cancellations are traced", () => {
  const scheduler = createScheduler({ trace: true, onError: () => {} });

  const handle = scheduler.setTimer(() => {}, 10, { label: "dropped" });
  scheduler.cancelTimer(handle);
  scheduler.queueMicrotask(() => {
    throw new Error("broken");
  });
  scheduler.drainMicrotasks();

  const events = scheduler.trace.getEvents();
  const cancel = events.find((event) => event.type === "task.cancel");
  const error = events.find((event) => event.type === "task.error");

  assert.deepEqual(cancel, { type: "task.cancel", at: 0, taskId: 1, kind: "timer", label: "dropped" });
  assert.equal(error?.taskId, 2);
  assert.deepEqual(error?.detail, { message: "broken" });
});

test("getSnapshot lists queued work in run order", () => {
  const scheduler = createScheduler({ onError: () => {} });

  scheduler.setTimer(() => {}, 50, { label: "late" });
  scheduler.setTimer(() => {}, 10);
  scheduler.queueMicrotask(() => {});
  scheduler.requestAnimationFrame(() => {});
  scheduler.reject(new Error("pending"));

  const snapshot = scheduler.getSnapshot();
  assert.equal(snapshot.now, 0);
  assert.equal(snapshot.stackDepth, 0);
  assert.equal(snapshot.ticks, 0);
  assert.deepEqual(snapshot.timers.map((timer) => [timer.id, timer.dueTime, timer.label]), [
    [2, 10, undefined],
    [1, 50, "late"],
  ]);
  assert.deepEqual(snapshot.microtasks, [{ id: 3, kind: "microtask", sequence: 3, label: undefined }]);
  assert.equal(snapshot.animationFrames[0].kind, "animationFrame");
  assert.equal(snapshot.pendingRejections, 1);
});

test("formatTraceEvent renders one line per event", () => {
  assert.equal(
    formatTraceEvent({ type: "task.run", at: 5, taskId: 2, kind: "timer", label: "t" }),
    't=5 task.run timer #2 "t"'
  );
  assert.equal(
    formatTraceEvent({ type: "tick.end", at: 0, detail: { tick: 1, ran: 3 } }),
    "t=0 tick.end tick=1 ran=3"
  );
});
