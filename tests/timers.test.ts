import { test } from "node:test";
import assert from "node:assert/strict";

import { createScheduler, configureScheduler, getSchedulerConfig } from "../src/core/scheduler.js";
import { createVirtualClock } from "../src/core/clock.js";
import { SchedulerLimitError, type TaskErrorReport } from "../src/core/errors.js";

function setup() {
  const log: string[] = [];
  const reports: TaskErrorReport[] = [];
  const scheduler = createScheduler({ onError: (report) => reports.push(report) });
  return { log, reports, scheduler };
}

test("a cancelled timer never runs", () => {
  const { log, scheduler } = setup();

  const handle = scheduler.setTimer(() => log.push("cancelled"), 100);
  scheduler.runOneTick(50);
  scheduler.cancelTimer(handle);

  scheduler.runOneTick(1000);
  assert.equal(scheduler.runUntilQuiescent(), 0);
  assert.deepEqual(log, []);
});

test("cancelTimer is idempotent and ignores unknown or spent handles", () => {
  const { log, scheduler } = setup();

  const handle = scheduler.setTimer(() => log.push("ran"), 0);
  scheduler.runOneTick();
  assert.deepEqual(log, ["ran"]);

  scheduler.cancelTimer(handle);
  scheduler.cancelTimer(handle);
  scheduler.cancelTimer(999);

  const pending = scheduler.setTimer(() => log.push("never"), 5);
  scheduler.cancelTimer(pending);
  scheduler.cancelTimer(pending);

  assert.equal(scheduler.isQuiescent(), true);
});

test("cancelling a one-shot timer from its own callback has no effect", () => {
  const { log, scheduler } = setup();

  const handle = scheduler.setTimer(() => {
    scheduler.cancelTimer(handle);
    log.push("finished");
  }, 0);
  scheduler.runOneTick();

  assert.deepEqual(log, ["finished"]);
  assert.equal(scheduler.isQuiescent(), true);
});

test("negative and non-finite delays count as zero", () => {
  const { scheduler } = setup();

  scheduler.runOneTick(40);
  scheduler.setTimer(() => {}, -50);
  scheduler.setTimer(() => {}, Number.NaN);
  scheduler.setTimer(() => {});

  assert.deepEqual(
    scheduler.getSnapshot().timers.map((timer) => timer.dueTime),
    [40, 40, 40]
  );
});

test("setInterval re-arms until cancelled from its callback", () => {
  const { log, scheduler } = setup();
  let runs = 0;

  const handle = scheduler.setInterval(() => {
    log.push(`tick ${scheduler.now()}`);
    if (++runs === 3) scheduler.cancelTimer(handle);
  }, 10);

  assert.equal(scheduler.runUntilQuiescent(), 3);
  assert.deepEqual(log, ["tick 10", "tick 20", "tick 30"]);
  assert.equal(scheduler.now(), 30);
});

test("an interval takes a fresh sequence each time it re-arms", () => {
  const { log, scheduler } = setup();

  const handle = scheduler.setInterval(() => log.push("interval"), 10);
  scheduler.setTimer(() => log.push("timer"), 20);

  scheduler.runOneTick(10);
  scheduler.runOneTick(10);
  scheduler.runOneTick();
  scheduler.cancelTimer(handle);

  assert.deepEqual(log, ["interval", "timer", "interval"]);
});

test("runUntilQuiescent jumps virtual time to the next due timer", () => {
  const { log, scheduler } = setup();

  scheduler.setTimer(() => log.push("300"), 300);
  scheduler.setTimer(() => log.push("100"), 100);

  assert.equal(scheduler.runUntilQuiescent(), 2);
  assert.deepEqual(log, ["100", "300"]);
  assert.equal(scheduler.now(), 300);
});

test("runUntilQuiescent with a fixed step advances every tick", () => {
  const { log, scheduler } = setup();

  scheduler.setTimer(() => log.push(`ran at ${scheduler.now()}`), 120);

  assert.equal(scheduler.runUntilQuiescent({ advanceBy: 50 }), 3);
  assert.deepEqual(log, ["ran at 150"]);
});

test("runUntilQuiescent stops at maxTicks and reports it", () => {
  const { reports, scheduler } = setup();

  const handle = scheduler.setInterval(() => {}, 5);

  assert.equal(scheduler.runUntilQuiescent({ maxTicks: 4 }), 4);
  assert.equal(reports.length, 1);
  assert.equal(reports[0].kind, "scheduler");

  const error = reports[0].error;
  assert.ok(error instanceof SchedulerLimitError);
  assert.equal(error.limit, 4);

  scheduler.cancelTimer(handle);
  assert.equal(scheduler.isQuiescent(), true);
});

test("halt stops runUntilQuiescent after the current tick", () => {
  const { scheduler } = setup();
  let runs = 0;

  const handle = scheduler.setInterval(() => {
    if (++runs === 2) scheduler.halt();
  }, 10);

  assert.equal(scheduler.runUntilQuiescent(), 2);
  assert.equal(scheduler.isQuiescent(), false);
  scheduler.cancelTimer(handle);
});

test("runOneTick is ignored when called from inside an action", (t) => {
  t.mock.method(console, "warn", () => {});
  const { scheduler } = setup();
  let nested: boolean | null = null;

  scheduler.setTimer(() => {
    scheduler.setTimer(() => {}, 0);
    nested = scheduler.runOneTick();
  }, 0);
  scheduler.runOneTick();

  assert.equal(nested, false);
  assert.equal(scheduler.getSnapshot().timers.length, 1);
});

test("an injected clock sets the time base", () => {
  const scheduler = createScheduler({ clock: createVirtualClock(1000), onError: () => {} });

  scheduler.setTimer(() => {}, 10);

  assert.equal(scheduler.now(), 1000);
  assert.equal(scheduler.getSnapshot().timers[0].dueTime, 1010);
});

test("virtual clock ignores negative advances", (t) => {
  const consoleWarn = t.mock.method(console, "warn", () => {});
  const clock = createVirtualClock(5);

  assert.equal(clock.advance(10), 15);
  assert.equal(clock.advance(-3), 15);
  assert.equal(consoleWarn.mock.calls.length, 1);
  assert.throws(() => createVirtualClock(Number.POSITIVE_INFINITY), RangeError);
});

test("configureScheduler changes defaults for new schedulers", () => {
  const previous = getSchedulerConfig();
  assert.equal(previous.maxMicrotaskIterations, Infinity);
  assert.equal(previous.maxTicks, 10_000);

  configureScheduler({ maxTicks: 2 });
  try {
    const reports: TaskErrorReport[] = [];
    const scheduler = createScheduler({ onError: (report) => reports.push(report) });
    scheduler.setInterval(() => {}, 1);

    assert.equal(scheduler.runUntilQuiescent(), 2);
    assert.equal(reports.length, 1);
  } finally {
    configureScheduler(previous);
  }

  assert.equal(getSchedulerConfig().maxTicks, 10_000);
});
