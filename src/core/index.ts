export * from "./scheduler.js";
export * from "./clock.js";
export * from "./errors.js";
export * from "./trace.js";

export { SimPromise, isPromiseLike, type PromiseHost, type PromiseState, type Executor, type Resolve, type Reject } from "./promise.js";
export { waitFor, type AsyncBody, type AwaitRequest } from "./coroutine.js";

export type { TaskKind, TaskAction, ScheduleOptions, QueuedTaskView } from "./task.js";
