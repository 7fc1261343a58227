import { SimPromise, type PromiseHost } from './promise.js';

/**
 * A pending `await`. The runner fills `result` before resuming the body.
 */
export interface AwaitRequest<T> {
  readonly source: T | SimPromise<T>;
  result?: { value: T };
}

/** Body of a modelled `async` function. Use `yield* waitFor(x)` where `await x` would go. */
export type AsyncBody<T> = () => Generator<AwaitRequest<unknown>, T, void>;

/**
 * Suspends the surrounding `spawn` body until `source` settles.
 *
 * ```ts
 * scheduler.spawn(function* () {
 *   log('before');
 *   const n = yield* waitFor(scheduler.resolve(1));
 *   log(`after ${n}`);
 * });
 * ```
 */
export function* waitFor<T>(source: T | SimPromise<T>): Generator<AwaitRequest<unknown>, T, void> {
  const request: AwaitRequest<T> = { source };
  yield request;
  if (!request.result) {
    throw new Error('[ticklab] waitFor() resumed before its value settled.');
  }
  return request.result.value;
}

/**
 * Runs a generator the way an engine runs an `async` function.
 *
 * The body executes synchronously up to its first `waitFor`. Each
 * continuation is submitted as a microtask once the awaited value settles,
 * so awaiting an already-settled value still yields to the microtask queue.
 */
export function spawn<T>(host: PromiseHost, body: AsyncBody<T>, label?: string): SimPromise<T> {
  return new SimPromise<T>(host, (resolve, reject) => {
    const iterator = body();

    const step = (resume: () => IteratorResult<AwaitRequest<unknown>, T>): void => {
      let next: IteratorResult<AwaitRequest<unknown>, T>;
      try {
        next = resume();
      } catch (reason) {
        reject(reason);
        return;
      }

      if (next.done) {
        resolve(next.value);
        return;
      }

      const request = next.value;
      const awaited: SimPromise<unknown> =
        request.source instanceof SimPromise
          ? request.source
          : new SimPromise<unknown>(host, (settle) => settle(request.source), label);

      awaited.then(
        (value) => {
          request.result = { value };
          step(() => iterator.next());
        },
        (reason) => {
          step(() => iterator.throw(reason));
        }
      );
    };

    step(() => iterator.next());
  }, label);
}
