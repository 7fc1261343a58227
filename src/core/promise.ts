import type { ScheduleOptions, TaskAction } from './task.js';

/**
 * What a SimPromise needs from its scheduler: a microtask queue and the
 * unhandled-rejection bookkeeping.
 */
export interface PromiseHost {
  queueMicrotask(action: TaskAction, options?: ScheduleOptions): void;
  trackRejection(promise: SimPromise<unknown>): void;
  untrackRejection(promise: SimPromise<unknown>): void;
}

export type PromiseState = 'pending' | 'fulfilled' | 'rejected';

export type Resolve<T> = (value: T | PromiseLike<T>) => void;
export type Reject = (reason: unknown) => void;
export type Executor<T> = (resolve: Resolve<T>, reject: Reject) => void;

interface Reaction {
  onFulfilled: (value: unknown) => void;
  onRejected: (reason: unknown) => void;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

/** Reads `then` exactly once; a throwing getter throws here. */
function readThen(value: object): unknown {
  return Reflect.get(value, 'then');
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  if (!isObjectLike(value)) return false;
  try {
    return typeof readThen(value) === 'function';
  } catch {
    return false;
  }
}

/**
 * Promise whose reactions run on a virtual scheduler's microtask queue.
 *
 * Follows the ordering rules of native promises:
 * - `then` callbacks never run synchronously, even on a settled promise.
 * - Resolving with a thenable adopts its state through one extra microtask
 *   (the "resolve thenable job"), then a second for the adopted reaction.
 * - A rejection nobody handles by the end of the current drain is reported
 *   as an unhandled rejection.
 */
export class SimPromise<T> {
  readonly label: string | undefined;
  private readonly host: PromiseHost;
  private state: PromiseState = 'pending';
  private value: unknown = undefined;
  private reactions: Reaction[] = [];
  private handled = false;

  constructor(host: PromiseHost, executor?: Executor<T>, label?: string) {
    this.host = host;
    this.label = label;

    if (!executor) return;

    const { resolve, reject } = this.createResolvingFunctions();
    try {
      executor(resolve, reject);
    } catch (reason) {
      reject(reason);
    }
  }

  getState(): PromiseState {
    return this.state;
  }

  /** True once a fulfillment or rejection handler was attached. */
  isHandled(): boolean {
    return this.handled;
  }

  then<TResult1 = T, TResult2 = never>(
    onFulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): SimPromise<TResult1 | TResult2> {
    const derived = new SimPromise<TResult1 | TResult2>(this.host, undefined, this.label);
    const { resolve, reject } = derived.createResolvingFunctions();

    const reaction: Reaction = {
      onFulfilled: (value) => {
        if (typeof onFulfilled !== 'function') {
          resolve(value);
          return;
        }
        try {
          // Only ever called with the value this promise fulfilled with.
          resolve(onFulfilled(value as T));
        } catch (reason) {
          reject(reason);
        }
      },
      onRejected: (reason) => {
        if (typeof onRejected !== 'function') {
          reject(reason);
          return;
        }
        try {
          resolve(onRejected(reason));
        } catch (nextReason) {
          reject(nextReason);
        }
      },
    };

    if (!this.handled && this.state === 'rejected') {
      this.host.untrackRejection(this);
    }
    this.handled = true;

    if (this.state === 'pending') {
      this.reactions.push(reaction);
    } else {
      this.enqueueReaction(reaction);
    }

    return derived;
  }

  catch<TResult = never>(
    onRejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null
  ): SimPromise<T | TResult> {
    return this.then(undefined, onRejected);
  }

  /**
   * Runs `onFinally` on either outcome and passes the original outcome
   * through, unless `onFinally` throws.
   */
  finally(onFinally?: (() => void) | null): SimPromise<T> {
    if (typeof onFinally !== 'function') return this.then();

    return this.then(
      (value) => {
        onFinally();
        return value;
      },
      (reason) => {
        onFinally();
        throw reason;
      }
    );
  }

  private createResolvingFunctions(): { resolve: (resolution: unknown) => void; reject: Reject } {
    let alreadyResolved = false;

    const reject: Reject = (reason) => {
      if (alreadyResolved) return;
      alreadyResolved = true;
      this.settle('rejected', reason);
    };

    const resolve = (resolution: unknown): void => {
      if (alreadyResolved) return;
      alreadyResolved = true;

      if (resolution === this) {
        this.settle('rejected', new TypeError('Chaining cycle detected for promise.'));
        return;
      }

      if (!isObjectLike(resolution)) {
        this.settle('fulfilled', resolution);
        return;
      }

      let then: unknown;
      try {
        then = readThen(resolution);
      } catch (reason) {
        this.settle('rejected', reason);
        return;
      }

      if (typeof then !== 'function') {
        this.settle('fulfilled', resolution);
        return;
      }

      const adopt = then;
      const thenable: object = resolution;
      this.host.queueMicrotask(() => {
        let called = false;
        try {
          Reflect.apply(adopt, thenable, [
            (value: unknown) => {
              if (called) return;
              called = true;
              this.settle('fulfilled', value);
            },
            (reason: unknown) => {
              if (called) return;
              called = true;
              this.settle('rejected', reason);
            },
          ]);
        } catch (reason) {
          if (called) return;
          called = true;
          this.settle('rejected', reason);
        }
      }, { label: this.label });
    };

    return { resolve, reject };
  }

  private settle(state: 'fulfilled' | 'rejected', value: unknown): void {
    if (this.state !== 'pending') return;

    this.state = state;
    this.value = value;

    const reactions = this.reactions.splice(0);
    for (const reaction of reactions) {
      this.enqueueReaction(reaction);
    }

    if (state === 'rejected' && !this.handled) {
      this.host.trackRejection(this);
    }
  }

  private enqueueReaction(reaction: Reaction): void {
    const value = this.value;
    if (this.state === 'fulfilled') {
      this.host.queueMicrotask(() => reaction.onFulfilled(value), { label: this.label });
    } else {
      this.host.queueMicrotask(() => reaction.onRejected(value), { label: this.label });
    }
  }

  /** Settled value or rejection reason; `undefined` while pending. */
  peekValue(): unknown {
    return this.value;
  }
}
