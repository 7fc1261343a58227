/**
 * Virtual time source.
 *
 * The scheduler never samples a real clock: time only moves when the caller
 * advances it, which keeps timer ordering exactly reproducible.
 */
export interface VirtualClock {
  /** Current virtual time in milliseconds. */
  now(): number;
  /** Move time forward and return the new value. */
  advance(ms: number): number;
}

const warnedInvalidAdvance = new Set<string>();

function warnInvalidAdvance(value: number): void {
  const key = String(value);
  if (warnedInvalidAdvance.has(key)) return;
  warnedInvalidAdvance.add(key);
  console.warn(`[ticklab] Cannot advance virtual time by ${key}ms. Treating it as 0.`);
}

/**
 * Normalizes a caller-provided duration.
 * Negative, NaN and infinite values count as 0 so time never runs backwards.
 */
export function normalizeDuration(ms: number | undefined): number {
  if (ms === undefined) return 0;
  if (!Number.isFinite(ms) || ms < 0) {
    warnInvalidAdvance(ms);
    return 0;
  }
  return ms;
}

export function createVirtualClock(start = 0): VirtualClock {
  if (!Number.isFinite(start)) {
    throw new RangeError('createVirtualClock: start must be a finite number.');
  }

  let current = start;

  return {
    now() {
      return current;
    },
    advance(ms: number) {
      current += normalizeDuration(ms);
      return current;
    },
  };
}
