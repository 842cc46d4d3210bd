export interface RateLimiterOptions {
  windowSec: number;
  maxRequests: number;
  /** Millisecond clock; defaults to Date.now. */
  now?: () => number;
}

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

/**
 * Per-client sliding-window admission control.
 *
 * Each client id owns an ordered list of admission timestamps, oldest first.
 * Entries older than the window are pruned lazily on every check. Windows live
 * for the lifetime of the limiter.
 *
 * `admit` runs prune, check and append without yielding, so concurrent tool
 * invocations on the event loop observe it as a single atomic step.
 */
export class RateLimiter {
  readonly windowSec: number;
  readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();
  private admittedTotal = 0;

  constructor(options: RateLimiterOptions) {
    assertPositiveInteger(options.windowSec, 'windowSec');
    assertPositiveInteger(options.maxRequests, 'maxRequests');
    this.windowSec = options.windowSec;
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowSec * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a request for `clientId` if its window has room.
   *
   * @returns false when the client already has `maxRequests` admissions inside
   * the window; a rejected call is not recorded.
   */
  admit(clientId: string): boolean {
    const now = this.now();
    const timestamps = this.prune(clientId, now);

    if (timestamps.length >= this.maxRequests) {
      return false;
    }

    timestamps.push(now);
    this.windows.set(clientId, timestamps);
    this.admittedTotal += 1;
    return true;
  }

  /** Admissions inside the current window, for one client or all of them. */
  recentCount(clientId?: string): number {
    const now = this.now();
    if (clientId !== undefined) {
      return this.prune(clientId, now).length;
    }
    let count = 0;
    for (const id of this.windows.keys()) {
      count += this.prune(id, now).length;
    }
    return count;
  }

  /** Lifetime number of admitted requests across all clients. */
  get totalAdmitted(): number {
    return this.admittedTotal;
  }

  private prune(clientId: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    const timestamps = this.windows.get(clientId);
    if (!timestamps) return [];
    let firstLive = 0;
    while (firstLive < timestamps.length && timestamps[firstLive] <= cutoff) {
      firstLive += 1;
    }
    if (firstLive === 0) return timestamps;
    const live = timestamps.slice(firstLive);
    this.windows.set(clientId, live);
    return live;
  }
}
