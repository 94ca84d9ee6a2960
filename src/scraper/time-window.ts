/**
 * Publication time window used to filter teasers
 */

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export class TimeWindow {
  constructor(
    readonly reference: Date,
    readonly durationMs: number
  ) {}

  static lastHours(hours: number, now: Date = new Date()): TimeWindow {
    return new TimeWindow(now, hours * HOUR_MS);
  }

  static lastDays(days: number, now: Date = new Date()): TimeWindow {
    return new TimeWindow(now, days * DAY_MS);
  }

  get cutoff(): Date {
    return new Date(this.reference.getTime() - this.durationMs);
  }

  /**
   * True when `publishedAt` is at or after the cutoff.
   *
   * There is no upper bound: a timestamp later than `reference` (clock skew,
   * a misparsed date) always counts as recent and never ages out.
   */
  contains(publishedAt: Date): boolean {
    return publishedAt.getTime() >= this.cutoff.getTime();
  }

  toJSON(): { from: string; to: string } {
    return { from: this.cutoff.toISOString(), to: this.reference.toISOString() };
  }
}
