/**
 * Source of "now" and "today" for quota accounting.
 *
 * Daily usage belongs to a calendar day; injecting the clock lets tests roll
 * the day over without touching the system time.
 */
export interface Clock {
  now(): Date;
  /** YYYY-MM-DD of `now()` in local time */
  today(): string;
}

export function dateKey(d: Date): string {
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, '0')}-${String(d.getDate()).padStart(2, '0')}`;
}

export const systemClock: Clock = {
  now: () => new Date(),
  today: () => dateKey(new Date()),
};

/** A clock that only moves when told to */
export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date | string = new Date()) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  today(): string {
    return dateKey(this.current);
  }

  set(to: Date | string): void {
    this.current = new Date(to);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
