/**
 * Business Calendar
 * Derives the business day ("YYYY-MM-DD") from epoch seconds in a fixed time zone.
 *
 * Day boundaries follow the wall-clock date in that zone, not a rolling 24h window.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

/**
 * Settable clock for tests and replay
 */
export class FixedClock implements Clock {
  private current: number;

  constructor(start: Date | string) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(at: Date | string): void {
    this.current = new Date(at).getTime();
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export type DayKey = string;

export class BusinessCalendar {
  private readonly formatter: Intl.DateTimeFormat;

  constructor(
    private readonly clock: Clock,
    readonly timeZone: string
  ) {
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    });
  }

  nowSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }

  today(): DayKey {
    return this.dayOf(this.nowSeconds());
  }

  dayOf(epochSeconds: number): DayKey {
    const parts = this.formatter.formatToParts(new Date(epochSeconds * 1000));
    const pick = (type: Intl.DateTimeFormatPartTypes): string =>
      parts.find((part) => part.type === type)?.value ?? '';
    return `${pick('year')}-${pick('month')}-${pick('day')}`;
  }
}
