import type { Timestamp } from "@chamapool/shared";

export const ONE_HOUR = 60 * 60;
export const ONE_DAY = 24 * ONE_HOUR;
export const ONE_WEEK = 7 * ONE_DAY;
export const ONE_YEAR = 365 * ONE_DAY;

export interface Clock {
  now(): Timestamp;
}

export function unixNow(): Timestamp {
  return Math.floor(Date.now() / 1000);
}

export const systemClock: Clock = { now: unixNow };

export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp = unixNow()) {
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  set(timestamp: Timestamp): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function toIso(timestamp: Timestamp): string {
  return new Date(timestamp * 1000).toISOString();
}

export function periodIndex(startDate: Timestamp, periodDuration: number, now: Timestamp): number {
  if (now < startDate) {
    return 0;
  }
  return Math.floor((now - startDate) / periodDuration);
}

export function periodStart(startDate: Timestamp, periodDuration: number, period: number): Timestamp {
  return startDate + period * periodDuration;
}

export function contributionDeadline(
  startDate: Timestamp,
  periodDuration: number,
  period: number,
  contributionWindow: number,
  gracePeriod: number
): Timestamp {
  return periodStart(startDate, periodDuration, period) + contributionWindow + gracePeriod;
}
