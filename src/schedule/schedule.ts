/**
 * Schedules: predicates deciding whether a flow is due.
 *
 * A schedule only ever sees times rounded down to the minute, so a
 * manager invoked once a minute (e.g. by cron) gets exactly one "due"
 * answer per matching minute. Times are evaluated in local time.
 *
 * Schedules compose without side effects:
 *
 *   const weekdays = new Daily(9).difference(new Weekly("saturday", 9));
 *   const twice = new Daily(9).union(new Daily(17));
 */

import { ConfigError } from "../errors.js";

export type TimeCheck = (time: Date) => boolean;

export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * Round a time down to the start of its minute.
 */
export function roundToMinute(time: Date): Date {
  const rounded = new Date(time.getTime());
  rounded.setSeconds(0, 0);
  return rounded;
}

export class Schedule {
  private readonly checkTime: TimeCheck;

  constructor(checkTime: TimeCheck) {
    this.checkTime = checkTime;
  }

  /**
   * Whether the schedule matches the given instant (rounded to the minute).
   */
  check(time: Date): boolean {
    return this.checkTime(roundToMinute(time));
  }

  /**
   * Whether an associated flow should run now.
   */
  shouldRun(now: Date = new Date()): boolean {
    return this.check(now);
  }

  /** Runs whenever either schedule would */
  union(other: Schedule): Schedule {
    return new Schedule((time) => this.check(time) || other.check(time));
  }

  /** Runs whenever this schedule would and the other would not */
  difference(other: Schedule): Schedule {
    return new Schedule((time) => this.check(time) && !other.check(time));
  }
}

export class Always extends Schedule {
  constructor() {
    super(() => true);
  }
}

function isTopOfHour(time: Date): boolean {
  return time.getMinutes() === 0;
}

function assertHour(hour: number): void {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new ConfigError(`Invalid hour: ${hour}. Must be an integer from 0 to 23.`);
  }
}

/**
 * Parse a weekday name (case-insensitive) into its index, Monday = 0.
 */
export function parseWeekday(day: string): number {
  const index = WEEKDAYS.findIndex((name) => name === day.toLowerCase());
  if (index === -1) {
    throw new ConfigError(`Invalid day of the week: ${day}`);
  }
  return index;
}

/** Monday-based weekday index of a date */
function weekdayOf(time: Date): number {
  return (time.getDay() + 6) % 7;
}

export class Hourly extends Schedule {
  constructor() {
    super(isTopOfHour);
  }
}

export class Daily extends Schedule {
  readonly hour: number;

  constructor(hour: number) {
    assertHour(hour);
    super((time) => isTopOfHour(time) && time.getHours() === hour);
    this.hour = hour;
  }
}

export class Weekly extends Schedule {
  readonly day: Weekday;
  readonly hour: number;

  constructor(day: string, hour: number) {
    assertHour(hour);
    const dayIndex = parseWeekday(day);
    super(
      (time) =>
        isTopOfHour(time) && time.getHours() === hour && weekdayOf(time) === dayIndex
    );
    this.day = WEEKDAYS[dayIndex];
    this.hour = hour;
  }
}
