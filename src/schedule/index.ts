/**
 * Flow schedules.
 */

export {
  Schedule,
  Always,
  Hourly,
  Daily,
  Weekly,
  WEEKDAYS,
  parseWeekday,
  roundToMinute,
  type TimeCheck,
  type Weekday,
} from "./schedule.js";
