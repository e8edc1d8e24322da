import { epochDay, pad, weekdayIndex, zonedParts } from "./time-zone";

const EN_WEEKDAY = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];
const EN_WEEKDAY_FULL = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];
const EN_MONTH = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/**
 * Relative, human-friendly phrasing of a fixture time, e.g.
 * "Tomorrow at 20:45 (Tue 20.Oct)" or "In 2 weeks at 18:00 (Sun 01.Nov)".
 *
 * The day difference is taken between calendar dates in `timeZone`, not from
 * the raw duration: a fixture at 00:10 tomorrow is "Tomorrow".
 */
export function humanizeWhen(timestamp: Date, now: Date, timeZone: string): string {
  const target = zonedParts(timestamp, timeZone);
  const reference = zonedParts(now, timeZone);
  const days = epochDay(target) - epochDay(reference);
  const weekday = weekdayIndex(target);
  const hhmm = `${pad(target.hour)}:${pad(target.minute)}`;
  const label = `${EN_WEEKDAY[weekday]} ${pad(target.day)}.${EN_MONTH[target.month - 1]}`;
  const suffix = `(${label})`;

  if (days === -1) {
    return `Yesterday at ${hhmm} ${suffix}`;
  }
  if (days === 0) {
    return `Today at ${hhmm} ${suffix}`;
  }
  if (days === 1) {
    return `Tomorrow at ${hhmm} ${suffix}`;
  }
  if (days >= 2 && days <= 7) {
    return `Next ${EN_WEEKDAY_FULL[weekday]} at ${hhmm} ${suffix}`;
  }
  if (days >= 8 && days <= 13) {
    return `In ${days} days at ${hhmm} ${suffix}`;
  }
  if (days >= 14) {
    return `In ${Math.floor(days / 7)} weeks at ${hhmm} ${suffix}`;
  }
  // past events further back than yesterday
  return `On ${label} at ${hhmm}`;
}
