import { endOfDay, isValid, parse, parseISO, set, startOfDay } from "date-fns";
import { UsageError } from "./args.js";
import type { MomentFlags } from "./args.js";

export const TIME_FORMAT = "h:mma";
export const DATE_FORMAT = "M-d-yy";

const parseStrict = (value: string, pattern: string, reference: Date, label: string): Date => {
  const parsed = parse(value.trim(), pattern, reference);
  if (!isValid(parsed)) {
    throw new UsageError(`Invalid ${label}: ${value}`);
  }
  return parsed;
};

/**
 * Turns the optional `--time`/`--date` flags into the moment of an action.
 * Whichever half is missing comes from `now`; seconds are always dropped.
 */
export function resolveMoment({ time, date }: MomentFlags, now: Date): Date {
  const today = startOfDay(now);

  if (!time && !date) {
    return set(now, { seconds: 0, milliseconds: 0 });
  }
  if (time && !date) {
    return parseStrict(time, TIME_FORMAT, today, "time (expected h:mmam or h:mmpm)");
  }
  if (date && !time) {
    const day = parseStrict(date, DATE_FORMAT, today, "date (expected MM-DD-YY)");
    return set(startOfDay(day), {
      hours: now.getHours(),
      minutes: now.getMinutes(),
      seconds: 0,
      milliseconds: 0,
    });
  }
  return parseStrict(
    `${date} ${time}`,
    `${DATE_FORMAT} ${TIME_FORMAT}`,
    today,
    "date/time (expected MM-DD-YY h:mmam|pm)"
  );
}

/** Past days are evaluated at their last second; today and later at `now`. */
export function recapNow(date: string, now: Date): Date {
  const end = endOfDay(parseISO(date));
  return now.getTime() > end.getTime() ? end : now;
}
