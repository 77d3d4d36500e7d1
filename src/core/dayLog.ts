import { format, parseISO } from "date-fns";

export type ActionKind = "start" | "stop";

export type Action = {
  action: ActionKind;
  time: string;
};

export type ActivityLog = Action[];

export type DayLog = {
  date: string;
  activities: Record<string, ActivityLog>;
};

export type SessionState = "absent" | "stopped" | "running";

const DATE_KEY_FORMAT = "yyyy-MM-dd";
const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

export const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toDateKey(value: Date): string {
  return format(value, DATE_KEY_FORMAT);
}

// オフセットなしのローカル時刻で保存する
export function toTimestamp(value: Date): string {
  return format(value, TIMESTAMP_FORMAT);
}

export function parseTimestamp(value: string): Date {
  return parseISO(value);
}

export function createDayLog(date: string): DayLog {
  return { date, activities: {} };
}

export function createAction(kind: ActionKind, time: Date): Action {
  return { action: kind, time: toTimestamp(time) };
}

export function isSameAction(a: Action, b: Action): boolean {
  return a.action === b.action && a.time === b.time;
}

export function activityLogOf(dayLog: DayLog, activity: string): ActivityLog | undefined {
  return Object.prototype.hasOwnProperty.call(dayLog.activities, activity)
    ? dayLog.activities[activity]
    : undefined;
}

export function lastAction(log: ActivityLog | undefined): Action | null {
  if (!log || log.length === 0) return null;
  return log[log.length - 1] ?? null;
}

export function sessionStateOf(log: ActivityLog | undefined): SessionState {
  const last = lastAction(log);
  if (!last) return "absent";
  return last.action === "start" ? "running" : "stopped";
}
