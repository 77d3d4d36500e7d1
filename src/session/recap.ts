import { parseTimestamp } from "../core/dayLog.js";
import type { ActivityLog, DayLog } from "../core/dayLog.js";

export type RecapRow = {
  activity: string;
  totalMs: number;
  finishedSessions: number;
  ongoingSessions: 0 | 1;
  /** Kinds do not alternate start/stop; the duration is computed anyway. */
  irregular: boolean;
};

const elapsed = (from: string, to: Date | string): number => {
  const end = typeof to === "string" ? parseTimestamp(to) : to;
  return end.getTime() - parseTimestamp(from).getTime();
};

export function summarizeActivity(activity: string, actions: ActivityLog, now: Date): RecapRow {
  const finishedSessions = Math.floor(actions.length / 2);
  const ongoingSessions = actions.length % 2 === 1 ? 1 : 0;
  let totalMs = 0;
  let irregular = false;

  for (let session = 0; session < finishedSessions; session += 1) {
    const start = actions[session * 2];
    const stop = actions[session * 2 + 1];
    if (!start || !stop) continue;
    if (start.action !== "start" || stop.action !== "stop") irregular = true;
    totalMs += elapsed(start.time, stop.time);
  }

  if (ongoingSessions === 1) {
    const last = actions[actions.length - 1];
    if (last) {
      if (last.action !== "start") irregular = true;
      // now より後に始まったセッションはまだ経過時間を持たない
      totalMs += Math.max(0, elapsed(last.time, now));
    }
  }

  return { activity, totalMs, finishedSessions, ongoingSessions, irregular };
}

export function summarizeDayLog(dayLog: DayLog, now: Date): RecapRow[] {
  return Object.entries(dayLog.activities)
    .filter(([, actions]) => actions.length > 0)
    .map(([activity, actions]) => summarizeActivity(activity, actions, now));
}
