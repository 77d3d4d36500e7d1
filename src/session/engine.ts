import {
  activityLogOf,
  createAction,
  isSameAction,
  lastAction,
  sessionStateOf,
  toDateKey,
} from "../core/dayLog.js";
import type { Action, ActivityLog, DayLog } from "../core/dayLog.js";
import type { DayLogStore } from "../io/dayLogStore.js";
import { createLogger } from "../runtime/logger.js";
import type { Logger } from "../runtime/logger.js";
import { summarizeDayLog } from "./recap.js";
import type { RecapRow } from "./recap.js";

export type ConfirmFn = (description: string) => Promise<boolean> | boolean;

export type DayLogRepository = Pick<DayLogStore, "load" | "save">;

export type MutationStatus = "applied" | "refused" | "duplicate" | "invalid-transition";

export type MutationOutcome = {
  status: MutationStatus;
  activity: string;
  action: Action;
  dayLog: DayLog;
};

type SessionEngineDeps = {
  store: DayLogRepository;
  confirm: ConfirmFn;
  logger?: Logger;
};

export class SessionEngine {
  private readonly store: DayLogRepository;
  private readonly confirm: ConfirmFn;
  private readonly logger: Logger;

  constructor(deps: SessionEngineDeps) {
    this.store = deps.store;
    this.confirm = deps.confirm;
    this.logger = deps.logger ?? createLogger("session");
  }

  async start(activity: string, time: Date): Promise<MutationOutcome> {
    const dayLog = await this.store.load(toDateKey(time));
    const action = createAction("start", time);
    const log = activityLogOf(dayLog, activity);
    if (this.isDuplicate(log, activity, action)) {
      return { status: "duplicate", activity, action, dayLog };
    }
    if (sessionStateOf(log) === "running") {
      this.logger("warn", "Session in progress.", {
        activity,
        date: dayLog.date,
        session: lastAction(log) ?? undefined,
      });
      return { status: "invalid-transition", activity, action, dayLog };
    }
    return this.addAction(dayLog, activity, action);
  }

  async stop(activity: string, time: Date): Promise<MutationOutcome> {
    const dayLog = await this.store.load(toDateKey(time));
    const action = createAction("stop", time);
    const log = activityLogOf(dayLog, activity);
    if (this.isDuplicate(log, activity, action)) {
      return { status: "duplicate", activity, action, dayLog };
    }
    if (sessionStateOf(log) !== "running") {
      this.logger("warn", "No active session found for this activity.", {
        activity,
        date: dayLog.date,
      });
      return { status: "invalid-transition", activity, action, dayLog };
    }
    return this.addAction(dayLog, activity, action);
  }

  async show(activity: string, date: string): Promise<ActivityLog | null> {
    this.logger("debug", "Showing actions.", { activity, date });
    const dayLog = await this.store.load(date);
    const log = activityLogOf(dayLog, activity);
    if (!log || sessionStateOf(log) === "absent") {
      this.logger("warn", "No actions found for this activity.", { activity, date });
      return null;
    }
    return log.map((action) => ({ ...action }));
  }

  async recap(date: string, now: Date): Promise<RecapRow[]> {
    this.logger("info", "Recapping the day.", { date });
    const dayLog = await this.store.load(date);
    const rows = summarizeDayLog(dayLog, now);
    for (const row of rows) {
      if (row.irregular) {
        this.logger("warn", "Actions do not alternate start/stop; total time may be wrong.", {
          activity: row.activity,
          date,
        });
      }
    }
    this.logger("info", "Recap complete.", { date, activities: rows.length });
    return rows;
  }

  private isDuplicate(log: ActivityLog | undefined, activity: string, action: Action): boolean {
    const previous = lastAction(log);
    if (!previous || !isSameAction(previous, action)) return false;
    this.logger("warn", "This action is a duplicate of the last action. Skipping.", {
      activity,
      action: action.action,
      last_action: previous,
    });
    return true;
  }

  private async addAction(dayLog: DayLog, activity: string, action: Action): Promise<MutationOutcome> {
    const kind = action.action;
    this.logger("debug", "Adding action.", { activity, action: kind, time: action.time });
    this.logger("info", "This will add the following action.", {
      activity,
      action: kind,
      time: action.time,
    });
    const approved = await this.confirm(describeAction(activity, action));
    if (!approved) {
      this.logger("info", "Skipping action.", { activity, action: kind });
      return { status: "refused", activity, action, dayLog };
    }

    const log = activityLogOf(dayLog, activity) ?? [];
    log.push(action);
    dayLog.activities[activity] = log;
    await this.store.save(dayLog);
    this.logger("info", "Added action.", { activity, action: kind, time: action.time });
    return { status: "applied", activity, action, dayLog };
  }
}

export function describeAction(activity: string, action: Action): string {
  return `${action.action} ${activity} at ${action.time}`;
}
