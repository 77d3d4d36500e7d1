import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { DATE_KEY_PATTERN } from "./dayLog.js";
import type { DayLog } from "./dayLog.js";

export const ActionSchema = z.object({
  action: z.enum(["start", "stop"]),
  time: z
    .string()
    .refine((value) => value.includes("T") && isValid(parseISO(value)), {
      message: "time must be an ISO-8601 timestamp",
    }),
});

export const ActivityLogSchema = z.array(ActionSchema);

export const DayLogSchema = z.object({
  date: z.string().regex(DATE_KEY_PATTERN, "date must be yyyy-MM-dd"),
  activities: z.record(ActivityLogSchema),
});

export function parseDayLog(input: unknown): DayLog {
  return DayLogSchema.parse(input);
}

export function isDayLog(input: unknown): input is DayLog {
  return DayLogSchema.safeParse(input).success;
}
