/**
 * Day files written by earlier releases used two other layouts:
 *
 * - v0: `{ "date"?: "...", "<activity>": Action[], ... }`
 * - v1: `{ "date": "...", "activities": { "activities": { "<activity>": Action[] } } }`
 *
 * Both are reshaped to the current layout (v2) before validation, so nothing
 * downstream has to know they existed.
 */
export type SchemaVersion = 0 | 1 | 2;

export const CURRENT_SCHEMA_VERSION: SchemaVersion = 2;

export type MigrationResult = {
  value: { date: unknown; activities: unknown };
  fromVersion: SchemaVersion;
  migrated: boolean;
};

export class DayLogMigrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DayLogMigrationError";
  }
}

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function detectSchemaVersion(raw: unknown): SchemaVersion {
  if (!isPlainObject(raw)) {
    throw new DayLogMigrationError("day log must be a JSON object");
  }

  if ("activities" in raw) {
    const activities = raw.activities;
    if (!isPlainObject(activities)) {
      throw new DayLogMigrationError("activities must be a JSON object");
    }
    return isPlainObject(activities.activities) ? 1 : 2;
  }

  const entries = Object.entries(raw).filter(([key]) => key !== "date");
  if (entries.every(([, value]) => Array.isArray(value))) return 0;

  throw new DayLogMigrationError("unrecognized day log layout");
}

export function migrateDayLog(raw: unknown, date: string): MigrationResult {
  const fromVersion = detectSchemaVersion(raw);
  if (!isPlainObject(raw)) {
    throw new DayLogMigrationError("day log must be a JSON object");
  }

  switch (fromVersion) {
    case 0: {
      const activities: PlainObject = {};
      for (const [key, value] of Object.entries(raw)) {
        if (key === "date") continue;
        activities[key] = value;
      }
      return {
        value: { date: raw.date ?? date, activities },
        fromVersion,
        migrated: true,
      };
    }
    case 1: {
      const wrapper = isPlainObject(raw.activities) ? raw.activities : {};
      return {
        value: { date: raw.date ?? date, activities: wrapper.activities },
        fromVersion,
        migrated: true,
      };
    }
    default:
      return {
        value: { date: raw.date, activities: raw.activities },
        fromVersion,
        migrated: false,
      };
  }
}
