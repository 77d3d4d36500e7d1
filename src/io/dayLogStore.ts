import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ZodError } from "zod";
import { createDayLog, DATE_KEY_PATTERN } from "../core/dayLog.js";
import type { DayLog } from "../core/dayLog.js";
import { CURRENT_SCHEMA_VERSION, migrateDayLog } from "../core/migrateDayLog.js";
import type { SchemaVersion } from "../core/migrateDayLog.js";
import { parseDayLog } from "../core/validateDayLog.js";
import type { Logger } from "../runtime/logger.js";

type DayLogStoreOptions = {
  dataDir: string;
  logger?: Logger;
};

export type MigrationReport = {
  date: string;
  fromVersion: SchemaVersion;
  rewritten: boolean;
};

export class DayLogStorageError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DayLogStorageError";
    this.path = path;
  }
}

const noopLogger: Logger = () => {};

function isNotFoundError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export class DayLogStore {
  private readonly logger: Logger;

  constructor(private readonly options: DayLogStoreOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  pathFor(date: string): string {
    if (!DATE_KEY_PATTERN.test(date)) {
      throw new DayLogStorageError(`invalid date key: ${date}`, this.options.dataDir);
    }
    return join(this.options.dataDir, `${date}.json`);
  }

  async load(date: string): Promise<DayLog> {
    const { dayLog } = await this.read(date);
    return dayLog;
  }

  async save(dayLog: DayLog): Promise<void> {
    const file = this.pathFor(dayLog.date);
    this.logger("debug", "Writing file.", { path: file });
    const content = `${JSON.stringify(dayLog, null, 2)}\n`;
    try {
      await mkdir(dirname(file), { recursive: true });
      await this.writeWithRetry(file, content);
    } catch (err) {
      throw new DayLogStorageError(`failed to write day log: ${file}`, file, { cause: err });
    }
    this.logger("debug", "Wrote to file.", { path: file });
  }

  async listDates(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.options.dataDir);
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw new DayLogStorageError(
        `failed to list data directory: ${this.options.dataDir}`,
        this.options.dataDir,
        { cause: err }
      );
    }
    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .filter((date) => DATE_KEY_PATTERN.test(date))
      .sort();
  }

  async migrateAll(): Promise<MigrationReport[]> {
    const reports: MigrationReport[] = [];
    for (const date of await this.listDates()) {
      const { dayLog, fromVersion, migrated } = await this.read(date);
      if (migrated) {
        await this.save(dayLog);
        this.logger("info", "Migrated day log.", { date, fromVersion });
      }
      reports.push({ date, fromVersion, rewritten: migrated });
    }
    return reports;
  }

  private async read(
    date: string
  ): Promise<{ dayLog: DayLog; fromVersion: SchemaVersion; migrated: boolean }> {
    const file = this.pathFor(date);
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (err) {
      if (isNotFoundError(err)) {
        this.logger("debug", "No day log yet, starting a new one.", { path: file });
        return { dayLog: createDayLog(date), fromVersion: CURRENT_SCHEMA_VERSION, migrated: false };
      }
      throw new DayLogStorageError(`failed to read day log: ${file}`, file, { cause: err });
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      const { value, fromVersion, migrated } = migrateDayLog(parsed, date);
      const dayLog = parseDayLog(value);
      if (dayLog.date !== date) {
        throw new Error(`date field ${dayLog.date} does not match file name ${date}`);
      }
      if (migrated) {
        this.logger("debug", "Read legacy day log layout.", { path: file, fromVersion });
      }
      return { dayLog, fromVersion, migrated };
    } catch (err) {
      const detail =
        err instanceof ZodError
          ? err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
          : err instanceof Error
            ? err.message
            : String(err);
      throw new DayLogStorageError(`corrupt day log ${file}: ${detail}`, file, { cause: err });
    }
  }

  private async writeWithRetry(file: string, content: string, attempts = 2): Promise<void> {
    let lastError: unknown;
    for (let i = 0; i < attempts; i += 1) {
      try {
        await writeFile(file, content, "utf8");
        return;
      } catch (err) {
        lastError = err;
        if (i === attempts - 1) break;
        // ディレクトリが消えていた場合に備えて再作成
        if (isNotFoundError(err)) {
          await mkdir(dirname(file), { recursive: true });
        }
      }
    }
    throw lastError;
  }
}
