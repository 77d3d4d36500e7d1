import { toDateKey } from "../core/dayLog.js";
import { DayLogStorageError, DayLogStore } from "../io/dayLogStore.js";
import { ConfigError, loadConfig } from "../runtime/config.js";
import type { AppConfig } from "../runtime/config.js";
import { createLogger } from "../runtime/logger.js";
import type { Logger } from "../runtime/logger.js";
import { createConfirm } from "../runtime/prompt.js";
import { SessionEngine } from "../session/engine.js";
import type { ConfirmFn } from "../session/engine.js";
import { assertKnownActivity, HELP_TEXT, parseArgs, UsageError } from "./args.js";
import type { CliCommand } from "./args.js";
import { recapNow, resolveMoment } from "./moment.js";
import { renderActivityLog, renderRecapTable } from "./render.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type RunDeps = {
  now?: () => Date;
  loadConfig?: () => AppConfig;
  confirm?: ConfirmFn;
  logger?: Logger;
  print?: (text: string) => void;
};

export async function runCli(argv: string[], deps: RunDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  let debug = false;
  let logger: Logger = deps.logger ?? createLogger("sessionlog");

  try {
    const options = parseArgs(argv);
    debug = options.debug;
    if (!deps.logger) {
      logger = createLogger("sessionlog", { level: debug ? "debug" : "info" });
    }
    if (options.command.name === "help") {
      print(HELP_TEXT);
      return EXIT_OK;
    }

    const config = (deps.loadConfig ?? loadConfig)();
    logger("debug", "Loaded config.", { dataDir: config.dataDir });
    const store = new DayLogStore({ dataDir: config.dataDir, logger });
    const engine = new SessionEngine({
      store,
      confirm: deps.confirm ?? createConfirm({ assumeYes: options.assumeYes }),
      logger,
    });
    const now = (deps.now ?? (() => new Date()))();

    await dispatch(options.command, { config, store, engine, now, print, logger });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      logger("error", error.message);
      print(HELP_TEXT);
      return EXIT_USAGE;
    }
    if (error instanceof DayLogStorageError || error instanceof ConfigError) {
      logger("error", error.message, debug ? { cause: error.cause } : undefined);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

type DispatchContext = {
  config: AppConfig;
  store: DayLogStore;
  engine: SessionEngine;
  now: Date;
  print: (text: string) => void;
  logger: Logger;
};

async function dispatch(command: CliCommand, ctx: DispatchContext): Promise<void> {
  const { config, store, engine, now, print, logger } = ctx;
  switch (command.name) {
    case "start":
    case "stop": {
      assertKnownActivity(command.activity, config.activities);
      const moment = resolveMoment(command, now);
      if (command.name === "start") {
        await engine.start(command.activity, moment);
      } else {
        await engine.stop(command.activity, moment);
      }
      return;
    }
    case "show": {
      assertKnownActivity(command.activity, config.activities);
      const date = toDateKey(resolveMoment({ date: command.date }, now));
      const log = await engine.show(command.activity, date);
      if (log) print(renderActivityLog(log));
      return;
    }
    case "recap": {
      const date = toDateKey(resolveMoment({ date: command.date }, now));
      const rows = await engine.recap(date, recapNow(date, now));
      print(renderRecapTable(rows));
      return;
    }
    case "migrate": {
      const reports = await store.migrateAll();
      const rewritten = reports.filter((report) => report.rewritten).length;
      logger("info", "Migration complete.", { files: reports.length, rewritten });
      return;
    }
    case "help":
      print(HELP_TEXT);
      return;
  }
}
