export type MomentFlags = {
  time?: string;
  date?: string;
};

export type CliCommand =
  | ({ name: "start" | "stop"; activity: string } & MomentFlags)
  | { name: "show"; activity: string; date?: string }
  | { name: "recap"; date?: string }
  | { name: "migrate" }
  | { name: "help" };

export type CliOptions = {
  command: CliCommand;
  debug: boolean;
  assumeYes: boolean;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type CommandName = Exclude<CliCommand["name"], "help">;

const COMMANDS: Record<CommandName, { activity: boolean; time: boolean; date: boolean }> = {
  start: { activity: true, time: true, date: true },
  stop: { activity: true, time: true, date: true },
  show: { activity: true, time: false, date: true },
  recap: { activity: false, time: false, date: true },
  migrate: { activity: false, time: false, date: false },
};

const isCommandName = (value: string): value is CommandName =>
  Object.prototype.hasOwnProperty.call(COMMANDS, value);

export function parseArgs(argv: string[]): CliOptions {
  let debug = false;
  let assumeYes = false;
  let help = false;
  let time: string | undefined;
  let date: string | undefined;
  const positionals: string[] = [];

  const takeValue = (flag: string, index: number): string => {
    const next = argv[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new UsageError(`${flag} requires a value.`);
    }
    return next;
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (arg === "--") {
      continue;
    }
    if (arg === "--debug") {
      debug = true;
      continue;
    }
    if (arg === "--yes" || arg === "-y") {
      assumeYes = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (arg === "--time" || arg === "--date") {
      const value = takeValue(arg, index);
      if (arg === "--time") time = value;
      else date = value;
      index += 1;
      continue;
    }
    if (arg.startsWith("--time=")) {
      time = arg.slice("--time=".length);
      continue;
    }
    if (arg.startsWith("--date=")) {
      date = arg.slice("--date=".length);
      continue;
    }
    if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }

  if (help) {
    return { command: { name: "help" }, debug, assumeYes };
  }

  const [name, ...rest] = positionals;
  if (!name) {
    throw new UsageError("A command is required.");
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unknown command: ${name}`);
  }

  const accepts = COMMANDS[name];
  if (time !== undefined && !accepts.time) {
    throw new UsageError(`${name} does not accept --time.`);
  }
  if (date !== undefined && !accepts.date) {
    throw new UsageError(`${name} does not accept --date.`);
  }

  const expected = accepts.activity ? 1 : 0;
  if (rest.length < expected) {
    throw new UsageError(`${name} requires an activity.`);
  }
  if (rest.length > expected) {
    throw new UsageError(`Unexpected argument: ${rest[expected]}`);
  }
  const activity = rest[0] ?? "";

  switch (name) {
    case "start":
    case "stop":
      return { command: { name, activity, time, date }, debug, assumeYes };
    case "show":
      return { command: { name, activity, date }, debug, assumeYes };
    case "recap":
      return { command: { name, date }, debug, assumeYes };
    case "migrate":
      return { command: { name }, debug, assumeYes };
  }
}

export function assertKnownActivity(activity: string, allowed: readonly string[]): void {
  if (!allowed.includes(activity)) {
    throw new UsageError(
      `Unknown activity: ${activity} (choose from ${allowed.join(", ")})`
    );
  }
}

export const HELP_TEXT = `sessionlog - time named activities with a per-day start/stop log

Usage:
  sessionlog start <activity> [--time h:mmam|pm] [--date MM-DD-YY] [--yes]
  sessionlog stop <activity> [--time h:mmam|pm] [--date MM-DD-YY] [--yes]
  sessionlog show <activity> [--date MM-DD-YY]
  sessionlog recap [--date MM-DD-YY]
  sessionlog migrate

Options:
  --time <h:mmam|pm>   Time of the action (default: now).
  --date <MM-DD-YY>    Day of the action (default: today).
  --yes, -y            Do not ask for confirmation.
  --debug              Print debug logs.
  -h, --help           Show this help.

Environment:
  SESSIONLOG_CONFIG    Config file (default: ./sessionlog.config.json).
  SESSIONLOG_DATA_DIR  Directory of day logs (default: ./data).
`;
