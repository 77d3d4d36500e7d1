import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const DEFAULT_DATA_DIR = path.resolve(process.cwd(), "data");
const DEFAULT_CONFIG_FILE = "sessionlog.config.json";

export type AppConfig = {
  activities: string[];
  dataDir: string;
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const ConfigFileSchema = z.object({
  activities: z
    .array(z.string().trim().min(1, "activity names must not be empty"))
    .min(1, "at least one activity is required")
    .refine((names) => new Set(names).size === names.length, {
      message: "activity names must be unique",
    }),
  dataDir: z.string().trim().min(1).optional(),
});

export function resolveConfigPath(): string {
  const env = process.env.SESSIONLOG_CONFIG;
  if (env && env.trim()) return path.resolve(env);
  return path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
}

export function resolveDataDir(configured?: string): string {
  const env = process.env.SESSIONLOG_DATA_DIR;
  if (env && env.trim()) return path.resolve(env);
  if (configured) return configured;
  return DEFAULT_DATA_DIR;
}

export function loadConfig(file: string = resolveConfigPath()): AppConfig {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`config file not found: ${file}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `failed to read config file ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid config file ${file}: ${detail}`, { cause: result.error });
  }

  const { activities, dataDir } = result.data;
  const configuredDataDir = dataDir ? path.resolve(path.dirname(file), dataDir) : undefined;
  return { activities, dataDir: resolveDataDir(configuredDataDir) };
}
