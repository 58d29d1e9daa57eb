import { z } from "zod";
import { InvalidConfigurationError } from "../errors";
import { WindowConfig } from "./window-config";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  RATE_LIMIT_CAPACITY: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().positive().default(3600),
  GITHUB_TOKEN: optionalString,
  GITHUB_TOKEN_PASSWORD: optionalString,
  SETTINGS_FILE: z.string().min(1).default("settings.json"),
  EXTENSIONS_DIR: optionalString,
  CLI_BINARY: z.string().min(1).default("spicetify"),
  APP_VERSION: z.string().min(1).default("1.0.0"),
  APP_RELEASES_URL: optionalString.pipe(z.string().url().optional()),
});

export interface AppConfig {
  port: number;
  logLevel: string;
  // GitHub API 는 비인증 요청 기준 시간당 60회
  githubRateLimit: WindowConfig;
  githubToken?: string;
  githubTokenPassword?: string;
  settingsFile: string;
  extensionsDir?: string;
  cliBinary: string;
  appVersion: string;
  appReleasesUrl?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid environment: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    githubRateLimit: {
      capacity: vars.RATE_LIMIT_CAPACITY,
      windowSizeMs: vars.RATE_LIMIT_WINDOW_SECONDS * 1000,
    },
    githubToken: vars.GITHUB_TOKEN,
    githubTokenPassword: vars.GITHUB_TOKEN_PASSWORD,
    settingsFile: vars.SETTINGS_FILE,
    extensionsDir: vars.EXTENSIONS_DIR,
    cliBinary: vars.CLI_BINARY,
    appVersion: vars.APP_VERSION,
    appReleasesUrl: vars.APP_RELEASES_URL,
  };
}
