import { z } from "zod";

const LogLevel = z.preprocess(
  (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
  z.enum(["DEBUG", "INFO", "WARN", "ERROR"])
);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === "" ? fallback : Number(v)), z.number().positive());

const optionalString = () =>
  z.preprocess((v) => (v === "" ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  LOG_LEVEL: LogLevel.default("INFO"),
  ENVIRONMENT: z.string().default("unknown"),
  LAYER_VERSION: z.string().default("unknown"),

  // AppConfig profile holding the room rate table; all three or none
  APPCONFIG_APP: optionalString(),
  APPCONFIG_ENV: optionalString(),
  APPCONFIG_CONFIG: optionalString(),

  FETCH_TIMEOUT_MS: toNumber(10_000),
  DEFAULT_FETCH_URL: z.string().url().default("https://httpbin.org/json"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LogLevelName = AppConfig["LOG_LEVEL"];

export interface AppConfigIds {
  application: string;
  environment: string;
  profile: string;
}

/**
 * Reads the handler configuration from the environment.
 * Throws a single error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(["Invalid environment configuration:", issues].join("\n"));
  }
  return Object.freeze(parsed.data);
}

export function appConfigIds(config: AppConfig): AppConfigIds | undefined {
  const { APPCONFIG_APP, APPCONFIG_ENV, APPCONFIG_CONFIG } = config;
  if (!APPCONFIG_APP || !APPCONFIG_ENV || !APPCONFIG_CONFIG) {
    return undefined;
  }
  return {
    application: APPCONFIG_APP,
    environment: APPCONFIG_ENV,
    profile: APPCONFIG_CONFIG,
  };
}
