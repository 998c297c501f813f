import { z } from "zod";
import type { LevelWithSilent } from "pino";
import { ConfigError } from "./errors";

const logLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  BEER_API_URL: z.string().url().default("https://api.punkapi.com/v2/beers"),
  BEER_PER_PAGE: z.coerce.number().int().positive().optional(),
  MIN_ABV: z.coerce.number().finite().default(15),
  MAX_PAGES: z.coerce.number().int().positive().optional(),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.enum(logLevels).default("info"),
});

export type Config = {
  port: number;
  beerApiUrl: string;
  perPage?: number;
  minAbv: number;
  maxPages?: number;
  fetchTimeoutMs: number;
  logLevel: (typeof logLevels)[number];
};

/**
 * Reads the service configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    beerApiUrl: values.BEER_API_URL,
    perPage: values.BEER_PER_PAGE,
    minAbv: values.MIN_ABV,
    maxPages: values.MAX_PAGES,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}
