import { z } from "zod";
import type { LogLevel } from "./log";

export const DEFAULT_CAPTCHA_MARKERS: readonly string[] = [
  "g-recaptcha",
  "recaptcha/api.js",
  "h-captcha",
  "verify you are human",
  "captcha_required",
  "enter the characters shown",
];

export interface AppConfig {
  appName: string;
  version: string;
  upstreamBaseUrl: string;
  upstreamTimeoutMs: number;
  upstreamMaxRetries: number;
  upstreamBackoffMs: number;
  upstreamConcurrency: number;
  statesTtlSeconds: number;
  commissionsTtlSeconds: number;
  defaultPageSize: number;
  maxPageSize: number;
  captchaMarkers: readonly string[];
  logLevel: LogLevel;
  host: string;
  port: number;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    UPSTREAM_BASE_URL: z.string().url().default("https://e-jagriti.gov.in"),
    UPSTREAM_TIMEOUT_SECONDS: positiveInt(30),
    UPSTREAM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
    UPSTREAM_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    UPSTREAM_CONCURRENCY: positiveInt(5),
    CACHE_TTL_STATES: positiveInt(86_400),
    CACHE_TTL_COMMISSIONS: positiveInt(86_400),
    DEFAULT_PAGE_SIZE: positiveInt(20),
    MAX_PAGE_SIZE: positiveInt(100),
    CAPTCHA_MARKERS: z.string().optional(),
    LOG_LEVEL: z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(["debug", "info", "warn", "error"]))
      .default("info"),
    HOST: z.string().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  })
  .refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
    message: "DEFAULT_PAGE_SIZE cannot exceed MAX_PAGE_SIZE",
    path: ["DEFAULT_PAGE_SIZE"],
  });

function parseMarkers(raw: string | undefined): readonly string[] {
  if (raw === undefined) return DEFAULT_CAPTCHA_MARKERS;
  const markers = raw
    .split(",")
    .map((marker) => marker.trim().toLowerCase())
    .filter((marker) => marker.length > 0);
  return markers.length > 0 ? markers : DEFAULT_CAPTCHA_MARKERS;
}

/**
 * Builds the application configuration from environment variables. Blank
 * variables count as unset; anything else that fails validation aborts with
 * the offending variable named.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue.path.join(".")} ${issue.message}`);
  }

  const values = parsed.data;

  return {
    appName: "Consumer Case Search API",
    version: "1.0.0",
    upstreamBaseUrl: values.UPSTREAM_BASE_URL.replace(/\/+$/, ""),
    upstreamTimeoutMs: values.UPSTREAM_TIMEOUT_SECONDS * 1000,
    upstreamMaxRetries: values.UPSTREAM_MAX_RETRIES,
    upstreamBackoffMs: values.UPSTREAM_BACKOFF_MS,
    upstreamConcurrency: values.UPSTREAM_CONCURRENCY,
    statesTtlSeconds: values.CACHE_TTL_STATES,
    commissionsTtlSeconds: values.CACHE_TTL_COMMISSIONS,
    defaultPageSize: values.DEFAULT_PAGE_SIZE,
    maxPageSize: values.MAX_PAGE_SIZE,
    captchaMarkers: parseMarkers(values.CAPTCHA_MARKERS),
    logLevel: values.LOG_LEVEL,
    host: values.HOST,
    port: values.PORT,
  };
}
