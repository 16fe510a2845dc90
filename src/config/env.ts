/**
 * Environment record for the E2E suites.
 *
 * Parses a string map (normally process.env, after dotenv has loaded .env)
 * into a typed SuiteEnv. Empty strings count as unset so that a blank line
 * in .env falls back to the default instead of failing validation.
 */

import { ZodError, z } from "zod";

import { parseTags, type TagName } from "./tags";

export const BROWSER_NAMES = ["chromium", "firefox", "webkit"] as const;
export type SuiteBrowser = (typeof BROWSER_NAMES)[number];

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid suite env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const boolish = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

function commaList<T extends string>(values: readonly [T, ...T[]]) {
  const item = z.enum(values);
  return z
    .string()
    .transform((raw) =>
      raw
        .split(",")
        .map((part) => part.trim().toLowerCase())
        .filter((part) => part.length > 0),
    )
    .pipe(z.array(item))
    .transform((items) => [...new Set(items)]);
}

const envSchema = z.object({
  BASE_URL: z.string().url().default("https://playwright.dev"),
  BROWSERS: commaList(BROWSER_NAMES)
    .refine((list) => list.length > 0, "at least one browser is required")
    .default("chromium"),
  HEADLESS: boolish.default("true"),
  SLOW_MO: z.coerce.number().int().min(0).default(0),
  VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1920),
  VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(1080),
  IGNORE_HTTPS_ERRORS: boolish.default("true"),
  STORAGE_STATE: z.string().optional(),
  TAGS: z
    .string()
    .transform((raw, ctx) => {
      try {
        return parseTags(raw);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    })
    .optional(),
  RETRIES: z.coerce.number().int().min(0).optional(),
  CI: boolish.default("false"),
  MOCK_SITE: boolish.default("true"),
  REPORT_TITLE: z.string().default("Playwright Test Report"),
  ALLURE_RESULTS_DIR: z.string().default("allure-results"),
  ALLURE_REPORT_DIR: z.string().default("allure-report"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface SuiteEnv extends Omit<ParsedEnv, "BROWSERS" | "TAGS" | "RETRIES"> {
  BROWSERS: SuiteBrowser[];
  TAGS: TagName[];
  RETRIES: number;
}

function dropBlank(
  source: Record<string, string | undefined>,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value;
    }
  }
  return out;
}

function toValidationError(error: ZodError): EnvValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    if (issue.code === "invalid_type" && issue.received === "undefined") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [...missing],
    invalid: [...invalid],
  });
}

function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: Record<string, string | undefined>,
): z.output<T> {
  try {
    return schema.parse(dropBlank(source));
  } catch (error) {
    if (error instanceof ZodError) throw toValidationError(error);
    throw error;
  }
}

/**
 * Parse and validate the suite environment.
 * Throws EnvValidationError listing every offending key.
 */
export function loadEnv(
  source: Record<string, string | undefined> = process.env,
): Readonly<SuiteEnv> {
  const parsed = parseEnv(envSchema, source);
  return Object.freeze({
    ...parsed,
    TAGS: parsed.TAGS ?? [],
    RETRIES: parsed.RETRIES ?? (parsed.CI ? 2 : 0),
  });
}

const reportSchema = envSchema.pick({
  ALLURE_RESULTS_DIR: true,
  ALLURE_REPORT_DIR: true,
});

export type ReportEnv = z.infer<typeof reportSchema>;

/**
 * Only the Allure directories. The report CLI reads these alone so that a
 * browser or viewport setting cannot stop a report from being generated.
 */
export function loadReportEnv(
  source: Record<string, string | undefined> = process.env,
): Readonly<ReportEnv> {
  return Object.freeze(parseEnv(reportSchema, source));
}
