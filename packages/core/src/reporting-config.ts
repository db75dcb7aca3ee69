import { z } from "zod";
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  PING_INTERVAL,
  REPORT_BASE_URL,
  REPORT_PATH_TEMPLATE,
} from "./endpoints.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const reportingConfigSchema = z.object({
  baseUrl: z.string().url().default(REPORT_BASE_URL),
  reportPath: z
    .string()
    .startsWith("/")
    .includes("%s", { message: "reportPath must contain a %s placeholder" })
    .default(REPORT_PATH_TEMPLATE),
  pingIntervalMinutes: z.number().positive().default(PING_INTERVAL),
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  proxyUrl: z.string().url().optional(),
  bypassProxy: z.boolean().default(false),
});

export type ReportingConfig = z.infer<typeof reportingConfigSchema>;
export type ReportingConfigInput = z.input<typeof reportingConfigSchema>;

const reportingEnvSchema = z.object({
  STATBEACON_BASE_URL: z.string().url().optional(),
  STATBEACON_REPORT_PATH: z.string().optional(),
  STATBEACON_PING_INTERVAL: z.coerce.number().positive().optional(),
  STATBEACON_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STATBEACON_PROXY_URL: z.string().url().optional(),
  STATBEACON_BYPASS_PROXY: booleanFlag.optional(),
});

/**
 * Build the reporting config from environment variables layered over
 * host-supplied overrides. Throws a ZodError on malformed values.
 */
export function loadReportingConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ReportingConfigInput = {},
): ReportingConfig {
  const vars = reportingEnvSchema.parse(env);
  return reportingConfigSchema.parse({
    ...overrides,
    baseUrl: vars.STATBEACON_BASE_URL ?? overrides.baseUrl,
    reportPath: vars.STATBEACON_REPORT_PATH ?? overrides.reportPath,
    pingIntervalMinutes: vars.STATBEACON_PING_INTERVAL ?? overrides.pingIntervalMinutes,
    requestTimeoutMs: vars.STATBEACON_TIMEOUT_MS ?? overrides.requestTimeoutMs,
    proxyUrl: vars.STATBEACON_PROXY_URL ?? overrides.proxyUrl,
    bypassProxy: vars.STATBEACON_BYPASS_PROXY ?? overrides.bypassProxy,
  });
}

/** On-disk shape of the persisted reporting state. Every key is optional until first save. */
export const persistedStateSchema = z.object({
  guid: z.string().min(1).optional(),
  "opt-out": z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type PersistedStateDocument = z.infer<typeof persistedStateSchema>;
