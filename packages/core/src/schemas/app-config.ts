import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  retry: {
    attempts: 3,
    delayMs: 1_000,
  },
  lock: {
    staleMs: 10_000,
    retries: 50,
  },
  poll: {
    intervalMs: 60_000,
  },
};

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const AppConfigSchema = z.object({
  logging: z
    .object({
      level: LogLevelSchema.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  retry: z
    .object({
      attempts: z.number().int().min(1).max(20).default(DEFAULTS.retry.attempts),
      delayMs: z.number().int().min(0).default(DEFAULTS.retry.delayMs),
    })
    .default(DEFAULTS.retry),
  lock: z
    .object({
      staleMs: z.number().int().min(2_000).default(DEFAULTS.lock.staleMs),
      retries: z.number().int().min(0).default(DEFAULTS.lock.retries),
    })
    .default(DEFAULTS.lock),
  poll: z
    .object({
      intervalMs: z
        .number()
        .int()
        .min(1_000)
        .default(DEFAULTS.poll.intervalMs)
        .describe("Delay between polls when a command is run with --wait"),
    })
    .default(DEFAULTS.poll),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LoggingConfig = AppConfig["logging"];
export type RetryConfig = AppConfig["retry"];
export type LockConfig = AppConfig["lock"];
