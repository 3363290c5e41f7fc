import { z } from "zod";
import { ConfigurationError } from "./errors";
import { createJsonLogger, silentLogger } from "./logger";
import type { ClientOptions } from "./types";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

// An exported but empty variable counts as unset.
const unsetWhenEmpty = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const EnvSchema = z.object({
  AEGIS_BASE_URL: unsetWhenEmpty(z.string().url().optional()),
  AEGIS_API_KEY: z.string().default(""),
  AEGIS_USER_ID: z.string().default(""),
  AEGIS_TIMEOUT_MS: unsetWhenEmpty(z.coerce.number().int().positive().optional()),
  AEGIS_THROW_ON_HTTP_ERROR: unsetWhenEmpty(booleanFlag.optional()),
  AEGIS_LOG_LEVEL: unsetWhenEmpty(z.enum(["debug", "info", "warn", "error", "silent"]).default("silent")),
});

export type ClientEnvironment = Record<string, string | undefined>;

export function loadClientOptions(env: ClientEnvironment = process.env): ClientOptions {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const config = parsed.data;
  return {
    baseUrl: config.AEGIS_BASE_URL,
    apiKey: config.AEGIS_API_KEY,
    userId: config.AEGIS_USER_ID,
    timeoutMs: config.AEGIS_TIMEOUT_MS,
    throwOnHttpError: config.AEGIS_THROW_ON_HTTP_ERROR,
    logger: config.AEGIS_LOG_LEVEL === "silent" ? silentLogger : createJsonLogger(config.AEGIS_LOG_LEVEL),
  };
}
