import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { NetsuiteConfig } from "./types.js";

const nonEmpty = z.string().trim().min(1);

const configSchema = z.object({
  client_id: nonEmpty,
  client_secret: nonEmpty,
  refresh_token: nonEmpty,
  account_identifier: nonEmpty.regex(
    /^[A-Za-z0-9_-]+$/,
    "must contain only letters, digits, '_' or '-'",
  ),
  start_date: z
    .string()
    .refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO datetime")
    .optional(),
  user_agent: nonEmpty.optional(),
  streams: z.array(nonEmpty).min(1).optional(),
});

export function parseConfig(raw: unknown): NetsuiteConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid NetSuite config: ${issues}`);
  }
  const c = result.data;
  return {
    clientId: c.client_id,
    clientSecret: c.client_secret,
    refreshToken: c.refresh_token,
    accountIdentifier: c.account_identifier,
    ...(c.start_date !== undefined && { startDate: c.start_date }),
    ...(c.user_agent !== undefined && { userAgent: c.user_agent }),
    ...(c.streams !== undefined && { streams: c.streams }),
  };
}

/** Load a JSON or YAML config file. */
export function loadConfigFile(filePath: string): NetsuiteConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${errorMessage(err)}`,
    );
  }
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(
      `Cannot parse config file ${filePath}: ${errorMessage(err)}`,
    );
  }
  return parseConfig(raw);
}

const ENV_KEYS = {
  client_id: "NETSUITE_CLIENT_ID",
  client_secret: "NETSUITE_CLIENT_SECRET",
  refresh_token: "NETSUITE_REFRESH_TOKEN",
  account_identifier: "NETSUITE_ACCOUNT_IDENTIFIER",
  start_date: "NETSUITE_START_DATE",
  user_agent: "NETSUITE_USER_AGENT",
} as const;

/** Build a config from `NETSUITE_*` variables; unset or blank ones are omitted. */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): NetsuiteConfig {
  const raw: Record<string, unknown> = {};
  for (const [field, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") raw[field] = value;
  }
  const streams = env.NETSUITE_STREAMS;
  if (streams && streams.trim() !== "") {
    raw.streams = streams.split(",").map((s) => s.trim()).filter(Boolean);
  }
  return parseConfig(raw);
}

export function hasEnvCredentials(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.NETSUITE_CLIENT_ID && env.NETSUITE_REFRESH_TOKEN);
}
