import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isProfileName } from "./profiles.js";
import type { ProfileSelector } from "./types.js";

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.preprocess(toNumber(8080), z.number().int().min(1).max(65535)),
  NEGOTIATOR_API_KEY: z.preprocess(emptyToUndefined, z.string().min(8).optional()),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CONNECT_TIMEOUT_MS: z.preprocess(toNumber(10_000), z.number().int().min(100).max(120_000)),
  ALLOW_INSECURE_LOOPBACK: z.preprocess((value) => value === "true", z.boolean()).default(false),
  MAIL_HOST: z.preprocess(emptyToUndefined, z.string().optional()),
  MAIL_PORT: z.preprocess(toNumber(995), z.number().int().min(1).max(65535)),
  SMTP_SERVER: z.preprocess(emptyToUndefined, z.string().optional()),
  SMTP_PORT: z.preprocess(toNumber(465), z.number().int().min(1).max(65535)),
  TLS_PROFILE: z
    .preprocess(emptyToUndefined, z.string().default("auto"))
    .refine((value) => value === "auto" || isProfileName(value), "must be auto or a profile name"),
});

export type Config = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  apiKey?: string;
  logLevel: string;
  connectTimeoutMs: number;
  allowInsecureLoopback: boolean;
  mail: { host?: string; port: number };
  smtp: { host?: string; port: number };
  defaultProfile: ProfileSelector;
};

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = parsed.data;
  const profile = e.TLS_PROFILE;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    apiKey: e.NEGOTIATOR_API_KEY,
    logLevel: e.LOG_LEVEL,
    connectTimeoutMs: e.CONNECT_TIMEOUT_MS,
    allowInsecureLoopback: e.ALLOW_INSECURE_LOOPBACK,
    mail: { host: e.MAIL_HOST, port: e.MAIL_PORT },
    smtp: { host: e.SMTP_SERVER, port: e.SMTP_PORT },
    defaultProfile: isProfileName(profile) ? profile : "auto",
  };
}

/** Reads `.env` from the working directory, then parses the environment. */
export function loadConfig(): Config {
  dotenv.config();
  return parseConfig(process.env);
}
