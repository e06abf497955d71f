import { test } from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

test("config: defaults", () => {
  assert.deepEqual(parseConfig({}), {
    nodeEnv: "development",
    port: 8080,
    apiKey: undefined,
    logLevel: "info",
    connectTimeoutMs: 10_000,
    allowInsecureLoopback: false,
    mail: { host: undefined, port: 995 },
    smtp: { host: undefined, port: 465 },
    defaultProfile: "auto",
  });
});

test("config: reads mail targets, profile and flags", () => {
  const config = parseConfig({
    NEGOTIATOR_API_KEY: "test-secret",
    CONNECT_TIMEOUT_MS: "2500",
    ALLOW_INSECURE_LOOPBACK: "true",
    MAIL_HOST: "pop.example.com",
    MAIL_PORT: "110",
    SMTP_SERVER: "smtp.example.com",
    TLS_PROFILE: "legacy",
  });
  assert.equal(config.apiKey, "test-secret");
  assert.equal(config.connectTimeoutMs, 2500);
  assert.equal(config.allowInsecureLoopback, true);
  assert.deepEqual(config.mail, { host: "pop.example.com", port: 110 });
  assert.deepEqual(config.smtp, { host: "smtp.example.com", port: 465 });
  assert.equal(config.defaultProfile, "legacy");
});

test("config: empty strings count as unset", () => {
  const config = parseConfig({ NEGOTIATOR_API_KEY: "", MAIL_HOST: "", TLS_PROFILE: "" });
  assert.equal(config.apiKey, undefined);
  assert.equal(config.mail.host, undefined);
  assert.equal(config.defaultProfile, "auto");
});

test("config: invalid values are listed in a ConfigError", () => {
  assert.throws(
    () => parseConfig({ MAIL_PORT: "pop", TLS_PROFILE: "paranoid" }),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.issues.length === 2 &&
      err.issues[0].startsWith("MAIL_PORT: ") &&
      err.issues[1] === "TLS_PROFILE: must be auto or a profile name"
  );
});
