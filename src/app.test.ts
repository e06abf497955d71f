import { test } from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import request from "supertest";
import { createApp, type AppDeps } from "./app.js";
import { HttpError } from "./errors.js";
import type { ConnectFn, NegotiateOptions } from "./negotiate.js";
import type { ProbeFn } from "./probe.js";
import type { ClosableSocket } from "./transport.js";
import type { NegotiationResult, ProbeReport } from "./types.js";

const API_KEY = "test-secret";

class CountingSocket implements ClosableSocket {
  destroyCount = 0;
  destroy() {
    this.destroyCount++;
  }
}

function fakeNegotiate(result: NegotiationResult<ClosableSocket>) {
  const calls: { host: string; port: number; selector?: string; options?: NegotiateOptions }[] = [];
  const negotiate: ConnectFn<ClosableSocket> = async (host, port, selector, options) => {
    calls.push({ host, port, selector, options });
    return result;
  };
  return { negotiate, calls };
}

const report: ProbeReport = {
  host: "pop.example.com",
  port: 995,
  protocol: "pop3",
  tcp: { ok: true, elapsedMs: 12 },
  versions: [],
  cipherPolicies: [],
  certificate: null,
  recommendation: { profileName: "balanced", note: 'use the "balanced" profile' },
  scannedAt: "2026-01-01T00:00:00.000Z",
};

const okProbe: ProbeFn = async () => report;

function app(overrides: Partial<AppDeps> = {}) {
  return createApp({
    apiKey: API_KEY,
    timeoutMs: 5000,
    allowInsecureLoopback: false,
    negotiate: fakeNegotiate({ ok: false, reason: "invalid_request", message: "unused", attempts: [] }).negotiate,
    probe: okProbe,
    logger: pino({ level: "silent" }),
    ...overrides,
  });
}

test("app: /health needs no key", async () => {
  const res = await request(app()).get("/health");
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true });
});

test("app: other routes need the API key", async () => {
  const res = await request(app()).get("/negotiate?host=pop.example.com&port=995");
  assert.equal(res.status, 401);
  assert.deepEqual(res.body, { error: "unauthorized" });

  const wrong = await request(app()).get("/probe?host=pop.example.com&port=995").set("x-negotiator-key", "wrong");
  assert.equal(wrong.status, 401);
});

test("app: without a configured key everything but /health is refused", async () => {
  const res = await request(app({ apiKey: undefined })).get("/probe?host=pop.example.com&port=995").set("x-negotiator-key", "");
  assert.equal(res.status, 401);
});

test("app: /negotiate reports the profile and closes the connection", async () => {
  const socket = new CountingSocket();
  const { negotiate, calls } = fakeNegotiate({
    ok: true,
    connection: socket,
    profileName: "balanced",
    tlsVersion: "TLSv1.2",
    cipherName: "ECDHE-RSA-AES128-GCM-SHA256",
  });

  const res = await request(app({ negotiate }))
    .get("/negotiate?host=pop.example.com&port=995&profile=auto&timeout=2000")
    .set("x-negotiator-key", API_KEY);

  assert.equal(res.status, 200);
  assert.deepEqual(res.body, {
    ok: true,
    profileName: "balanced",
    tlsVersion: "TLSv1.2",
    cipherName: "ECDHE-RSA-AES128-GCM-SHA256",
  });
  assert.equal(socket.destroyCount, 1);
  assert.equal(calls.length, 1);
  assert.equal(calls[0].host, "pop.example.com");
  assert.equal(calls[0].port, 995);
  assert.equal(calls[0].selector, "auto");
  assert.equal(calls[0].options?.timeoutMs, 2000);
  assert.equal(calls[0].options?.allowInsecureLoopback, false);
});

test("app: /negotiate defaults the selector and timeout", async () => {
  const { negotiate, calls } = fakeNegotiate({ ok: false, reason: "all_profiles_exhausted", message: "none", attempts: [] });

  await request(app({ negotiate })).get("/negotiate?host=pop.example.com&port=995").set("x-negotiator-key", API_KEY);

  assert.equal(calls[0].selector, "auto");
  assert.equal(calls[0].options?.timeoutMs, 5000);
});

test("app: /negotiate maps failure reasons to statuses", async () => {
  const cases: [NegotiationResult<ClosableSocket>, number][] = [
    [{ ok: false, reason: "invalid_request", message: "host is required", attempts: [] }, 400],
    [
      {
        ok: false,
        reason: "unsafe_profile_rejected",
        message: "refused",
        attempts: [{ profileName: "insecure", errorClass: "unsafe_profile_rejected", message: "refused" }],
      },
      403,
    ],
    [
      {
        ok: false,
        reason: "transport_unreachable",
        message: "cannot reach",
        attempts: [{ profileName: "strict", errorClass: "transport_unreachable", code: "ECONNREFUSED", message: "refused" }],
      },
      502,
    ],
    [{ ok: false, reason: "all_profiles_exhausted", message: "none", attempts: [] }, 502],
  ];

  for (const [result, status] of cases) {
    const { negotiate } = fakeNegotiate(result);
    const res = await request(app({ negotiate })).get("/negotiate?host=h&port=995").set("x-negotiator-key", API_KEY);
    assert.equal(res.status, status, result.ok ? "ok" : result.reason);
    assert.deepEqual(res.body, result);
  }
});

test("app: /probe answers the report", async () => {
  const res = await request(app()).get("/probe?host=pop.example.com&port=995").set("x-negotiator-key", API_KEY);
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, report);
});

test("app: /probe maps HttpError to its status and anything else to 502", async () => {
  const badInput: ProbeFn = async () => {
    throw new HttpError(400, "port must be between 1 and 65535");
  };
  const res = await request(app({ probe: badInput })).get("/probe?host=h&port=0").set("x-negotiator-key", API_KEY);
  assert.equal(res.status, 400);
  assert.deepEqual(res.body, { error: "port must be between 1 and 65535" });

  const broken: ProbeFn = async () => {
    throw new Error("boom");
  };
  const res2 = await request(app({ probe: broken })).get("/probe?host=h&port=995").set("x-negotiator-key", API_KEY);
  assert.equal(res2.status, 502);
  assert.deepEqual(res2.body, { error: "boom" });
});

test("app: request bodies are never parsed", async () => {
  const { negotiate, calls } = fakeNegotiate({ ok: false, reason: "all_profiles_exhausted", message: "none", attempts: [] });

  const res = await request(app({ negotiate }))
    .get("/negotiate?host=pop.example.com&port=995")
    .set("x-negotiator-key", API_KEY)
    .set("content-type", "application/json")
    .send("{not json");

  assert.equal(res.status, 502);
  assert.equal(calls.length, 1);
});
