import net from "net";
import { z } from "zod";
import type { MailProtocol, ProfileSelector } from "./types.js";

export type Target = {
  host: string;
  port: number;
  profile: ProfileSelector;
};

const SELECTORS = ["auto", "strict", "balanced", "legacy", "insecure"] as const satisfies readonly ProfileSelector[];

const selectorSchema = z
  .string()
  .trim()
  .pipe(
    z.enum(SELECTORS, {
      errorMap: () => ({ message: "profile must be one of strict, balanced, legacy, insecure or auto" }),
    })
  );

const targetSchema = z.object({
  host: z
    .string()
    .trim()
    .min(1, "host is required")
    .max(253, "host is too long")
    .regex(/^\S*$/, "host must not contain whitespace"),
  port: z.coerce
    .number({ invalid_type_error: "port must be a number" })
    .int("port must be an integer")
    .min(1, "port must be between 1 and 65535")
    .max(65535, "port must be between 1 and 65535"),
  profile: selectorSchema.default("auto"),
});

export function parseTarget(
  input: Record<string, unknown>
): { ok: true; target: Target } | { ok: false; message: string } {
  const parsed = targetSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    return { ok: false, message };
  }
  return { ok: true, target: parsed.data };
}

export function isLoopbackHost(host: string): boolean {
  const h = host.trim().toLowerCase().replace(/^\[(.*)\]$/, "$1");
  if (net.isIPv4(h)) return h.startsWith("127.");
  if (net.isIPv6(h)) {
    if (h === "::1" || h === "0:0:0:0:0:0:0:1") return true;
    const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/.exec(h);
    return mapped !== null && net.isIPv4(mapped[1]) && mapped[1].startsWith("127.");
  }
  return false;
}

export function detectMailProtocol(port: number): MailProtocol {
  switch (port) {
    case 993:
    case 143:
      return "imap";
    case 995:
    case 110:
      return "pop3";
    case 465:
    case 587:
    case 25:
      return "smtp";
    default:
      return "unknown";
  }
}
