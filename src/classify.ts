import type { ErrorClass } from "./types.js";

export type FailurePhase = "connect" | "handshake";

export type Classification = {
  errorClass: ErrorClass;
  code?: string;
  message: string;
};

interface ErrorPattern {
  readonly patterns: readonly (string | RegExp)[];
  readonly errorClass: ErrorClass;
}

/**
 * Handshake error patterns. Order matters: first match wins, anything
 * unmatched is a handshake_failure.
 */
const HANDSHAKE_PATTERNS: readonly ErrorPattern[] = [
  {
    patterns: [
      "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
      "UNABLE_TO_GET_ISSUER_CERT",
      "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
      "DEPTH_ZERO_SELF_SIGNED_CERT",
      "SELF_SIGNED_CERT_IN_CHAIN",
      "CERT_HAS_EXPIRED",
      "CERT_NOT_YET_VALID",
      "CERT_UNTRUSTED",
      "CERT_REVOKED",
      "HOSTNAME_MISMATCH",
      "ERR_TLS_CERT_ALTNAME_INVALID",
      /certificate verify failed/i,
      /self[- ]signed certificate/i,
    ],
    errorClass: "certificate_verify_failed",
  },
  {
    patterns: [
      "ERR_SSL_UNSUPPORTED_PROTOCOL",
      "ERR_SSL_WRONG_VERSION_NUMBER",
      "ERR_SSL_TLSV1_ALERT_PROTOCOL_VERSION",
      "ERR_SSL_NO_PROTOCOLS_AVAILABLE",
      "ERR_SSL_VERSION_TOO_LOW",
      /unsupported protocol/i,
      /wrong version number/i,
      /protocol version/i,
    ],
    errorClass: "protocol_version_mismatch",
  },
];

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function matches(pattern: string | RegExp, code: string | undefined, message: string): boolean {
  if (typeof pattern === "string") {
    return code === pattern || message.includes(pattern);
  }
  return pattern.test(message);
}

/**
 * Assigns a failed attempt to exactly one error class.
 *
 * Anything that goes wrong before TCP is established is transport-level,
 * whatever the underlying cause (refused, DNS, timeout).
 */
export function classifyFailure(phase: FailurePhase, err: unknown): Classification {
  const code = errorCode(err);
  const message = errorMessage(err);
  const result = (errorClass: ErrorClass): Classification =>
    code === undefined ? { errorClass, message } : { errorClass, code, message };

  if (phase === "connect") {
    return result("transport_unreachable");
  }

  for (const { patterns, errorClass } of HANDSHAKE_PATTERNS) {
    if (patterns.some((p) => matches(p, code, message))) {
      return result(errorClass);
    }
  }
  return result("handshake_failure");
}

export function isRecoverable(errorClass: ErrorClass): boolean {
  return (
    errorClass === "handshake_failure" ||
    errorClass === "protocol_version_mismatch" ||
    errorClass === "certificate_verify_failed"
  );
}
