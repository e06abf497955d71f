import { test } from "node:test";
import assert from "node:assert/strict";
import { classifyFailure, errorMessage, isRecoverable } from "./classify.js";

const tlsError = (code: string, message: string) => Object.assign(new Error(message), { code });

test("classify: every connect-phase error is transport_unreachable", () => {
  assert.deepEqual(classifyFailure("connect", tlsError("ECONNREFUSED", "connect ECONNREFUSED 10.0.0.1:995")), {
    errorClass: "transport_unreachable",
    code: "ECONNREFUSED",
    message: "connect ECONNREFUSED 10.0.0.1:995",
  });
  assert.equal(classifyFailure("connect", tlsError("ETIMEDOUT", "timed out")).errorClass, "transport_unreachable");
  assert.equal(classifyFailure("connect", tlsError("ENOTFOUND", "getaddrinfo ENOTFOUND nowhere")).errorClass, "transport_unreachable");
});

test("classify: certificate errors are certificate_verify_failed", () => {
  for (const code of ["DEPTH_ZERO_SELF_SIGNED_CERT", "CERT_HAS_EXPIRED", "ERR_TLS_CERT_ALTNAME_INVALID", "UNABLE_TO_VERIFY_LEAF_SIGNATURE"]) {
    assert.equal(classifyFailure("handshake", tlsError(code, "verification failed")).errorClass, "certificate_verify_failed", code);
  }
});

test("classify: protocol version errors are protocol_version_mismatch", () => {
  assert.deepEqual(
    classifyFailure("handshake", tlsError("ERR_SSL_TLSV1_ALERT_PROTOCOL_VERSION", "tlsv1 alert protocol version")),
    {
      errorClass: "protocol_version_mismatch",
      code: "ERR_SSL_TLSV1_ALERT_PROTOCOL_VERSION",
      message: "tlsv1 alert protocol version",
    }
  );
  assert.equal(
    classifyFailure("handshake", new Error("routines:ssl_choose_client_version:unsupported protocol")).errorClass,
    "protocol_version_mismatch"
  );
  assert.equal(classifyFailure("handshake", tlsError("ERR_SSL_WRONG_VERSION_NUMBER", "wrong version number")).errorClass, "protocol_version_mismatch");
});

test("classify: handshake alerts, key size and resets are handshake_failure", () => {
  assert.deepEqual(classifyFailure("handshake", tlsError("ERR_SSL_SSLV3_ALERT_HANDSHAKE_FAILURE", "sslv3 alert handshake failure")), {
    errorClass: "handshake_failure",
    code: "ERR_SSL_SSLV3_ALERT_HANDSHAKE_FAILURE",
    message: "sslv3 alert handshake failure",
  });
  assert.equal(classifyFailure("handshake", tlsError("ERR_SSL_EE_KEY_TOO_SMALL", "ee key too small")).errorClass, "handshake_failure");
  assert.equal(classifyFailure("handshake", tlsError("ECONNRESET", "socket hang up")).errorClass, "handshake_failure");
  assert.equal(classifyFailure("handshake", tlsError("ERR_TLS_HANDSHAKE_TIMEOUT", "TLS handshake timed out after 50ms")).errorClass, "handshake_failure");
});

test("classify: non-Error values are described and classified", () => {
  assert.deepEqual(classifyFailure("handshake", "boom"), { errorClass: "handshake_failure", message: "boom" });
  assert.deepEqual(classifyFailure("handshake", { message: "odd", code: "X" }), {
    errorClass: "handshake_failure",
    code: "X",
    message: "odd",
  });
  assert.equal(errorMessage(42), "42");
});

test("classify: only handshake classes are recoverable", () => {
  assert.equal(isRecoverable("handshake_failure"), true);
  assert.equal(isRecoverable("protocol_version_mismatch"), true);
  assert.equal(isRecoverable("certificate_verify_failed"), true);
  assert.equal(isRecoverable("transport_unreachable"), false);
  assert.equal(isRecoverable("unsafe_profile_rejected"), false);
});
