import type { TLSSocket } from "tls";
import { classifyFailure, errorMessage, isRecoverable } from "./classify.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import { fallbackSequence, getProfile } from "./profiles.js";
import { isLoopbackHost, parseTarget } from "./target.js";
import { nodeTransport, type ClosableSocket, type SecureChannel, type TlsTransport } from "./transport.js";
import type {
  AttemptFailure,
  AttemptOutcome,
  NegotiationFailure,
  NegotiationResult,
  TlsProfile,
} from "./types.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export type NegotiateOptions = {
  /** Bound on the TCP connect and, separately, on the TLS handshake of each attempt. */
  timeoutMs?: number;
  /** Append the verification-disabled profile to the `auto` sequence for loopback hosts. */
  allowInsecureLoopback?: boolean;
  logger?: Logger;
};

export type ConnectFn<TChannel> = (
  host: string,
  port: number,
  profileSelector?: string,
  options?: NegotiateOptions
) => Promise<NegotiationResult<TChannel>>;

type AttemptResult<TChannel> =
  | { ok: true; channel: TChannel; outcome: Extract<AttemptOutcome, { ok: true }> }
  | { ok: false; failure: AttemptFailure };

const failure = (reason: NegotiationFailure["reason"], message: string, attempts: AttemptFailure[]): NegotiationFailure => ({
  ok: false,
  reason,
  message,
  attempts,
});

/**
 * Builds a `connect` bound to a transport.
 *
 * The returned function never rejects: every failure, including errors the
 * transport throws synchronously, ends up in the structured result.
 */
export function createNegotiator<TSocket extends ClosableSocket, TChannel extends SecureChannel>(
  transport: TlsTransport<TSocket, TChannel>
): ConnectFn<TChannel> {
  async function attempt(host: string, port: number, profile: TlsProfile, timeoutMs: number): Promise<AttemptResult<TChannel>> {
    let socket: TSocket;
    try {
      socket = await transport.openSocket(host, port, timeoutMs);
    } catch (e) {
      return { ok: false, failure: { profileName: profile.name, ...classifyFailure("connect", e) } };
    }

    try {
      const channel = await transport.startTls(socket, { host, profile }, timeoutMs);
      const outcome = {
        profileName: profile.name,
        ok: true as const,
        tlsVersion: channel.getProtocol(),
        cipherName: channel.getCipher().name || null,
      };
      return { ok: true, channel, outcome };
    } catch (e) {
      socket.destroy();
      return { ok: false, failure: { profileName: profile.name, ...classifyFailure("handshake", e) } };
    }
  }

  return async function connect(host, port, profileSelector = "auto", options = {}) {
    const parsed = parseTarget({ host, port, profile: profileSelector });
    if (!parsed.ok) {
      return failure("invalid_request", parsed.message, []);
    }
    const target = parsed.target;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const log = (options.logger ?? rootLogger).child({ host: target.host, port: target.port, selector: target.profile });
    const loopback = isLoopbackHost(target.host);

    let sequence: TlsProfile[];
    if (target.profile === "auto") {
      sequence = fallbackSequence({ loopback, allowInsecureLoopback: options.allowInsecureLoopback });
    } else {
      const profile = getProfile(target.profile);
      if (profile.verifyMode === "none" && !loopback) {
        const message = `profile "${profile.name}" disables certificate verification and is only allowed for loopback hosts`;
        log.warn({ profile: profile.name }, "unsafe profile rejected");
        return failure("unsafe_profile_rejected", message, [
          { profileName: profile.name, errorClass: "unsafe_profile_rejected", message },
        ]);
      }
      sequence = [profile];
    }

    const attempts: AttemptFailure[] = [];
    for (const profile of sequence) {
      log.debug({ profile: profile.name }, "attempting TLS profile");
      let result: AttemptResult<TChannel>;
      try {
        result = await attempt(target.host, target.port, profile, timeoutMs);
      } catch (e) {
        result = {
          ok: false,
          failure: { profileName: profile.name, errorClass: "handshake_failure", message: errorMessage(e) },
        };
      }

      if (result.ok) {
        const { tlsVersion, cipherName } = result.outcome;
        log.info({ profile: profile.name, tlsVersion, cipherName, failedAttempts: attempts.length }, "TLS negotiated");
        return {
          ok: true,
          connection: result.channel,
          profileName: profile.name,
          tlsVersion,
          cipherName,
        };
      }

      attempts.push(result.failure);
      log.debug({ attempt: result.failure }, "TLS profile failed");
      if (!isRecoverable(result.failure.errorClass)) {
        log.warn({ attempts }, "transport unreachable");
        return failure("transport_unreachable", `cannot reach ${target.host}:${target.port}: ${result.failure.message}`, attempts);
      }
    }

    log.warn({ attempts }, "all TLS profiles exhausted");
    const tried = sequence.map((p) => p.name).join(", ");
    return failure("all_profiles_exhausted", `no TLS profile was accepted by ${target.host}:${target.port} (tried ${tried})`, attempts);
  };
}

/** Negotiates over real TCP/TLS sockets. */
export const connect: ConnectFn<TLSSocket> = createNegotiator(nodeTransport);
