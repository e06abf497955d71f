import type { SecureVersion } from "tls";
import { classifyFailure } from "./classify.js";
import { HttpError } from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import { DEFAULT_TIMEOUT_MS } from "./negotiate.js";
import { PROFILES, TLS13_SUITES, fallbackSequence } from "./profiles.js";
import { detectMailProtocol, parseTarget } from "./target.js";
import { nodeTransport, type CertificateLike, type ClosableSocket, type SecureChannel, type TlsTransport } from "./transport.js";
import type { CertificateSummary, CheckResult, PolicyCheck, ProbeReport, ProfileName, TlsProfile, VersionCheck } from "./types.js";

export type ProbeOptions = {
  timeoutMs?: number;
  logger?: Logger;
};

export type ProbeFn = (host: string, port: number, options?: ProbeOptions) => Promise<ProbeReport>;

export const PROBED_VERSIONS: readonly SecureVersion[] = ["TLSv1.3", "TLSv1.2", "TLSv1.1", "TLSv1"];

type PolicyCandidate = {
  label: string;
  profile: TlsProfile;
  profileName: ProfileName | null;
};

// explicit TLS 1.2 suite lists, checked outside any named profile
const adHoc = (label: string, cipherPolicy: string): PolicyCandidate => ({
  label,
  profileName: null,
  profile: {
    ...PROFILES.strict,
    minTlsVersion: "TLSv1.2",
    maxTlsVersion: "TLSv1.2",
    cipherPolicy,
    description: label,
  },
});

function policyCandidates(): PolicyCandidate[] {
  // verification stays on while probing, so the insecure profile never takes part
  const profiles = fallbackSequence({ loopback: false }).map((profile) => ({
    label: `${profile.name} (${profile.cipherPolicy.split(":").slice(-2).join(":")})`,
    profile,
    profileName: profile.name,
  }));
  return [
    ...profiles,
    adHoc("ECDHE Only", "ECDHE-RSA-AES256-GCM-SHA384:ECDHE-RSA-AES128-GCM-SHA256"),
    adHoc("AES-SHA Only", "AES128-SHA:AES256-SHA"),
  ];
}

function versionProfile(version: SecureVersion): TlsProfile {
  return {
    ...PROFILES.legacy,
    minTlsVersion: version,
    maxTlsVersion: version,
    cipherPolicy: `${TLS13_SUITES}:ALL:@SECLEVEL=0`,
    description: `pinned to ${version}`,
  };
}

function extractSANs(subjectaltname: string | undefined): string[] {
  if (!subjectaltname) return [];
  // "DNS:example.com, DNS:www.example.com, IP Address:1.2.3.4"
  return subjectaltname
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.startsWith("DNS:"))
    .map((s) => s.slice(4));
}

const toIso = (value: string | undefined): string | null => {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
};

export function summarizeCertificate(peer: CertificateLike): CertificateSummary | null {
  if (!peer.subject && !peer.issuer && !peer.subjectaltname) return null;
  const san = extractSANs(peer.subjectaltname);
  return {
    cn: peer.subject?.CN ?? null,
    organization: peer.subject?.O ?? null,
    issuer: peer.issuer?.CN ?? null,
    notBefore: toIso(peer.valid_from),
    notAfter: toIso(peer.valid_to),
    san: san.slice(0, 5),
    sanCount: san.length,
  };
}

/**
 * Builds a probe bound to a transport.
 *
 * Every check opens its own connection and closes it before the next one
 * starts. Only bad input throws; network failures land in the report.
 */
export function createProbe<TSocket extends ClosableSocket, TChannel extends SecureChannel>(
  transport: TlsTransport<TSocket, TChannel>
): ProbeFn {
  async function check(
    host: string,
    port: number,
    profile: TlsProfile,
    timeoutMs: number
  ): Promise<{ result: CheckResult; certificate: CertificateSummary | null }> {
    let socket: TSocket;
    try {
      socket = await transport.openSocket(host, port, timeoutMs);
    } catch (e) {
      return { result: { ok: false, ...classifyFailure("connect", e) }, certificate: null };
    }
    let channel: TChannel;
    try {
      channel = await transport.startTls(socket, { host, profile }, timeoutMs);
    } catch (e) {
      socket.destroy();
      return { result: { ok: false, ...classifyFailure("handshake", e) }, certificate: null };
    }
    try {
      return {
        result: { ok: true, tlsVersion: channel.getProtocol(), cipherName: channel.getCipher().name || null },
        certificate: summarizeCertificate(channel.getPeerCertificate()),
      };
    } catch (e) {
      return { result: { ok: false, ...classifyFailure("handshake", e) }, certificate: null };
    } finally {
      channel.destroy();
    }
  }

  return async function probe(host, port, options = {}) {
    const parsed = parseTarget({ host, port });
    if (!parsed.ok) {
      throw new HttpError(400, parsed.message);
    }
    const target = parsed.target;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const log = (options.logger ?? rootLogger).child({ host: target.host, port: target.port });

    const report: ProbeReport = {
      host: target.host,
      port: target.port,
      protocol: detectMailProtocol(target.port),
      tcp: { ok: true, elapsedMs: 0 },
      versions: [],
      cipherPolicies: [],
      certificate: null,
      recommendation: { profileName: null, note: "" },
      scannedAt: new Date().toISOString(),
    };

    const started = Date.now();
    try {
      const socket = await transport.openSocket(target.host, target.port, timeoutMs);
      socket.destroy();
      report.tcp = { ok: true, elapsedMs: Date.now() - started };
    } catch (e) {
      report.tcp = { ok: false, ...classifyFailure("connect", e) };
      report.recommendation.note = "TCP connection failed; check host, port and firewall before tuning TLS";
      log.warn({ tcp: report.tcp }, "probe stopped: TCP unreachable");
      return report;
    }

    for (const version of PROBED_VERSIONS) {
      const { result } = await check(target.host, target.port, versionProfile(version), timeoutMs);
      const entry: VersionCheck = { version, ...result };
      report.versions.push(entry);
    }

    for (const candidate of policyCandidates()) {
      const { result, certificate } = await check(target.host, target.port, candidate.profile, timeoutMs);
      const entry: PolicyCheck = {
        label: candidate.label,
        cipherPolicy: candidate.profile.cipherPolicy,
        profileName: candidate.profileName,
        ...result,
      };
      report.cipherPolicies.push(entry);
      if (result.ok && report.certificate === null) {
        report.certificate = certificate;
      }
    }

    const best = report.cipherPolicies.find((c) => c.ok && c.profileName !== null);
    if (best && best.profileName) {
      report.recommendation = {
        profileName: best.profileName,
        note:
          best.profileName === "legacy"
            ? "server only accepts legacy ciphers or protocol versions; consider asking the operator to upgrade"
            : `use the "${best.profileName}" profile`,
      };
    } else if (report.cipherPolicies.some((c) => c.ok)) {
      report.recommendation.note = "only an explicit cipher list worked; a custom profile is needed";
    } else {
      report.recommendation.note = "no TLS configuration was accepted";
    }

    log.info(
      { recommendation: report.recommendation.profileName, versions: report.versions.filter((v) => v.ok).map((v) => v.version) },
      "probe finished"
    );
    return report;
  };
}

export const probe: ProbeFn = createProbe(nodeTransport);
