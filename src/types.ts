import type { SecureVersion } from "tls";

export type ProfileName = "strict" | "balanced" | "legacy" | "insecure";
export type ProfileSelector = ProfileName | "auto";

export type VerifyMode = "full" | "none";

export type TlsProfile = {
  readonly name: ProfileName;
  readonly rank: number; // higher is more secure
  readonly minTlsVersion: SecureVersion;
  readonly maxTlsVersion: SecureVersion;
  readonly cipherPolicy: string;
  readonly verifyMode: VerifyMode;
  readonly description: string;
};

export type MailProtocol = "pop3" | "imap" | "smtp" | "unknown";

export type ErrorClass =
  | "transport_unreachable"
  | "handshake_failure"
  | "protocol_version_mismatch"
  | "certificate_verify_failed"
  | "unsafe_profile_rejected";

export type FailureReason =
  | "invalid_request"
  | "unsafe_profile_rejected"
  | "transport_unreachable"
  | "all_profiles_exhausted";

export type AttemptFailure = {
  profileName: ProfileName;
  errorClass: ErrorClass;
  code?: string;
  message: string;
};

export type AttemptOutcome =
  | { profileName: ProfileName; ok: true; tlsVersion: string | null; cipherName: string | null }
  | ({ ok: false } & AttemptFailure);

export type NegotiationSuccess<TChannel> = {
  ok: true;
  connection: TChannel;
  profileName: ProfileName;
  tlsVersion: string | null;
  cipherName: string | null;
};

export type NegotiationFailure = {
  ok: false;
  reason: FailureReason;
  message: string;
  attempts: AttemptFailure[];
};

export type NegotiationResult<TChannel> = NegotiationSuccess<TChannel> | NegotiationFailure;

export type CertificateSummary = {
  cn: string | null;
  organization: string | null;
  issuer: string | null;
  notBefore: string | null;
  notAfter: string | null;
  san: string[]; // first five DNS names
  sanCount: number;
};

export type CheckResult =
  | { ok: true; tlsVersion: string | null; cipherName: string | null }
  | { ok: false; errorClass: ErrorClass; code?: string; message: string };

export type VersionCheck = { version: SecureVersion } & CheckResult;

export type PolicyCheck = {
  label: string;
  cipherPolicy: string;
  profileName: ProfileName | null;
} & CheckResult;

export type ProbeReport = {
  host: string;
  port: number;
  protocol: MailProtocol;
  tcp:
    | { ok: true; elapsedMs: number }
    | { ok: false; errorClass: ErrorClass; code?: string; message: string };
  versions: VersionCheck[];
  cipherPolicies: PolicyCheck[];
  certificate: CertificateSummary | null;
  recommendation: {
    profileName: ProfileName | null;
    note: string;
  };
  scannedAt: string;
};
