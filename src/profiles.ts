import type { ProfileName, TlsProfile } from "./types.js";

// Node only offers TLS 1.3 when the cipher string names at least one TLS_* suite;
// without one it caps maxVersion at TLSv1.2.
export const TLS13_SUITES = "TLS_AES_256_GCM_SHA384:TLS_CHACHA20_POLY1305_SHA256:TLS_AES_128_GCM_SHA256";

const define = (profile: TlsProfile): TlsProfile => Object.freeze(profile);

export const PROFILES: Readonly<Record<ProfileName, TlsProfile>> = Object.freeze({
  strict: define({
    name: "strict",
    rank: 4,
    minTlsVersion: "TLSv1.2",
    maxTlsVersion: "TLSv1.3",
    cipherPolicy: `${TLS13_SUITES}:DEFAULT:@SECLEVEL=2`,
    verifyMode: "full",
    description: "Strong ciphers only: RSA 2048+, no SHA1 signatures",
  }),
  balanced: define({
    name: "balanced",
    rank: 3,
    minTlsVersion: "TLSv1.2",
    maxTlsVersion: "TLSv1.3",
    cipherPolicy: `${TLS13_SUITES}:DEFAULT:@SECLEVEL=1`,
    verifyMode: "full",
    description: "RSA 1024+ and SHA1 signatures accepted",
  }),
  legacy: define({
    name: "legacy",
    rank: 2,
    minTlsVersion: "TLSv1",
    maxTlsVersion: "TLSv1.3",
    cipherPolicy: `${TLS13_SUITES}:ALL:@SECLEVEL=0`,
    verifyMode: "full",
    description: "Every cipher and TLS 1.0+, certificate still verified",
  }),
  insecure: define({
    name: "insecure",
    rank: 1,
    minTlsVersion: "TLSv1",
    maxTlsVersion: "TLSv1.3",
    cipherPolicy: `${TLS13_SUITES}:ALL:@SECLEVEL=0`,
    verifyMode: "none",
    description: "Every cipher, no certificate verification (loopback only)",
  }),
});

const PROFILE_NAMES = Object.keys(PROFILES);

export function isProfileName(value: string): value is ProfileName {
  return PROFILE_NAMES.includes(value);
}

export function getProfile(name: ProfileName): TlsProfile {
  return PROFILES[name];
}

/**
 * Profiles tried under the `auto` selector, most secure first.
 *
 * `insecure` joins the end of the sequence only for loopback targets and only
 * when the caller opts in with `allowInsecureLoopback`.
 */
export function fallbackSequence(opts: { loopback: boolean; allowInsecureLoopback?: boolean }): TlsProfile[] {
  const sequence = [PROFILES.strict, PROFILES.balanced, PROFILES.legacy];
  if (opts.loopback && opts.allowInsecureLoopback) {
    sequence.push(PROFILES.insecure);
  }
  return sequence;
}
