export { connect, createNegotiator, DEFAULT_TIMEOUT_MS } from "./negotiate.js";
export type { ConnectFn, NegotiateOptions } from "./negotiate.js";
export { probe, createProbe, summarizeCertificate } from "./probe.js";
export type { ProbeFn, ProbeOptions } from "./probe.js";
export { PROFILES, fallbackSequence, getProfile, isProfileName } from "./profiles.js";
export { classifyFailure, isRecoverable } from "./classify.js";
export { detectMailProtocol, isLoopbackHost, parseTarget } from "./target.js";
export { nodeTransport, toTlsOptions } from "./transport.js";
export type { ClosableSocket, SecureChannel, TlsTransport } from "./transport.js";
export { getProvider, listProviders } from "./providers.js";
export type * from "./types.js";
