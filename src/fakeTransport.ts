import type { CertificateLike, ClosableSocket, HandshakeParams, SecureChannel, TlsTransport } from "./transport.js";
import type { TlsProfile } from "./types.js";

// In-process stand-in for nodeTransport, used by the tests.

export type HandshakeOutcome =
  | { ok: true; tlsVersion?: string; cipherName?: string; certificate?: CertificateLike }
  | { reject: Error }
  | { throws: Error };

export type FakeBehavior = {
  connect?: (host: string, port: number) => Error | undefined;
  handshake?: (profile: TlsProfile, host: string) => HandshakeOutcome;
};

export class FakeSocket implements ClosableSocket {
  destroyCount = 0;
  constructor(
    readonly host: string,
    readonly port: number
  ) {}
  destroy() {
    this.destroyCount++;
  }
}

export class FakeChannel implements SecureChannel {
  destroyCount = 0;
  constructor(
    readonly socket: FakeSocket,
    readonly profile: TlsProfile,
    private readonly tlsVersion: string,
    private readonly cipherName: string,
    private readonly certificate: CertificateLike
  ) {}
  destroy() {
    this.destroyCount++;
  }
  getProtocol() {
    return this.tlsVersion;
  }
  getCipher() {
    return { name: this.cipherName };
  }
  getPeerCertificate() {
    return this.certificate;
  }
}

export const tlsError = (code: string, message: string) => Object.assign(new Error(message), { code });

export class FakeTransport implements TlsTransport<FakeSocket, FakeChannel> {
  readonly connectAttempts: { host: string; port: number; timeoutMs: number }[] = [];
  readonly sockets: FakeSocket[] = [];
  readonly handshakes: TlsProfile[] = [];
  readonly channels: FakeChannel[] = [];

  constructor(private readonly behavior: FakeBehavior = {}) {}

  async openSocket(host: string, port: number, timeoutMs: number): Promise<FakeSocket> {
    this.connectAttempts.push({ host, port, timeoutMs });
    const err = this.behavior.connect?.(host, port);
    if (err) throw err;
    const socket = new FakeSocket(host, port);
    this.sockets.push(socket);
    return socket;
  }

  startTls(socket: FakeSocket, params: HandshakeParams, _timeoutMs: number): Promise<FakeChannel> {
    this.handshakes.push(params.profile);
    const outcome = this.behavior.handshake?.(params.profile, params.host) ?? { ok: true };
    if ("throws" in outcome) {
      throw outcome.throws;
    }
    if ("reject" in outcome) {
      return Promise.reject(outcome.reject);
    }
    const channel = new FakeChannel(
      socket,
      params.profile,
      outcome.tlsVersion ?? "TLSv1.3",
      outcome.cipherName ?? "TLS_AES_256_GCM_SHA384",
      outcome.certificate ?? {}
    );
    this.channels.push(channel);
    return Promise.resolve(channel);
  }
}
