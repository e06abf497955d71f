import net from "net";
import tls from "tls";
import type { TlsProfile } from "./types.js";

export type CertificateLike = {
  subject?: { CN?: string; O?: string };
  issuer?: { CN?: string };
  valid_from?: string;
  valid_to?: string;
  subjectaltname?: string;
};

/** A raw TCP socket as the negotiator sees it. */
export interface ClosableSocket {
  destroy(): void;
}

/** An established TLS session. */
export interface SecureChannel extends ClosableSocket {
  getProtocol(): string | null;
  getCipher(): { name: string };
  // matches the non-detailed overload of tls.TLSSocket
  getPeerCertificate(detailed?: false): CertificateLike;
}

export type HandshakeParams = {
  host: string;
  profile: TlsProfile;
};

export interface TlsTransport<TSocket extends ClosableSocket = ClosableSocket, TChannel extends SecureChannel = SecureChannel> {
  openSocket(host: string, port: number, timeoutMs: number): Promise<TSocket>;
  startTls(socket: TSocket, params: HandshakeParams, timeoutMs: number): Promise<TChannel>;
}

const timeoutError = (message: string, code: string) => Object.assign(new Error(message), { code });

export function toTlsOptions(host: string, profile: TlsProfile): tls.ConnectionOptions {
  return {
    host, // used for the identity check
    servername: net.isIP(host) ? undefined : host, // SNI is not sent for IP literals
    minVersion: profile.minTlsVersion,
    maxVersion: profile.maxTlsVersion,
    ciphers: profile.cipherPolicy,
    rejectUnauthorized: profile.verifyMode === "full",
  };
}

function openSocket(host: string, port: number, timeoutMs: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.connect({ host, port });

    const timeoutHandle = setTimeout(() => {
      socket.destroy(timeoutError(`connect to ${host}:${port} timed out after ${timeoutMs}ms`, "ETIMEDOUT"));
    }, timeoutMs);

    const onError = (e: Error) => {
      clearTimeout(timeoutHandle);
      reject(e);
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timeoutHandle);
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

function startTls(socket: net.Socket, params: HandshakeParams, timeoutMs: number): Promise<tls.TLSSocket> {
  return new Promise<tls.TLSSocket>((resolve, reject) => {
    const secure = tls.connect({ ...toTlsOptions(params.host, params.profile), socket });

    const timeoutHandle = setTimeout(() => {
      secure.destroy(timeoutError(`TLS handshake timed out after ${timeoutMs}ms`, "ERR_TLS_HANDSHAKE_TIMEOUT"));
    }, timeoutMs);

    const onError = (e: Error) => {
      clearTimeout(timeoutHandle);
      reject(e);
    };

    secure.once("error", onError);
    secure.once("secureConnect", () => {
      clearTimeout(timeoutHandle);
      // from here on the caller owns error handling on the session
      secure.off("error", onError);
      resolve(secure);
    });
  });
}

export const nodeTransport: TlsTransport<net.Socket, tls.TLSSocket> = { openSocket, startTls };
