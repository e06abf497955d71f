import { Command, CommanderError } from "commander";
import { errorMessage } from "./classify.js";
import type { Config } from "./config.js";
import type { Logger } from "./logger.js";
import type { ConnectFn } from "./negotiate.js";
import type { ProbeFn } from "./probe.js";
import { listProviders, resolveEndpoint } from "./providers.js";
import type { ClosableSocket } from "./transport.js";
import type { NegotiationResult, ProbeReport } from "./types.js";

export type CliDeps = {
  /** Loaded lazily so a bad `.env` is reported like any other command error. */
  loadConfig: () => Config;
  negotiate: ConnectFn<ClosableSocket>;
  probe: ProbeFn;
  logger: Logger;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

type CommonOpts = { timeout?: string; provider?: string; outgoing?: boolean; json?: boolean };

const parseTimeout = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export function formatNegotiation(result: NegotiationResult<unknown>): string[] {
  if (result.ok) {
    return [`✅ ${result.profileName}: ${result.tlsVersion ?? "?"} ${result.cipherName ?? "?"}`];
  }
  return [
    `❌ ${result.reason}: ${result.message}`,
    ...result.attempts.map((a) => `   [${a.profileName}] ${a.errorClass}${a.code ? ` (${a.code})` : ""}: ${a.message}`),
  ];
}

export function formatProbe(report: ProbeReport): string[] {
  const lines = [`🎯 ${report.host}:${report.port} (${report.protocol})`];
  lines.push(report.tcp.ok ? `✅ TCP in ${report.tcp.elapsedMs}ms` : `❌ TCP: ${report.tcp.message}`);
  for (const v of report.versions) {
    lines.push(v.ok ? `✅ ${v.version}: ${v.cipherName ?? "?"}` : `❌ ${v.version}: ${v.errorClass}`);
  }
  for (const c of report.cipherPolicies) {
    lines.push(c.ok ? `✅ ${c.label}: ${c.cipherName ?? "?"}` : `❌ ${c.label}: ${c.errorClass}`);
  }
  if (report.certificate) {
    const cert = report.certificate;
    lines.push(`📜 ${cert.cn ?? "N/A"} issued by ${cert.issuer ?? "N/A"}, valid to ${cert.notAfter ?? "N/A"}`);
    if (cert.san.length > 0) {
      const more = cert.sanCount > cert.san.length ? ` and ${cert.sanCount - cert.san.length} more` : "";
      lines.push(`   SAN: ${cert.san.join(", ")}${more}`);
    }
  }
  lines.push(`💡 ${report.recommendation.note}`);
  return lines;
}

/**
 * Runs one `mailtls` invocation and resolves to its exit code.
 *
 * `argv` holds the user arguments only (no node binary, no script path).
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  let config: Config | undefined;
  const getConfig = (): Config => {
    config ??= deps.loadConfig();
    deps.logger.level = config.logLevel;
    return config;
  };

  const endpointFor = (host: string | undefined, port: string | undefined, opts: CommonOpts) => {
    const cfg = getConfig();
    const endpoint = resolveEndpoint(
      { host, port, provider: opts.provider, outgoing: opts.outgoing },
      opts.outgoing ? cfg.smtp : cfg.mail
    );
    if ("error" in endpoint) {
      throw new Error(endpoint.error);
    }
    return endpoint;
  };

  const program = new Command();
  program
    .name("mailtls")
    .description("Find the TLS settings a POP3, IMAP or SMTP server accepts")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout(str.trimEnd()),
      writeErr: (str) => deps.stderr(str.trimEnd()),
    });

  program
    .command("negotiate [host] [port]")
    .description("Connect with the first TLS profile the server accepts")
    .option("--profile <selector>", "strict, balanced, legacy, insecure or auto")
    .option("--timeout <ms>", "per-attempt connect and handshake timeout")
    .option("--provider <id>", "take host and port from a provider preset")
    .option("--outgoing", "use the preset's outgoing (SMTP) endpoint")
    .option("--allow-insecure-loopback", "let auto fall back to the insecure profile on loopback hosts")
    .option("--json", "Output result as JSON")
    .action(
      async (
        host: string | undefined,
        port: string | undefined,
        opts: CommonOpts & { profile?: string; allowInsecureLoopback?: boolean }
      ) => {
        const endpoint = endpointFor(host, port, opts);
        const cfg = getConfig();
        const result = await deps.negotiate(endpoint.host, endpoint.port, opts.profile ?? endpoint.profile ?? cfg.defaultProfile, {
          timeoutMs: parseTimeout(opts.timeout, cfg.connectTimeoutMs),
          allowInsecureLoopback: opts.allowInsecureLoopback ?? cfg.allowInsecureLoopback,
          logger: deps.logger,
        });
        if (result.ok) {
          result.connection.destroy();
        }
        if (opts.json) {
          const summary = result.ok
            ? { ok: true, profileName: result.profileName, tlsVersion: result.tlsVersion, cipherName: result.cipherName }
            : result;
          deps.stdout(JSON.stringify(summary, null, 2));
        } else {
          // failures go to stderr, like any other error output
          const write = result.ok ? deps.stdout : deps.stderr;
          formatNegotiation(result).forEach((line) => write(line));
        }
        exitCode = result.ok ? 0 : 1;
      }
    );

  program
    .command("probe [host] [port]")
    .description("Test TCP, each TLS version and each cipher policy, then recommend a profile")
    .option("--timeout <ms>", "per-check connect and handshake timeout")
    .option("--provider <id>", "take host and port from a provider preset")
    .option("--outgoing", "use the preset's outgoing (SMTP) endpoint")
    .option("--json", "Output report as JSON")
    .action(async (host: string | undefined, port: string | undefined, opts: CommonOpts) => {
      const endpoint = endpointFor(host, port, opts);
      const report = await deps.probe(endpoint.host, endpoint.port, {
        timeoutMs: parseTimeout(opts.timeout, getConfig().connectTimeoutMs),
        logger: deps.logger,
      });
      if (opts.json) {
        deps.stdout(JSON.stringify(report, null, 2));
      } else {
        formatProbe(report).forEach((line) => deps.stdout(line));
      }
      exitCode = report.recommendation.profileName ? 0 : 1;
    });

  program
    .command("providers")
    .description("List provider presets")
    .action(() => {
      for (const p of listProviders()) {
        const out = p.outgoing ? `${p.outgoing.host}:${p.outgoing.port}` : "-";
        deps.stdout(`${p.id.padEnd(14)} ${p.incoming.host}:${p.incoming.port}  ${out}  [${p.profile}]`);
      }
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    deps.stderr(`Error: ${errorMessage(err)}`);
    return 1;
  }
  return exitCode;
}
