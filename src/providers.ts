import type { MailProtocol, ProfileSelector } from "./types.js";

export type Endpoint = {
  host: string;
  port: number;
  protocol: MailProtocol;
};

export type ProviderPreset = {
  id: string;
  label: string;
  incoming: Endpoint;
  outgoing: Endpoint | null; // null when the provider only offers STARTTLS submission
  profile: ProfileSelector;
  notes?: string;
};

// Implicit-TLS endpoints only.
const PRESETS: readonly ProviderPreset[] = [
  {
    id: "gmail",
    label: "Gmail",
    incoming: { host: "pop.gmail.com", port: 995, protocol: "pop3" },
    outgoing: { host: "smtp.gmail.com", port: 465, protocol: "smtp" },
    profile: "auto",
    notes: "POP must be enabled in settings; use an app password",
  },
  {
    id: "outlook",
    label: "Outlook / Microsoft 365",
    incoming: { host: "outlook.office365.com", port: 995, protocol: "pop3" },
    outgoing: null,
    profile: "strict",
    notes: "SMTP submission is STARTTLS on 587 only",
  },
  {
    id: "yahoo",
    label: "Yahoo Mail",
    incoming: { host: "pop.mail.yahoo.com", port: 995, protocol: "pop3" },
    outgoing: { host: "smtp.mail.yahoo.com", port: 465, protocol: "smtp" },
    profile: "auto",
  },
  {
    id: "zoho",
    label: "Zoho Mail",
    incoming: { host: "pop.zoho.com", port: 995, protocol: "pop3" },
    outgoing: { host: "smtp.zoho.com", port: 465, protocol: "smtp" },
    profile: "auto",
  },
  {
    id: "icloud",
    label: "iCloud Mail",
    incoming: { host: "imap.mail.me.com", port: 993, protocol: "imap" },
    outgoing: null,
    profile: "auto",
    notes: "no POP3; SMTP submission is STARTTLS on 587",
  },
  {
    id: "proton-bridge",
    label: "Proton Mail Bridge",
    incoming: { host: "127.0.0.1", port: 1143, protocol: "imap" },
    outgoing: { host: "127.0.0.1", port: 1025, protocol: "smtp" },
    profile: "insecure",
    notes: "Bridge serves a self-signed certificate on loopback; set its security to SSL",
  },
];

export function listProviders(): readonly ProviderPreset[] {
  return PRESETS;
}

export function getProvider(id: string): ProviderPreset | undefined {
  const key = id.trim().toLowerCase();
  return PRESETS.find((p) => p.id === key);
}

export type EndpointRequest = {
  host?: string;
  port?: string;
  provider?: string;
  outgoing?: boolean;
};

/**
 * Picks the endpoint to test: explicit host and port win over a provider
 * preset, which wins over the configured defaults.
 */
export function resolveEndpoint(
  req: EndpointRequest,
  defaults: { host?: string; port: number }
): { host: string; port: number; profile?: ProfileSelector } | { error: string } {
  let preset: Endpoint | null = null;
  let profile: ProfileSelector | undefined;
  if (req.provider) {
    const provider = getProvider(req.provider);
    if (!provider) {
      return { error: `unknown provider "${req.provider}"` };
    }
    preset = req.outgoing ? provider.outgoing : provider.incoming;
    if (!preset) {
      return { error: `${provider.label} has no implicit-TLS ${req.outgoing ? "outgoing" : "incoming"} endpoint` };
    }
    profile = provider.profile;
  }

  const host = req.host || preset?.host || defaults.host;
  if (!host) {
    return { error: "no host given and no default host is configured" };
  }
  const port = req.port !== undefined ? Number(req.port) : preset?.port ?? defaults.port;
  return { host, port, profile };
}
