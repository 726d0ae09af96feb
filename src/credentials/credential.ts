export interface Credential {
  id: string;
  /** Display name, never used for lookups */
  label: string;
  /** Bearer token sent to the backend. Never logged. */
  secret: string;
  /** Outbound proxy URL (http, https, socks4, socks5); absent = direct */
  proxy?: string;
  active: boolean;
  lifetimeSuccessCount: number;
  lifetimeErrorCount: number;
  /** Successes attributed to `dailyDate`; stale once the date has passed */
  dailyUsedCount: number;
  /** YYYY-MM-DD the daily count belongs to */
  dailyDate: string;
  lastUsedAt?: string;
  createdAt: string;
  updatedAt: string;
}

export interface DailyUsage {
  count: number;
  date: string;
}

export interface NewCredentialInput {
  label: string;
  secret: string;
  proxy?: string;
  active?: boolean;
}

export interface CredentialPatch {
  label?: string;
  secret?: string;
  /** `null` clears the proxy */
  proxy?: string | null;
  active?: boolean;
}

export function createCredential(
  input: NewCredentialInput,
  id: string,
  now: Date,
  today: string,
): Credential {
  const ts = now.toISOString();
  return {
    id,
    label: input.label,
    secret: input.secret,
    proxy: input.proxy || undefined,
    active: input.active ?? true,
    lifetimeSuccessCount: 0,
    lifetimeErrorCount: 0,
    dailyUsedCount: 0,
    dailyDate: today,
    createdAt: ts,
    updatedAt: ts,
  };
}

/** Keep the first and last four characters of long tokens, hide the rest */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '*'.repeat(secret.length);
  return `${secret.slice(0, 4)}${'*'.repeat(Math.min(secret.length - 8, 12))}${secret.slice(-4)}`;
}

/** Copy of the credential safe to print: the secret is masked */
export function toCredentialView(credential: Credential): Credential {
  return { ...credential, secret: maskSecret(credential.secret) };
}

const PROXY_PROTOCOLS = new Set(['http:', 'https:', 'socks:', 'socks4:', 'socks4a:', 'socks5:', 'socks5h:']);

/** Returns an error message, or null when the proxy URL is usable */
export function checkProxyUrl(proxy: string): string | null {
  let url: URL;
  try {
    url = new URL(proxy);
  } catch {
    return `Invalid proxy URL: ${proxy}`;
  }
  if (!PROXY_PROTOCOLS.has(url.protocol)) {
    return `Unsupported proxy protocol "${url.protocol}" (use http, https, socks4 or socks5)`;
  }
  if (!url.hostname) return `Proxy URL has no host: ${proxy}`;
  return null;
}
