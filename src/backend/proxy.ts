import { ProxyAgent, type Dispatcher } from 'undici';
import { socksDispatcher } from 'fetch-socks';

/**
 * Build an undici dispatcher for a credential's proxy URL.
 * http/https go through CONNECT; socks4/socks5 through fetch-socks.
 */
export function createProxyDispatcher(proxy: string): Dispatcher {
  const url = new URL(proxy);
  const protocol = url.protocol.replace(/:$/, '');

  switch (protocol) {
    case 'http':
    case 'https':
      return new ProxyAgent(proxy);
    case 'socks':
    case 'socks5':
    case 'socks5h':
    case 'socks4':
    case 'socks4a':
      return socksDispatcher({
        type: protocol.startsWith('socks4') ? 4 : 5,
        host: url.hostname,
        port: url.port ? Number(url.port) : 1080,
        userId: url.username ? decodeURIComponent(url.username) : undefined,
        password: url.password ? decodeURIComponent(url.password) : undefined,
      });
    default:
      throw new Error(`Unsupported proxy protocol: ${url.protocol}`);
  }
}

/** Strip credentials from a proxy URL before it goes into a log line */
export function redactProxy(proxy: string): string {
  try {
    const url = new URL(proxy);
    return `${url.protocol}//${url.host}`;
  } catch {
    return '<invalid proxy>';
  }
}
