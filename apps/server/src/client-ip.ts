import type { Context } from 'hono';
import { classifyIP, matchesAny, parseIP } from './ip-address.js';
import { logger } from './logger.js';

/**
 * Proxy headers carrying the original client address, in order of preference.
 */
export const CLIENT_IP_HEADERS = [
  'cf-connecting-ip', // Cloudflare
  'true-client-ip', // Cloudflare Enterprise
  'x-real-ip', // nginx
  'x-forwarded-for',
  'x-client-ip', // Apache
  'x-forwarded',
  'x-cluster-client-ip', // GCP load balancer
  'forwarded-for',
  'forwarded', // RFC 7239
] as const;

export interface ClientIpOptions {
  /** IPs or CIDR ranges of reverse proxies whose headers are trusted. */
  trustedProxies: string[];
  isProduction: boolean;
}

/**
 * Pull the address out of one header value. Lists take their first entry;
 * RFC 7239 `Forwarded` takes the `for=` parameter.
 */
export function extractHeaderIp(header: string, value: string): string | null {
  let candidate = value.split(',')[0]?.trim() ?? '';

  if (header === 'forwarded') {
    const match = /(?:^|;)\s*for="?\[?([^\]";]+)\]?"?/i.exec(candidate);
    candidate = match ? match[1].trim() : '';
  }

  const ip = parseIP(candidate);
  return ip ? ip.address : null;
}

/**
 * Whether the socket peer may set proxy headers. With no proxies
 * configured, loopback and private peers are trusted outside production.
 */
export function isTrustedProxy(remoteAddress: string | undefined, options: ClientIpOptions): boolean {
  if (!remoteAddress) return false;
  const peer = parseIP(remoteAddress);
  if (!peer) return false;

  if (options.trustedProxies.length === 0) {
    if (options.isProduction) return false;
    const type = classifyIP(peer);
    return type === 'loopback' || type === 'private';
  }

  return matchesAny(peer, options.trustedProxies);
}

function remoteAddressOf(c: Context): string | undefined {
  // Only set when served by @hono/node-server; app.request() in tests has no socket.
  const env: unknown = c.env;
  if (typeof env !== 'object' || env === null || !('incoming' in env)) return undefined;
  const incoming: unknown = env.incoming;
  if (typeof incoming !== 'object' || incoming === null || !('socket' in incoming)) return undefined;
  const socket: unknown = incoming.socket;
  if (typeof socket !== 'object' || socket === null || !('remoteAddress' in socket)) return undefined;
  return typeof socket.remoteAddress === 'string' ? socket.remoteAddress : undefined;
}

/**
 * Extract and validate client IP from request
 *
 * Proxy headers are only honored when the request comes from a trusted
 * proxy; otherwise the socket address is used. Returns 'unknown' when no
 * valid address is available.
 */
export function getClientIp(c: Context, options: ClientIpOptions): string {
  const remoteAddress = remoteAddressOf(c);
  const present = CLIENT_IP_HEADERS.filter((header) => c.req.header(header));

  if (isTrustedProxy(remoteAddress, options)) {
    for (const header of present) {
      const value = c.req.header(header) ?? '';
      const ip = extractHeaderIp(header, value);
      if (ip) {
        return ip;
      }
      logger.warn('Invalid IP in proxy header', { header, value, remoteAddress });
    }
  } else if (present.length > 0) {
    logger.warn('Proxy headers present but request not from trusted proxy - potential IP spoofing', {
      remoteAddress,
      headers: present,
    });
  }

  if (remoteAddress) {
    const ip = parseIP(remoteAddress);
    if (ip) {
      return ip.address;
    }
    logger.warn('Invalid remote address', { remoteAddress });
  }

  return 'unknown';
}
