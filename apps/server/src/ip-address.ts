import net from 'net';

export type IPVersion = 'IPv4' | 'IPv6';

export type IPType = 'private' | 'loopback' | 'multicast' | 'link-local' | 'public';

export interface ParsedIP {
  address: string;
  version: IPVersion;
}

const IPV4_MAPPED_PREFIX = /^::ffff:/i;

function blockList(subnets: Array<[string, number, 'ipv4' | 'ipv6']>): net.BlockList {
  const list = new net.BlockList();
  for (const [address, prefix, family] of subnets) {
    list.addSubnet(address, prefix, family);
  }
  return list;
}

// Checked in this order; the first match wins.
const RANGES: Array<[Exclude<IPType, 'public'>, net.BlockList]> = [
  [
    'private',
    blockList([
      ['10.0.0.0', 8, 'ipv4'],
      ['172.16.0.0', 12, 'ipv4'],
      ['192.168.0.0', 16, 'ipv4'],
      ['fc00::', 7, 'ipv6'],
    ]),
  ],
  [
    'loopback',
    blockList([
      ['127.0.0.0', 8, 'ipv4'],
      ['::1', 128, 'ipv6'],
    ]),
  ],
  [
    'multicast',
    blockList([
      ['224.0.0.0', 4, 'ipv4'],
      ['ff00::', 8, 'ipv6'],
    ]),
  ],
  [
    'link-local',
    blockList([
      ['169.254.0.0', 16, 'ipv4'],
      ['fe80::', 10, 'ipv6'],
    ]),
  ],
];

/**
 * Parse an IP address. IPv4-mapped IPv6 addresses are unwrapped and
 * reported as IPv4.
 */
export function parseIP(text: string): ParsedIP | null {
  const trimmed = text.trim();
  const unwrapped = trimmed.replace(IPV4_MAPPED_PREFIX, '');
  if (unwrapped !== trimmed && net.isIPv4(unwrapped)) {
    return { address: unwrapped, version: 'IPv4' };
  }

  switch (net.isIP(trimmed)) {
    case 4:
      return { address: trimmed, version: 'IPv4' };
    case 6:
      return { address: trimmed, version: 'IPv6' };
    default:
      return null;
  }
}

export function isValidIP(text: string): boolean {
  return parseIP(text) !== null;
}

export function classifyIP(ip: ParsedIP): IPType {
  const family = ip.version === 'IPv4' ? 'ipv4' : 'ipv6';
  for (const [type, list] of RANGES) {
    if (list.check(ip.address, family)) {
      return type;
    }
  }
  return 'public';
}

/**
 * Match an address against a list of IPs and CIDR ranges.
 */
export function matchesAny(ip: ParsedIP, entries: string[]): boolean {
  const family = ip.version === 'IPv4' ? 'ipv4' : 'ipv6';
  return entries.some((entry) => {
    const [network, prefixText] = entry.split('/');
    const parsed = parseIP(network);
    if (!parsed || parsed.version !== ip.version) return false;

    const list = new net.BlockList();
    if (prefixText === undefined) {
      list.addAddress(parsed.address, family);
      return list.check(ip.address, family);
    }

    const prefix = Number(prefixText);
    const maxPrefix = ip.version === 'IPv4' ? 32 : 128;
    if (!Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix) return false;

    list.addSubnet(parsed.address, prefix, family);
    return list.check(ip.address, family);
  });
}
