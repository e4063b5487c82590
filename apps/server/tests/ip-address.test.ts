import { describe, it, expect } from 'vitest';
import { classifyIP, isValidIP, matchesAny, parseIP } from '../src/ip-address.js';

function classify(text: string) {
  const ip = parseIP(text);
  if (!ip) throw new Error(`test address did not parse: ${text}`);
  return classifyIP(ip);
}

describe('parseIP', () => {
  it('should parse IPv4 and IPv6 addresses', () => {
    expect(parseIP('8.8.8.8')).toEqual({ address: '8.8.8.8', version: 'IPv4' });
    expect(parseIP(' 2606:4700:4700::1111 ')).toEqual({ address: '2606:4700:4700::1111', version: 'IPv6' });
  });

  it('should report IPv4-mapped IPv6 addresses as IPv4', () => {
    expect(parseIP('::ffff:192.168.1.10')).toEqual({ address: '192.168.1.10', version: 'IPv4' });
    expect(parseIP('::FFFF:1.2.3.4')).toEqual({ address: '1.2.3.4', version: 'IPv4' });
  });

  it('should reject malformed input', () => {
    expect(parseIP('not-an-ip')).toBeNull();
    expect(parseIP('256.1.1.1')).toBeNull();
    expect(parseIP('1.2.3')).toBeNull();
    expect(parseIP('')).toBeNull();
    expect(isValidIP('example.com')).toBe(false);
    expect(isValidIP('::1')).toBe(true);
  });
});

describe('classifyIP', () => {
  it.each([
    ['10.1.2.3', 'private'],
    ['172.16.0.1', 'private'],
    ['172.31.255.255', 'private'],
    ['192.168.0.1', 'private'],
    ['fd12:3456::1', 'private'],
    ['127.0.0.1', 'loopback'],
    ['::1', 'loopback'],
    ['224.0.0.251', 'multicast'],
    ['ff02::1', 'multicast'],
    ['169.254.10.20', 'link-local'],
    ['fe80::1', 'link-local'],
    ['172.32.0.1', 'public'],
    ['1.1.1.1', 'public'],
    ['2001:4860:4860::8888', 'public'],
  ])('should classify %s as %s', (address, expected) => {
    expect(classify(address)).toBe(expected);
  });
});

describe('matchesAny', () => {
  const entries = ['10.0.0.0/8', '203.0.113.7', '2001:db8::/32'];

  it('should match CIDR ranges and exact addresses', () => {
    expect(matchesAny({ address: '10.20.30.40', version: 'IPv4' }, entries)).toBe(true);
    expect(matchesAny({ address: '203.0.113.7', version: 'IPv4' }, entries)).toBe(true);
    expect(matchesAny({ address: '2001:db8::1', version: 'IPv6' }, entries)).toBe(true);
  });

  it('should not match addresses outside every entry', () => {
    expect(matchesAny({ address: '203.0.113.8', version: 'IPv4' }, entries)).toBe(false);
    expect(matchesAny({ address: '2001:db9::1', version: 'IPv6' }, entries)).toBe(false);
  });

  it('should ignore malformed entries', () => {
    expect(matchesAny({ address: '10.0.0.1', version: 'IPv4' }, ['10.0.0.0/40', 'garbage'])).toBe(false);
  });

  it('should compare IPv6 addresses regardless of notation', () => {
    expect(matchesAny({ address: '::1', version: 'IPv6' }, ['0:0:0:0:0:0:0:1'])).toBe(true);
  });
});
