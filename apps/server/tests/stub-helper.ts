import type { MxRecord, RecordWithTtl } from 'dns';
import type { DnsBackend } from '../src/dns-backend.js';
import type { GeolocationProvider, GeolocationResult } from '../src/ipinfo-client.js';

function dnsError(code: string, hostname: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`query ${code} ${hostname}`);
  error.code = code;
  return error;
}

export interface StubZone {
  a?: RecordWithTtl[];
  aaaa?: RecordWithTtl[];
  mx?: MxRecord[];
  ns?: string[];
  txt?: string[][];
  cname?: string[];
}

/**
 * DnsBackend answering from in-memory zones. Missing data rejects with
 * ENODATA, unknown names with ENOTFOUND, like the system resolver.
 */
export class StubDnsBackend implements DnsBackend {
  readonly calls: string[] = [];

  constructor(
    private readonly zones: Record<string, StubZone> = {},
    private readonly ptr: Record<string, string[]> = {},
  ) {}

  private answer<T>(kind: string, hostname: string, pick: (zone: StubZone) => T[] | undefined): Promise<T[]> {
    this.calls.push(`${kind} ${hostname}`);
    const zone = this.zones[hostname];
    if (!zone) return Promise.reject(dnsError('ENOTFOUND', hostname));
    const records = pick(zone);
    if (!records) return Promise.reject(dnsError('ENODATA', hostname));
    return Promise.resolve(records);
  }

  resolve4(hostname: string): Promise<RecordWithTtl[]> {
    return this.answer('A', hostname, (zone) => zone.a);
  }

  resolve6(hostname: string): Promise<RecordWithTtl[]> {
    return this.answer('AAAA', hostname, (zone) => zone.aaaa);
  }

  resolveMx(hostname: string): Promise<MxRecord[]> {
    return this.answer('MX', hostname, (zone) => zone.mx);
  }

  resolveNs(hostname: string): Promise<string[]> {
    return this.answer('NS', hostname, (zone) => zone.ns);
  }

  resolveTxt(hostname: string): Promise<string[][]> {
    return this.answer('TXT', hostname, (zone) => zone.txt);
  }

  resolveCname(hostname: string): Promise<string[]> {
    return this.answer('CNAME', hostname, (zone) => zone.cname);
  }

  reverse(ip: string): Promise<string[]> {
    this.calls.push(`PTR ${ip}`);
    const names = this.ptr[ip];
    return names ? Promise.resolve(names) : Promise.reject(dnsError('ENOTFOUND', ip));
  }
}

/**
 * GeolocationProvider answering from a fixed table; unknown IPs reject.
 */
export class StubGeolocationProvider implements GeolocationProvider {
  readonly calls: string[] = [];

  constructor(private readonly answers: Record<string, GeolocationResult> = {}) {}

  lookup(ip: string): Promise<GeolocationResult> {
    this.calls.push(ip);
    const answer = this.answers[ip];
    return answer ? Promise.resolve(answer) : Promise.reject(new Error(`geolocation API returned status 404`));
  }
}

/**
 * GeolocationProvider whose unknown IPs never answer: the lookup only
 * settles, with a rejection, once its signal aborts.
 */
export class HangingGeolocationProvider implements GeolocationProvider {
  constructor(private readonly answers: Record<string, GeolocationResult> = {}) {}

  lookup(ip: string, signal: AbortSignal): Promise<GeolocationResult> {
    const answer = this.answers[ip];
    if (answer) return Promise.resolve(answer);
    return new Promise<GeolocationResult>((_, reject) => {
      signal.addEventListener('abort', () => reject(new Error('geolocation lookup aborted')), { once: true });
    });
  }
}

export const CLOUDFLARE_GEO: GeolocationResult = {
  geolocation: {
    country: 'US',
    country_code: 'US',
    region: 'California',
    region_code: '',
    city: 'San Francisco',
    postal: '94107',
    latitude: 37.7621,
    longitude: -122.3971,
    timezone: 'America/Los_Angeles',
  },
  isp: {
    provider: 'Cloudflare, Inc.',
    organization: 'AS13335 Cloudflare, Inc.',
    asn: 'AS13335',
    asn_name: 'Cloudflare, Inc.',
    domain: 'one.one',
  },
};

/**
 * Promise whose resolution the test controls.
 */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
