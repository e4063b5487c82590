export interface GeoInfo {
  country: string;
  country_code: string;
  region: string;
  region_code: string;
  city: string;
  postal: string;
  latitude: number;
  longitude: number;
  timezone: string;
}

export interface ISPInfo {
  provider: string;
  organization: string;
  asn: string;
  asn_name: string;
  domain: string;
}

export interface GeolocationResult {
  geolocation?: GeoInfo;
  isp?: ISPInfo;
}

/**
 * Source of geolocation and network-owner data for one IP.
 */
export interface GeolocationProvider {
  lookup(ip: string, signal: AbortSignal): Promise<GeolocationResult>;
}

export interface IpinfoClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

/** Shape of `GET https://ipinfo.io/{ip}/json`. Every field is optional. */
interface IpinfoResponse {
  ip?: string;
  hostname?: string;
  bogon?: boolean;
  city?: string;
  region?: string;
  country?: string;
  loc?: string;
  org?: string;
  postal?: string;
  timezone?: string;
}

export class GeolocationError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'GeolocationError';
  }
}

function str(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function toIpinfoResponse(body: unknown): IpinfoResponse {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new GeolocationError('Unexpected geolocation response body');
  }
  const record: Record<string, unknown> = { ...body };
  return {
    ip: str(record, 'ip'),
    hostname: str(record, 'hostname'),
    bogon: record.bogon === true,
    city: str(record, 'city'),
    region: str(record, 'region'),
    country: str(record, 'country'),
    loc: str(record, 'loc'),
    org: str(record, 'org'),
    postal: str(record, 'postal'),
    timezone: str(record, 'timezone'),
  };
}

/**
 * Parse ipinfo's `"lat,lng"` location string.
 */
export function parseLocation(loc: string | undefined): { latitude: number; longitude: number } {
  const parts = (loc ?? '').split(',');
  if (parts.length !== 2) return { latitude: 0, longitude: 0 };
  const latitude = Number.parseFloat(parts[0]);
  const longitude = Number.parseFloat(parts[1]);
  return {
    latitude: Number.isFinite(latitude) ? latitude : 0,
    longitude: Number.isFinite(longitude) ? longitude : 0,
  };
}

/**
 * Split ipinfo's `org` field (`"AS13335 Cloudflare, Inc."`) and hostname
 * into ISP details.
 */
export function parseISP(org: string | undefined, hostname: string | undefined): ISPInfo {
  const isp: ISPInfo = { provider: '', organization: org ?? '', asn: '', asn_name: '', domain: '' };

  const parts = (org ?? '').split(/\s+/).filter((part) => part.length > 0);
  if (parts.length > 0 && parts[0].startsWith('AS')) {
    isp.asn = parts[0];
    isp.provider = parts.slice(1).join(' ');
    isp.asn_name = isp.provider;
  } else if (org) {
    isp.provider = org;
  }

  const labels = (hostname ?? '').split('.').filter((label) => label.length > 0);
  if (labels.length >= 2) {
    isp.domain = labels.slice(-2).join('.');
  }

  return isp;
}

export class IpinfoClient implements GeolocationProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: IpinfoClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async lookup(ip: string, signal: AbortSignal): Promise<GeolocationResult> {
    const url = new URL(`${this.options.baseUrl}/${encodeURIComponent(ip)}/json`);
    if (this.options.token) {
      url.searchParams.set('token', this.options.token);
    }

    const response = await this.fetchImpl(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.any([signal, AbortSignal.timeout(this.options.timeoutMs)]),
    });

    if (!response.ok) {
      // release the connection; the error body is not used
      await response.body?.cancel();
      throw new GeolocationError(`geolocation API returned status ${response.status}`, response.status);
    }

    const data = toIpinfoResponse(await response.json());
    if (data.bogon) {
      // reserved ranges: ipinfo has nothing to say about them
      return {};
    }

    return {
      geolocation: {
        country: data.country ?? '',
        // ipinfo.io already returns the 2-letter code
        country_code: data.country ?? '',
        region: data.region ?? '',
        region_code: '',
        city: data.city ?? '',
        postal: data.postal ?? '',
        ...parseLocation(data.loc),
        timezone: data.timezone ?? '',
      },
      isp: parseISP(data.org, data.hostname),
    };
  }
}
