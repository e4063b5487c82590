import { aggregate, type ItemResult } from './aggregator.js';
import type { DnsBackend } from './dns-backend.js';
import { BadRequestError, HttpError } from './error-handler.js';
import { classifyIP, parseIP, type IPType, type IPVersion, type ParsedIP } from './ip-address.js';
import type { GeoInfo, GeolocationProvider, ISPInfo } from './ipinfo-client.js';
import { logger } from './logger.js';
import { recordBatch, recordLookup } from './otel-metrics.js';

export interface SecInfo {
  is_proxy: boolean;
  is_vpn: boolean;
  is_tor: boolean;
  is_threat: boolean;
  /** 0-100 */
  risk_score: number;
  reputation: 'good' | 'neutral' | 'bad';
}

export interface DNSInfo {
  hostname?: string;
  ptr?: string[];
}

export interface IPInfo {
  ip: string;
  version: IPVersion;
  type: IPType;
  geolocation?: GeoInfo;
  isp?: ISPInfo;
  security?: SecInfo;
  dns?: DNSInfo;
  timestamp: string;
}

export interface AnalysisOptions {
  include_geolocation?: boolean;
  include_security?: boolean;
  include_dns?: boolean;
}

export interface BulkAnalysisRequest {
  ips: string[];
  options?: AnalysisOptions;
}

export interface BulkAnalysisResult {
  results: ItemResult<IPInfo>[];
  summary: {
    total: number;
    successful: number;
    failed: number;
    duration_ms: number;
  };
  timestamp: string;
}

export class InvalidIPError extends BadRequestError {
  constructor(ip: string) {
    super(`invalid IP address: ${ip}`);
  }
}

export class LookupCancelledError extends HttpError {
  constructor() {
    super('lookup cancelled: request deadline exceeded', 504);
  }
}

export interface IPAnalysisServiceOptions {
  /** Simultaneous analyses during a bulk request. */
  batchConcurrency: number;
}

/**
 * Basic heuristics until a reputation source is wired in.
 */
export function getSecurityInfo(type: IPType): SecInfo {
  const security: SecInfo = {
    is_proxy: false,
    is_vpn: false,
    is_tor: false,
    is_threat: false,
    risk_score: 0,
    reputation: 'neutral',
  };
  if (type === 'private') {
    security.risk_score = 10;
    security.reputation = 'good';
  }
  return security;
}

export class IPAnalysisService {
  constructor(
    private readonly geo: GeolocationProvider,
    private readonly dns: DnsBackend,
    private readonly options: IPAnalysisServiceOptions,
  ) {}

  /**
   * Analyze a single IP. Geolocation and reverse DNS are best-effort and
   * simply left out when they fail. Throws for an invalid address, or when
   * `signal` aborted and cut a lookup short.
   */
  async analyzeIP(ipText: string, signal: AbortSignal, options: AnalysisOptions = {}): Promise<IPInfo> {
    const start = Date.now();
    const ip = parseIP(ipText);
    if (!ip) {
      recordLookup({ kind: 'ip', success: false, durationMs: Date.now() - start });
      throw new InvalidIPError(ipText);
    }

    const type = classifyIP(ip);
    const info: IPInfo = {
      ip: ip.address,
      version: ip.version,
      type,
      timestamp: new Date().toISOString(),
    };

    const [geo, dns] = await Promise.allSettled([
      options.include_geolocation === false ? Promise.resolve(undefined) : this.geo.lookup(ip.address, signal),
      options.include_dns === false ? Promise.resolve(undefined) : this.reverseLookup(ip, signal),
    ]);

    if (signal.aborted && (geo.status === 'rejected' || dns.status === 'rejected')) {
      recordLookup({ kind: 'ip', success: false, durationMs: Date.now() - start });
      throw new LookupCancelledError();
    }

    if (geo.status === 'fulfilled') {
      info.geolocation = geo.value?.geolocation;
      info.isp = geo.value?.isp;
    } else {
      logger.debug('Geolocation lookup failed', { ip: ip.address, error: geo.reason });
    }

    if (dns.status === 'fulfilled') {
      info.dns = dns.value;
    } else {
      logger.debug('Reverse DNS lookup failed', { ip: ip.address, error: dns.reason });
    }

    if (options.include_security !== false) {
      info.security = getSecurityInfo(type);
    }

    recordLookup({ kind: 'ip', success: true, durationMs: Date.now() - start });
    return info;
  }

  private async reverseLookup(ip: ParsedIP, signal: AbortSignal): Promise<DNSInfo> {
    const names = await this.dns.reverse(ip.address, signal);
    return { hostname: names[0], ptr: names };
  }

  /**
   * Analyze every IP in the request with bounded concurrency. Invalid or
   * failing IPs show up as failed items; the batch itself always resolves.
   */
  async bulkAnalyzeIPs(request: BulkAnalysisRequest, signal: AbortSignal): Promise<BulkAnalysisResult> {
    const timestamp = new Date().toISOString();
    const { results, summary } = await aggregate(
      request.ips,
      (ip, itemSignal) => this.analyzeIP(ip, itemSignal, request.options),
      { concurrency: this.options.batchConcurrency, signal },
    );

    recordBatch({ size: summary.total, failed: summary.failed, durationMs: summary.durationMs });
    logger.info('Bulk IP analysis completed', {
      total: summary.total,
      successful: summary.successful,
      failed: summary.failed,
      durationMs: Math.round(summary.durationMs),
    });

    return {
      results,
      summary: {
        total: summary.total,
        successful: summary.successful,
        failed: summary.failed,
        duration_ms: summary.durationMs,
      },
      timestamp,
    };
  }
}
