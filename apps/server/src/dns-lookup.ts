import { aggregate } from './aggregator.js';
import type { DnsBackend } from './dns-backend.js';
import { normalizeDomain, validateDomain } from './domain-validator.js';
import { BadRequestError, HttpError } from './error-handler.js';
import { isValidIP } from './ip-address.js';
import { logger } from './logger.js';
import { recordLookup } from './otel-metrics.js';

export const RECORD_TYPES = ['A', 'AAAA', 'MX', 'NS', 'TXT', 'CNAME', 'PTR'] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

/** Types queried by an `ALL` lookup. PTR is excluded: it takes an IP, not a name. */
export const ALL_RECORD_TYPES: readonly RecordType[] = ['A', 'AAAA', 'MX', 'NS', 'TXT', 'CNAME'];

/** Reported when the resolver gives no TTL for a record. */
export const DEFAULT_TTL = 300;

export interface DNSRecord {
  name: string;
  type: RecordType;
  value: string;
  ttl: number;
}

export interface DNSLookupResult {
  domain: string;
  records: DNSRecord[];
  timestamp: string;
  query_time_ms: number;
}

export class UnsupportedRecordTypeError extends BadRequestError {
  constructor(type: string) {
    super(`Unsupported record type: ${type}`);
  }
}

export class DnsLookupError extends HttpError {
  constructor(cause: unknown) {
    super(`DNS lookup failed: ${cause instanceof Error ? cause.message : String(cause)}`, 500);
    this.cause = cause;
  }
}

export function isRecordType(value: string): value is RecordType {
  return (RECORD_TYPES as readonly string[]).includes(value);
}

export class DNSLookupService {
  constructor(private readonly backend: DnsBackend) {}

  /**
   * Look up one record type (or `ALL`) for a domain. `type` is
   * case-insensitive and defaults to `A`.
   */
  async lookup(domain: string, type: string | undefined, signal: AbortSignal): Promise<DNSLookupResult> {
    const start = Date.now();
    const recordType = (type || 'A').trim().toUpperCase();
    const name = this.validateTarget(domain.trim(), recordType);

    let records: DNSRecord[];
    if (recordType === 'ALL') {
      records = await this.lookupAll(name, signal);
    } else if (isRecordType(recordType)) {
      try {
        records = await this.lookupType(name, recordType, signal);
        recordLookup({ kind: 'dns', type: recordType, success: true, durationMs: Date.now() - start });
      } catch (error) {
        recordLookup({ kind: 'dns', type: recordType, success: false, durationMs: Date.now() - start });
        throw new DnsLookupError(error);
      }
    } else {
      throw new UnsupportedRecordTypeError(recordType);
    }

    return {
      domain: name,
      records,
      timestamp: new Date(start).toISOString(),
      query_time_ms: Date.now() - start,
    };
  }

  private validateTarget(domain: string, recordType: string): string {
    if (domain.length === 0) {
      throw new BadRequestError('Domain required');
    }
    if (recordType === 'PTR') {
      if (!isValidIP(domain)) {
        throw new BadRequestError('PTR lookups require an IP address');
      }
      return domain;
    }
    const validation = validateDomain(domain);
    if (!validation.valid) {
      throw new BadRequestError(validation.error);
    }
    return normalizeDomain(domain);
  }

  async lookupType(domain: string, type: RecordType, signal: AbortSignal): Promise<DNSRecord[]> {
    const record = (value: string, ttl = DEFAULT_TTL): DNSRecord => ({ name: domain, type, value, ttl });

    switch (type) {
      case 'A':
        return (await this.backend.resolve4(domain, signal)).map((r) => record(r.address, r.ttl));
      case 'AAAA':
        return (await this.backend.resolve6(domain, signal)).map((r) => record(r.address, r.ttl));
      case 'MX':
        return (await this.backend.resolveMx(domain, signal)).map((mx) => record(`${mx.priority} ${mx.exchange}`));
      case 'NS':
        return (await this.backend.resolveNs(domain, signal)).map((host) => record(host));
      case 'TXT':
        // long TXT values arrive split into 255-byte chunks
        return (await this.backend.resolveTxt(domain, signal)).map((chunks) => record(chunks.join('')));
      case 'CNAME':
        return (await this.backend.resolveCname(domain, signal)).map((target) => record(target));
      case 'PTR':
        return (await this.backend.reverse(domain, signal)).map((host) => record(host));
    }
  }

  /**
   * Query every type in ALL_RECORD_TYPES at once and flatten the answers.
   * A type that fails contributes no records.
   */
  async lookupAll(domain: string, signal: AbortSignal): Promise<DNSRecord[]> {
    const { results, summary } = await aggregate(
      ALL_RECORD_TYPES,
      (type, itemSignal) => this.lookupType(domain, type, itemSignal),
      { concurrency: ALL_RECORD_TYPES.length, signal },
    );

    const records: DNSRecord[] = [];
    for (const result of results) {
      if (result.success) {
        records.push(...result.data);
      } else {
        logger.debug('Record type lookup failed', { domain, type: result.target, reason: result.error });
      }
    }

    recordLookup({ kind: 'dns', type: 'ALL', success: summary.failed < summary.total, durationMs: summary.durationMs });
    return records;
  }
}
