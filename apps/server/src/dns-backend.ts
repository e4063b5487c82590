import { promises as dnsPromises, type MxRecord, type RecordWithTtl } from 'dns';

/**
 * Operating-system DNS resolution used by the lookup and IP analysis
 * services. Every call takes the request's abort signal.
 */
export interface DnsBackend {
  resolve4(hostname: string, signal: AbortSignal): Promise<RecordWithTtl[]>;
  resolve6(hostname: string, signal: AbortSignal): Promise<RecordWithTtl[]>;
  resolveMx(hostname: string, signal: AbortSignal): Promise<MxRecord[]>;
  resolveNs(hostname: string, signal: AbortSignal): Promise<string[]>;
  resolveTxt(hostname: string, signal: AbortSignal): Promise<string[][]>;
  resolveCname(hostname: string, signal: AbortSignal): Promise<string[]>;
  reverse(ip: string, signal: AbortSignal): Promise<string[]>;
}

export interface NodeDnsBackendOptions {
  timeoutMs: number;
  /** Nameservers to query instead of the system ones. */
  servers?: string[];
}

export class NodeDnsBackend implements DnsBackend {
  constructor(private readonly options: NodeDnsBackendOptions) {}

  /**
   * Each query gets its own Resolver so that aborting one request cancels
   * only its own outstanding queries.
   */
  private async withResolver<T>(signal: AbortSignal, query: (resolver: dnsPromises.Resolver) => Promise<T>): Promise<T> {
    signal.throwIfAborted();

    const resolver = new dnsPromises.Resolver({ timeout: this.options.timeoutMs, tries: 2 });
    if (this.options.servers && this.options.servers.length > 0) {
      resolver.setServers(this.options.servers);
    }

    const onAbort = () => resolver.cancel();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await query(resolver);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  resolve4(hostname: string, signal: AbortSignal): Promise<RecordWithTtl[]> {
    return this.withResolver(signal, (resolver) => resolver.resolve4(hostname, { ttl: true }));
  }

  resolve6(hostname: string, signal: AbortSignal): Promise<RecordWithTtl[]> {
    return this.withResolver(signal, (resolver) => resolver.resolve6(hostname, { ttl: true }));
  }

  resolveMx(hostname: string, signal: AbortSignal): Promise<MxRecord[]> {
    return this.withResolver(signal, (resolver) => resolver.resolveMx(hostname));
  }

  resolveNs(hostname: string, signal: AbortSignal): Promise<string[]> {
    return this.withResolver(signal, (resolver) => resolver.resolveNs(hostname));
  }

  resolveTxt(hostname: string, signal: AbortSignal): Promise<string[][]> {
    return this.withResolver(signal, (resolver) => resolver.resolveTxt(hostname));
  }

  resolveCname(hostname: string, signal: AbortSignal): Promise<string[]> {
    return this.withResolver(signal, (resolver) => resolver.resolveCname(hostname));
  }

  reverse(ip: string, signal: AbortSignal): Promise<string[]> {
    return this.withResolver(signal, (resolver) => resolver.reverse(ip));
  }
}
