import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { timeout } from 'hono/timeout';
import type { Config } from './config.js';
import { NodeDnsBackend } from './dns-backend.js';
import { DNSLookupService } from './dns-lookup.js';
import { createDNSRoutes } from './dns-routes.js';
import { handleError } from './error-handler.js';
import { IPAnalysisService } from './ip-analysis.js';
import { createIPRoutes } from './ip-routes.js';
import { IpinfoClient } from './ipinfo-client.js';
import { requestDeadline, requestLogger, type AppEnv } from './request-context.js';

const VERSION = '1.0.0';

// Lookups are cancelled at REQUEST_TIMEOUT_MS; the 504 guard fires this much
// later so partial batch results still reach the caller.
const RESPONSE_GRACE_MS = 1_000;

export interface AppServices {
  ipAnalysis: IPAnalysisService;
  dnsLookup: DNSLookupService;
}

/**
 * Wire the production collaborators: ipinfo.io for geolocation and the
 * system resolver for DNS.
 */
export function createServices(config: Config): AppServices {
  const dns = new NodeDnsBackend({ timeoutMs: config.dnsTimeoutMs });
  const geo = new IpinfoClient({
    baseUrl: config.ipinfo.baseUrl,
    token: config.ipinfo.token,
    timeoutMs: config.httpTimeoutMs,
  });

  return {
    ipAnalysis: new IPAnalysisService(geo, dns, { batchConcurrency: config.batchConcurrency }),
    dnsLookup: new DNSLookupService(dns),
  };
}

export function createApp(config: Config, services: AppServices = createServices(config)) {
  const app = new Hono<AppEnv>();
  const startedAt = Date.now();

  app.use('*', requestLogger());
  app.use(
    '/api/*',
    cors({
      origin: config.corsOrigin,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  );
  app.use('/api/*', timeout(config.requestTimeoutMs + RESPONSE_GRACE_MS));
  app.use('/api/*', requestDeadline(config.requestTimeoutMs));

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      version: VERSION,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  app.route(
    '/api/ip',
    createIPRoutes(services.ipAnalysis, {
      trustedProxies: config.trustedProxies,
      isProduction: config.isProduction,
    }),
  );
  app.route('/api/dns', createDNSRoutes(services.dnsLookup));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError((error, c) => handleError(c, error, { isProduction: config.isProduction }));

  return app;
}
