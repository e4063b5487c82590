import { Hono } from 'hono';
import { getClientIp, type ClientIpOptions } from './client-ip.js';
import { MAX_BATCH_IPS } from './config.js';
import { BadRequestError } from './error-handler.js';
import { isValidIP } from './ip-address.js';
import type { AnalysisOptions, BulkAnalysisRequest, IPAnalysisService } from './ip-analysis.js';
import type { AppEnv } from './request-context.js';

const OPTION_KEYS = ['include_geolocation', 'include_security', 'include_dns'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseOptions(value: unknown): AnalysisOptions | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new BadRequestError('Invalid request body');
  }

  const options: AnalysisOptions = {};
  for (const key of OPTION_KEYS) {
    const flag = value[key];
    if (flag === undefined) continue;
    if (typeof flag !== 'boolean') {
      throw new BadRequestError(`Invalid request body: options.${key} must be a boolean`);
    }
    options[key] = flag;
  }
  return options;
}

/**
 * Validate a bulk analysis body. Entries need only be strings here and are
 * kept exactly as sent, so each result carries the submitted target;
 * malformed addresses become failed items in the result.
 */
export function parseBulkAnalysisRequest(body: unknown, maxIps = MAX_BATCH_IPS): BulkAnalysisRequest {
  if (!isRecord(body) || !Array.isArray(body.ips)) {
    throw new BadRequestError('Invalid request body');
  }

  const ips: string[] = [];
  for (const entry of body.ips) {
    if (typeof entry !== 'string') {
      throw new BadRequestError('Invalid request body: ips must be strings');
    }
    ips.push(entry);
  }

  if (ips.length === 0) {
    throw new BadRequestError('No IPs provided');
  }
  if (ips.length > maxIps) {
    throw new BadRequestError(`Too many IPs (maximum ${maxIps})`);
  }

  return { ips, options: parseOptions(body.options) };
}

export function createIPRoutes(service: IPAnalysisService, clientIpOptions: ClientIpOptions) {
  const routes = new Hono<AppEnv>();

  // Caller's own address
  routes.get('/current', async (c) => {
    const ip = getClientIp(c, clientIpOptions);
    if (ip === 'unknown') {
      throw new BadRequestError('Unable to determine client IP address');
    }
    return c.json(await service.analyzeIP(ip, c.get('signal')));
  });

  routes.get('/analyze/:ip', async (c) => {
    const ip = c.req.param('ip');
    if (!isValidIP(ip)) {
      throw new BadRequestError('Invalid IP address format');
    }
    return c.json(await service.analyzeIP(ip, c.get('signal')));
  });

  routes.post('/batch', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new BadRequestError('Invalid request body');
    }

    const request = parseBulkAnalysisRequest(body);
    return c.json(await service.bulkAnalyzeIPs(request, c.get('signal')));
  });

  return routes;
}
