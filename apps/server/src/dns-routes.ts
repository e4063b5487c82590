import { Hono } from 'hono';
import type { DNSLookupService } from './dns-lookup.js';
import { BadRequestError } from './error-handler.js';
import type { AppEnv } from './request-context.js';

export function createDNSRoutes(service: DNSLookupService) {
  const routes = new Hono<AppEnv>();

  routes.get('/lookup', async (c) => {
    const domain = c.req.query('domain') ?? '';
    if (!domain.trim()) {
      throw new BadRequestError('Domain required');
    }
    return c.json(await service.lookup(domain, c.req.query('type'), c.get('signal')));
  });

  routes.post('/lookup', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new BadRequestError('Invalid JSON request');
    }
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new BadRequestError('Invalid JSON request');
    }

    const domain = 'domain' in body && typeof body.domain === 'string' ? body.domain : '';
    const type = 'type' in body && typeof body.type === 'string' ? body.type : undefined;
    if (!domain.trim()) {
      throw new BadRequestError('Domain required');
    }
    return c.json(await service.lookup(domain, type, c.get('signal')));
  });

  return routes;
}
