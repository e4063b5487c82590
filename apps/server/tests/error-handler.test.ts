import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  BadRequestError,
  getErrorStatusCode,
  handleError,
  HttpError,
  sanitizeErrorMessage,
} from '../src/error-handler.js';

describe('getErrorStatusCode', () => {
  it('should use the status carried by the error', () => {
    expect(getErrorStatusCode(new BadRequestError('Domain required'))).toBe(400);
    expect(getErrorStatusCode(new HttpError('upstream', 502))).toBe(502);
    expect(getErrorStatusCode(new HTTPException(504))).toBe(504);
  });

  it('should treat anything else as a 500', () => {
    expect(getErrorStatusCode(new Error('boom'))).toBe(500);
    expect(getErrorStatusCode('boom')).toBe(500);
  });
});

describe('sanitizeErrorMessage', () => {
  it('should always show client error messages', () => {
    expect(sanitizeErrorMessage(new Error('No IPs provided'), 400, true)).toBe('No IPs provided');
  });

  it('should hide server error messages in production', () => {
    expect(sanitizeErrorMessage(new Error('socket hang up'), 500, true)).toBe('An error occurred');
    expect(sanitizeErrorMessage(new Error('socket hang up'), 500, false)).toBe('socket hang up');
  });

  it('should use the default message when the error has none', () => {
    expect(sanitizeErrorMessage(new Error(''), 400, false, 'Bad input')).toBe('Bad input');
  });
});

describe('handleError', () => {
  it('should answer with the status and a JSON error body', async () => {
    const app = new Hono();
    app.get('/fail', () => {
      throw new BadRequestError('Invalid IP address format');
    });
    app.onError((error, c) => handleError(c, error, { isProduction: true }));

    const res = await app.request('/fail');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid IP address format' });
  });
});
