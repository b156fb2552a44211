import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
});

describe('GET /health', () => {
  it('returns ok payload with a generated request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.ok).toBe(true);
      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('jwt-auth-backend');
      expect(res.headers['x-request-id']).toBe(parsed.requestId);
    } finally {
      await close();
    }
  });

  it('reuses a well-formed incoming x-request-id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'req-abc.123' },
      });

      expect(HealthResponseSchema.parse(res.json()).requestId).toBe('req-abc.123');
      expect(res.headers['x-request-id']).toBe('req-abc.123');
    } finally {
      await close();
    }
  });

  it('replaces a malformed incoming x-request-id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'has spaces/and slashes' },
      });

      expect(HealthResponseSchema.parse(res.json()).requestId).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close();
    }
  });
});
