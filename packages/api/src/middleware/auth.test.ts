import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { createTestApp, TEST_JWT_SECRET } from '../test-helpers.js';

const key = new TextEncoder().encode(TEST_JWT_SECRET);

async function createToken(
  overrides: { sub?: string | null; exp?: number | string; secret?: Uint8Array } = {},
): Promise<string> {
  const jwt = new SignJWT(overrides.sub === null ? {} : { sub: overrides.sub ?? 'analyst-1' })
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuedAt()
    .setExpirationTime(overrides.exp ?? '1h');
  return jwt.sign(overrides.secret ?? key);
}

describe('Auth Middleware', () => {
  const { app } = createTestApp({ jwtSecret: TEST_JWT_SECRET });

  it('should return 401 when Authorization header is missing', async () => {
    const res = await app.request('/sources');

    expect(res.status).toBe(401);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toHaveProperty('code', 'UNAUTHORIZED');
    expect(body).toHaveProperty('error', 'Missing or invalid Authorization header');
  });

  it('should return 401 when Authorization header has wrong format', async () => {
    const res = await app.request('/sources', {
      headers: { Authorization: 'Basic abc123' },
    });

    expect(res.status).toBe(401);
  });

  it('should accept a token signed with the configured secret', async () => {
    const res = await app.request('/sources', {
      headers: { Authorization: `Bearer ${await createToken()}` },
    });

    expect(res.status).toBe(200);
  });

  it('should reject a token signed with another secret', async () => {
    const token = await createToken({ secret: new TextEncoder().encode('other-secret') });
    const res = await app.request('/sources', { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toHaveProperty('error', 'Invalid or expired token');
  });

  it('should reject an expired token', async () => {
    const token = await createToken({ exp: Math.floor(Date.now() / 1000) - 60 });
    const res = await app.request('/sources', { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(401);
  });

  it('should reject a token without a subject', async () => {
    const token = await createToken({ sub: null });
    const res = await app.request('/sources', { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toHaveProperty('error', 'Token missing sub claim');
  });

  it('should leave health and the OpenAPI document open', async () => {
    expect((await app.request('/health')).status).toBe(200);
    expect((await app.request('/openapi.json')).status).toBe(200);
  });
});
