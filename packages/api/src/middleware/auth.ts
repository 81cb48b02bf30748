import { jwtVerify } from 'jose';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

export interface AuthOptions {
  /** Shared HS256 secret. */
  readonly secret: string;
  readonly issuer?: string;
  readonly audience?: string;
}

export function createAuthMiddleware(options: AuthOptions): ReturnType<typeof createMiddleware<AppEnv>> {
  const key = new TextEncoder().encode(options.secret);

  return createMiddleware<AppEnv>(async (c, next) => {
    const authHeader = c.req.header('Authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      return c.json(
        { error: 'Missing or invalid Authorization header', code: 'UNAUTHORIZED', requestId: c.get('requestId') },
        401,
      );
    }

    const token = authHeader.slice(7);

    const { payload } = await jwtVerify(token, key, {
      algorithms: ['HS256'],
      ...(options.issuer ? { issuer: options.issuer } : {}),
      ...(options.audience ? { audience: options.audience } : {}),
    });

    if (!payload.sub) {
      return c.json({ error: 'Token missing sub claim', code: 'UNAUTHORIZED', requestId: c.get('requestId') }, 401);
    }

    c.set('subject', payload.sub);
    await next();
  });
}
