import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

const HEADER = 'X-Request-Id';
const MAX_LENGTH = 128;

/** Reuses a caller-supplied request id when it looks sane, otherwise mints one. */
export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const supplied = c.req.header(HEADER);
  const id = supplied && supplied.length <= MAX_LENGTH && /^[\w.:-]+$/.test(supplied) ? supplied : randomUUID();
  c.set('requestId', id);
  c.set('subject', 'anonymous');
  await next();
  c.header(HEADER, id);
});
