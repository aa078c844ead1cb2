import * as jose from 'jose';
import type { Context, Next } from 'hono';
import { config } from '../../config.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('auth');

export type Role = 'user' | 'admin';

export interface AuthUser {
  id: string;
  role: Role;
}

export type AuthEnv = {
  Variables: {
    user: AuthUser;
  };
};

// Encode the JWT secret as Uint8Array for jose
function getSecretKey(): Uint8Array {
  return new TextEncoder().encode(config.auth.jwtSecret);
}

/**
 * Parse JWT expiry string (e.g., '7d', '24h', '30m') into seconds.
 */
function parseExpiry(expiry: string): number {
  const match = expiry.match(/^(\d+)([smhd])$/);
  if (!match) {
    return 7 * 24 * 60 * 60;
  }

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case 's': return value;
    case 'm': return value * 60;
    case 'h': return value * 60 * 60;
    default: return value * 24 * 60 * 60;
  }
}

export interface TokenPayload {
  sub: string;
  role: Role;
  iat?: number;
  exp?: number;
}

export async function generateToken(userId: string, role: Role = 'user'): Promise<string> {
  const expirySeconds = parseExpiry(config.auth.jwtExpiresIn);

  const token = await new jose.SignJWT({ role })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(userId)
    .setIssuedAt()
    .setExpirationTime(`${expirySeconds}s`)
    .sign(getSecretKey());

  logger.debug('Token generated', { userId, role, expiresIn: config.auth.jwtExpiresIn });
  return token;
}

export async function verifyToken(token: string): Promise<TokenPayload> {
  try {
    const { payload } = await jose.jwtVerify(token, getSecretKey());
    if (!payload.sub) {
      throw new Error('Token has no subject');
    }

    return {
      sub: payload.sub,
      role: payload.role === 'admin' ? 'admin' : 'user',
      iat: payload.iat,
      exp: payload.exp,
    };
  } catch (error) {
    if (error instanceof jose.errors.JWTExpired) {
      throw new Error('Token has expired');
    }
    if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
      throw new Error('Invalid token signature');
    }
    throw new Error('Invalid token');
  }
}

async function authenticate(c: Context<AuthEnv>): Promise<AuthUser | Response> {
  const authHeader = c.req.header('Authorization');

  if (!authHeader) {
    return c.json({ error: 'Authorization header required' }, 401);
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return c.json({ error: 'Authorization header must be: Bearer <token>' }, 401);
  }

  try {
    const payload = await verifyToken(parts[1]);
    return { id: payload.sub, role: payload.role };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Authentication failed';
    logger.warn('Authentication failed', { error: message, path: c.req.path });
    return c.json({ error: message }, 401);
  }
}

/**
 * Hono middleware that requires any valid JWT in the Authorization header.
 */
export async function userAuth(c: Context<AuthEnv>, next: Next): Promise<Response | void> {
  const result = await authenticate(c);
  if (result instanceof Response) return result;

  c.set('user', result);
  await next();
}

/**
 * Hono middleware that requires a valid JWT carrying the admin role.
 */
export async function adminAuth(c: Context<AuthEnv>, next: Next): Promise<Response | void> {
  const result = await authenticate(c);
  if (result instanceof Response) return result;

  if (result.role !== 'admin') {
    logger.warn('Admin route refused', { userId: result.id, path: c.req.path });
    return c.json({ error: 'Admin access required' }, 403);
  }

  c.set('user', result);
  await next();
}
