import { timingSafeEqual } from 'node:crypto';
import type { AppConfig } from '../config.js';

export type HttpAccessConfig = Pick<AppConfig, 'host' | 'allowedHosts' | 'allowedOrigins' | 'apiKey'>;

export interface AccessDenial {
  status: 401 | 403;
  error: string;
}

export interface AccessRequest {
  host?: string;
  origin?: string;
  authorization?: string;
  /** CORS preflights carry no credentials and skip the key check. */
  preflight: boolean;
}

const LOOPBACK = new Set(['127.0.0.1', 'localhost', '::1']);
const BEARER = /^Bearer\s+(\S+)\s*$/;

const isLoopback = (hostname: string): boolean => LOOPBACK.has(hostname.toLowerCase().replace(/^\[(.*)\]$/, '$1'));

/** A server bound to loopback only answers loopback hosts and origins unless lists are configured. */
const loopbackOnly = (config: HttpAccessConfig): boolean => isLoopback(config.host);

const withoutPort = (host: string): string => {
  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(host);
  return bracketed?.[1] ?? host.replace(/:\d+$/, '');
};

export const isHostAllowed = (hostHeader: string, config: HttpAccessConfig): boolean => {
  const host = hostHeader.trim().toLowerCase();
  if (host.length === 0) {
    return false;
  }

  const hostname = withoutPort(host);
  if (config.allowedHosts.length > 0) {
    return config.allowedHosts.some((allowed) => allowed === host || allowed === hostname);
  }

  return !loopbackOnly(config) || isLoopback(hostname);
};

export const isOriginAllowed = (origin: string | undefined, config: HttpAccessConfig): boolean => {
  if (!origin) {
    return true;
  }
  if (config.allowedOrigins.length > 0) {
    return config.allowedOrigins.includes(origin);
  }
  if (!loopbackOnly(config)) {
    return true;
  }

  try {
    return isLoopback(new URL(origin).hostname);
  } catch {
    return false;
  }
};

export const isAuthorized = (authorization: string | undefined, config: HttpAccessConfig): boolean => {
  if (!config.apiKey) {
    return true;
  }

  const token = BEARER.exec(authorization ?? '')?.[1];
  if (!token) {
    return false;
  }

  const given = Buffer.from(token);
  const expected = Buffer.from(config.apiKey);
  return given.length === expected.length && timingSafeEqual(given, expected);
};

export const checkAccess = (request: AccessRequest, config: HttpAccessConfig): AccessDenial | null => {
  if (!isHostAllowed(request.host ?? '', config)) {
    return { status: 403, error: 'Forbidden host header' };
  }
  if (!isOriginAllowed(request.origin, config)) {
    return { status: 403, error: 'Forbidden origin' };
  }
  if (!request.preflight && !isAuthorized(request.authorization, config)) {
    return { status: 401, error: 'Unauthorized' };
  }
  return null;
};

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Methods': 'GET,POST,DELETE,OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, MCP-Protocol-Version',
  'Access-Control-Expose-Headers': 'MCP-Protocol-Version',
  Vary: 'Origin'
};

/** Echoes the request origin; responses to requests without one are left alone. */
export const withCors = (response: Response, origin: string | undefined): Response => {
  if (origin) {
    response.headers.set('Access-Control-Allow-Origin', origin);
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      response.headers.set(name, value);
    }
  }
  return response;
};
