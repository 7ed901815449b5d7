/**
 * Cross-origin rules shared by the serverless functions and the Express app.
 * A browser origin is let through only when it is a local dev server or the
 * deployment's configured ALLOWED_ORIGIN; anything else gets no
 * Access-Control-Allow-Origin header and the browser blocks the response.
 */

export const DEV_ORIGINS: readonly string[] = [
  'http://localhost:5173',
  'http://localhost:3000',
  'http://127.0.0.1:5173',
  'http://127.0.0.1:3000',
];

const ALLOWED_METHODS = 'GET,POST,OPTIONS';
const ALLOWED_HEADERS = 'Accept, Content-Type, Content-Length, X-Requested-With';
const PREFLIGHT_MAX_AGE_SECONDS = '86400';

/** Echoes `origin` back when it may call the API, else null. */
export function getAllowedOrigin(origin: string | undefined, configuredOrigin: string): string | null {
  if (!origin) return null;
  if (DEV_ORIGINS.includes(origin)) return origin;
  return configuredOrigin !== '' && origin === configuredOrigin ? origin : null;
}

export interface OriginRequest {
  headers: { origin?: string };
}

export interface HeaderSink {
  setHeader(name: string, value: string): unknown;
}

export function setCorsHeaders(req: OriginRequest, res: HeaderSink, configuredOrigin: string): void {
  // the allow-origin header depends on the request, so caches must key on it
  res.setHeader('Vary', 'Origin');

  const origin = getAllowedOrigin(req.headers.origin, configuredOrigin);
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS);
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
    res.setHeader('Access-Control-Max-Age', PREFLIGHT_MAX_AGE_SECONDS);
  }
}

export interface PreflightResponse {
  status(statusCode: number): { end(): unknown };
}

/** Preflight answer; the CORS headers are already set by the caller. */
export function handleOptionsRequest(res: PreflightResponse): void {
  res.status(200).end();
}
