/**
 * Security headers and CORS for the JSON API.
 *
 * Both return plain header maps so the route layer stays free of
 * `ServerResponse`; the HTTP service copies them onto the response.
 */

export type HeaderMap = Record<string, string>

// ── CORS ──────────────────────────────────────────────────────────

/**
 * Headers for a cross-origin request, or `null` when the origin is not on
 * the allow-list. Same-origin requests (no Origin header) need none.
 * "*" is not special: every allowed origin is listed explicitly.
 */
export function corsHeaders(origin: string | undefined, allowedOrigins: readonly string[]): HeaderMap | null {
  if (!origin) return {}
  if (!allowedOrigins.includes(origin)) return null
  return {
    'Access-Control-Allow-Origin': origin,
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-Request-Id',
    'Access-Control-Expose-Headers': 'X-Request-Id',
    'Access-Control-Max-Age': '600',
    Vary: 'Origin',
  }
}

// ── Security headers ──────────────────────────────────────────────

function isLocalhost(host: string | undefined): boolean {
  if (!host) return true
  const hostname = host.startsWith('[') ? host.slice(1, host.indexOf(']')) : host.split(':')[0]
  return ['localhost', '127.0.0.1', '::1', '0.0.0.0'].includes(hostname)
}

/** The API only ever answers JSON, so nothing may be loaded or framed. */
const CSP = "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'"

export function securityHeaders(host: string | undefined): HeaderMap {
  const headers: HeaderMap = {
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'no-referrer',
    'Cache-Control': 'no-store',
    'Content-Security-Policy': CSP,
  }
  // Only meaningful behind TLS.
  if (!isLocalhost(host)) {
    headers['Strict-Transport-Security'] = 'max-age=63072000; includeSubDomains'
  }
  return headers
}
