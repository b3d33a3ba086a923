/**
 * HTTP service — serves the calculation API over node:http.
 *
 * Owns the socket concerns only: CORS and security headers, request ids,
 * body size and time limits, JSON parsing and the request log line.
 * Routing and calculation live in routes.ts.
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from 'node:http'
import type { Readable } from 'node:stream'
import type { TaxBenefitSystem } from '../../src/engine/index.ts'
import type { ServerConfig } from '../config.ts'
import { logger } from '../utils/logger.ts'
import type { Log } from '../utils/logger.ts'
import { REQUEST_ID_HEADER, resolveRequestId } from './requestId.ts'
import { allowedMethods, handleApiRequest } from './routes.ts'
import type { ApiResponse } from './routes.ts'
import { corsHeaders, securityHeaders } from './securityHeaders.ts'
import type { HeaderMap } from './securityHeaders.ts'

export type HttpServiceOptions = Pick<
  ServerConfig,
  'port' | 'host' | 'corsOrigins' | 'maxBodyBytes' | 'bodyTimeoutMs'
>

export interface HttpService {
  start(): Promise<void>
  stop(): Promise<void>
  /** The bound port; differs from the configured one when that was 0. */
  readonly port: number
}

export type BodyResult =
  | { kind: 'ok'; text: string }
  | { kind: 'too_large' }
  | { kind: 'timeout' }
  | { kind: 'aborted' }

/** The parts of an incoming request the body reader needs. */
export type BodySource = Readable & { headers: IncomingHttpHeaders }

export type BodyLimits = Pick<ServerConfig, 'maxBodyBytes' | 'bodyTimeoutMs'>

/** Resolves once the body is in, too large, too slow, or the stream failed. */
export function readBody(req: BodySource, limits: BodyLimits): Promise<BodyResult> {
  const declared = req.headers['content-length']
  if (declared !== undefined && Number.parseInt(declared, 10) > limits.maxBodyBytes) {
    req.resume()
    return Promise.resolve({ kind: 'too_large' })
  }

  return new Promise((resolve) => {
    const chunks: Buffer[] = []
    let size = 0
    let settled = false

    const settle = (result: BodyResult) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      resolve(result)
    }

    const timer = setTimeout(() => settle({ kind: 'timeout' }), limits.bodyTimeoutMs)

    req.on('data', (chunk: Buffer) => {
      if (settled) return
      size += chunk.length
      if (size > limits.maxBodyBytes) {
        settle({ kind: 'too_large' })
        return
      }
      chunks.push(chunk)
    })
    req.on('end', () => settle({ kind: 'ok', text: Buffer.concat(chunks).toString('utf8') }))
    req.on('error', () => settle({ kind: 'aborted' }))
    // A client that hangs up mid-body closes the stream without 'end'.
    req.on('close', () => settle({ kind: 'aborted' }))
  })
}

export function createHttpService<P>(
  system: TaxBenefitSystem<P>,
  options: HttpServiceOptions,
  baseLog: Log = logger,
): HttpService {
  const log = baseLog.child({ component: 'http' })
  let boundPort = options.port

  function send(res: ServerResponse, headers: HeaderMap, response: ApiResponse): void {
    if (res.headersSent) return
    for (const [name, value] of Object.entries(headers)) res.setHeader(name, value)
    res.writeHead(response.status, { 'Content-Type': 'application/json; charset=utf-8' })
    res.end(JSON.stringify(response.body))
  }

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now()
    const requestId = resolveRequestId(req.headers[REQUEST_ID_HEADER])
    const url = new URL(req.url ?? '/', 'http://localhost')
    const method = req.method ?? 'GET'
    const requestLog = log.child({ requestId })

    res.setHeader('X-Request-Id', requestId)
    res.on('finish', () => {
      requestLog.info('request', {
        method,
        path: url.pathname,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      })
    })

    const cors = corsHeaders(req.headers.origin, options.corsOrigins)
    const headers: HeaderMap = { ...securityHeaders(req.headers.host), ...cors }

    if (cors === null) {
      req.resume()
      send(res, headers, { status: 403, body: { error: 'origin_not_allowed' } })
      return
    }

    if (method === 'OPTIONS') {
      for (const [name, value] of Object.entries(headers)) res.setHeader(name, value)
      res.writeHead(204)
      res.end()
      return
    }

    let body: unknown
    if (method === 'POST') {
      const result = await readBody(req, options)
      if (result.kind === 'aborted') {
        requestLog.debug('Request aborted while reading the body', { method, path: url.pathname })
        req.destroy()
        return
      }
      if (result.kind === 'too_large') {
        send(res, { ...headers, Connection: 'close' }, { status: 413, body: { error: 'payload_too_large' } })
        req.destroy()
        return
      }
      if (result.kind === 'timeout') {
        send(res, { ...headers, Connection: 'close' }, { status: 408, body: { error: 'request_timeout' } })
        req.destroy()
        return
      }
      try {
        body = JSON.parse(result.text)
      } catch {
        send(res, headers, { status: 400, body: { error: 'invalid_json' } })
        return
      }
    }

    const response = handleApiRequest(
      { system, log: requestLog },
      { method, path: url.pathname, query: url.searchParams, body },
    )
    if (response.status === 405) {
      headers.Allow = [...new Set(allowedMethods(url.pathname)), 'OPTIONS'].join(', ')
    }
    send(res, headers, response)
  }

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      log.error('Request failed', { error: err instanceof Error ? err.message : String(err) })
      send(res, {}, { status: 500, body: { error: 'internal_error' } })
    })
  })
  server.requestTimeout = options.bodyTimeoutMs + 5_000

  return {
    start() {
      return new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(options.port, options.host, () => {
          server.off('error', reject)
          const addr = server.address()
          if (addr && typeof addr === 'object') boundPort = addr.port
          log.info('Listening', { host: options.host, port: boundPort })
          resolve()
        })
      })
    },
    stop() {
      return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
        server.closeAllConnections()
      })
    },
    get port() {
      return boundPort
    },
  }
}
