/**
 * API routes — request in, status and JSON body out.
 *
 * No sockets here: the HTTP service parses the request and writes the
 * response, which keeps every route testable as a plain function call.
 *
 *   GET  /api/health
 *   GET  /api/variables
 *   GET  /api/variables/:name
 *   GET  /api/parameters?period=2025-01
 *   POST /api/calculate   situation document → filled-in document
 *   POST /api/trace       same, plus the computation tree of each value
 */

import { ZodError } from 'zod'
import { EngineError, Period, describeParameters } from '../../src/engine/index.ts'
import type { TaxBenefitSystem } from '../../src/engine/index.ts'
import {
  calculateSituation,
  describeVariable,
  parseSituation,
  serializeSituation,
  summarizeVariables,
  traceSituation,
} from '../../src/model/index.ts'
import { errorMessage } from '../utils/logger.ts'
import type { Log } from '../utils/logger.ts'

export interface ApiRequest {
  method: string
  path: string
  query: URLSearchParams
  /** Parsed JSON body, for POST requests. */
  body?: unknown
}

export interface ApiResponse {
  status: number
  body: unknown
}

export interface ApiContext<P> {
  system: TaxBenefitSystem<P>
  log: Log
}

type Handler<P> = (ctx: ApiContext<P>, req: ApiRequest, params: string[]) => ApiResponse

interface Route<P> {
  method: 'GET' | 'POST'
  pattern: RegExp
  handler: Handler<P>
}

// ── Handlers ─────────────────────────────────────────────────────

function health<P>(ctx: ApiContext<P>): ApiResponse {
  return ok({ ok: true, variables: ctx.system.variables.names().length })
}

function listVariables<P>(ctx: ApiContext<P>): ApiResponse {
  return ok(summarizeVariables(ctx.system))
}

function getVariable<P>(ctx: ApiContext<P>, _req: ApiRequest, [name]: string[]): ApiResponse {
  if (!ctx.system.variables.has(name)) {
    return fail(404, 'unknown_variable', `Variable "${name}" is not registered`)
  }
  return ok(describeVariable(ctx.system.variables.get(name)))
}

function getParameters<P>(ctx: ApiContext<P>, req: ApiRequest): ApiResponse {
  const key = req.query.get('period')
  if (!key) return fail(400, 'missing_period', 'Query parameter "period" is required (YYYY or YYYY-MM)')
  const period = Period.parse(key)
  return ok({ period: period.toString(), parameters: describeParameters(ctx.system.parameters.at(period)) })
}

function calculate<P>(ctx: ApiContext<P>, req: ApiRequest): ApiResponse {
  const situation = parseSituation(req.body)
  return ok(serializeSituation(calculateSituation(ctx.system, situation)))
}

function trace<P>(ctx: ApiContext<P>, req: ApiRequest): ApiResponse {
  const situation = parseSituation(req.body)
  const result = traceSituation(ctx.system, situation)
  return ok({ situation: serializeSituation(result.situation), traces: result.traces })
}

function routes<P>(): Route<P>[] {
  return [
    { method: 'GET', pattern: /^\/api\/health$/, handler: health },
    { method: 'GET', pattern: /^\/api\/variables$/, handler: listVariables },
    { method: 'GET', pattern: /^\/api\/variables\/([^/]+)$/, handler: getVariable },
    { method: 'GET', pattern: /^\/api\/parameters$/, handler: getParameters },
    { method: 'POST', pattern: /^\/api\/calculate$/, handler: calculate },
    { method: 'POST', pattern: /^\/api\/trace$/, handler: trace },
  ]
}

// ── Dispatch ─────────────────────────────────────────────────────

export function handleApiRequest<P>(ctx: ApiContext<P>, req: ApiRequest): ApiResponse {
  const table = routes<P>()
  const matches = table
    .map((route) => ({ route, match: route.pattern.exec(req.path) }))
    .filter((m) => m.match !== null)

  if (matches.length === 0) return fail(404, 'not_found', `No route for ${req.path}`)

  const found = matches.find((m) => m.route.method === req.method)
  if (!found?.match) {
    return fail(405, 'method_not_allowed', `${req.method} is not allowed on ${req.path}`)
  }

  try {
    const params = found.match.slice(1).map((p) => decodeURIComponent(p))
    return found.route.handler(ctx, req, params)
  } catch (err) {
    return errorResponse(ctx.log, req, err)
  }
}

/** Methods the path accepts, for the `Allow` header of a 405. */
export function allowedMethods(path: string): string[] {
  return routes()
    .filter((route) => route.pattern.test(path))
    .map((route) => route.method)
}

// ── Errors ───────────────────────────────────────────────────────

function errorResponse(log: Log, req: ApiRequest, err: unknown): ApiResponse {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'invalid_situation',
        issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    }
  }
  if (err instanceof EngineError) {
    const status = err.code === 'unknown_parameter' ? 404 : 400
    log.info('Calculation rejected', { path: req.path, code: err.code, error: err.message })
    return fail(status, err.code, err.message)
  }
  if (err instanceof URIError) return fail(400, 'invalid_path', err.message)
  log.error('Unhandled error in route', { path: req.path, error: errorMessage(err) })
  return fail(500, 'internal_error', 'Internal server error')
}

function ok(body: unknown): ApiResponse {
  return { status: 200, body }
}

function fail(status: number, error: string, message: string): ApiResponse {
  return { status, body: { error, message } }
}
