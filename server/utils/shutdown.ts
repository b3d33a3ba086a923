/**
 * GracefulShutdown — ordered cleanup on SIGINT/SIGTERM.
 *
 * Handlers run in LIFO order so the HTTP listener stops accepting
 * calculations before anything it depends on is released. A timeout keeps
 * a stuck handler from blocking exit.
 *
 * Usage:
 *   const shutdown = createShutdownManager({ timeoutMs: 5_000 })
 *   shutdown.register('http', () => http.stop())
 *   shutdown.installSignalHandlers()
 */

import { errorMessage, logger } from './logger.ts'

const log = logger.child({ component: 'shutdown' })

export type ShutdownFn = () => Promise<void> | void

export interface ShutdownHandler {
  name: string
  fn: ShutdownFn
}

export interface ShutdownOptions {
  timeoutMs?: number
}

export type ShutdownOutcome = 'completed' | 'timed_out' | 'already_running'

export class GracefulShutdown {
  private readonly handlers: ShutdownHandler[] = []
  private inProgress = false
  readonly timeoutMs: number

  constructor(opts: ShutdownOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 10_000
  }

  register(name: string, fn: ShutdownFn): void {
    this.handlers.push({ name, fn })
  }

  get handlerNames(): string[] {
    return this.handlers.map((h) => h.name)
  }

  /**
   * Run every handler, newest first. A failing handler is logged and the
   * rest still run.
   */
  async shutdown(): Promise<ShutdownOutcome> {
    if (this.inProgress) {
      log.warn('Shutdown already in progress, ignoring duplicate call')
      return 'already_running'
    }
    this.inProgress = true

    log.info('Graceful shutdown started', {
      handlerCount: this.handlers.length,
      timeoutMs: this.timeoutMs,
    })

    const runHandlers = async (): Promise<ShutdownOutcome> => {
      for (const handler of [...this.handlers].reverse()) {
        try {
          log.info('Running shutdown handler', { handler: handler.name })
          await handler.fn()
        } catch (err) {
          log.error('Shutdown handler failed', { handler: handler.name, error: errorMessage(err) })
        }
      }
      return 'completed'
    }

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<ShutdownOutcome>((resolve) => {
      timer = setTimeout(() => {
        log.error('Shutdown timed out', { timeoutMs: this.timeoutMs })
        resolve('timed_out')
      }, this.timeoutMs)
    })

    try {
      const outcome = await Promise.race([runHandlers(), timeout])
      log.info('Graceful shutdown finished', { outcome })
      return outcome
    } finally {
      clearTimeout(timer)
    }
  }

  /** SIGTERM/SIGINT start a shutdown; a second signal exits at once. */
  installSignalHandlers(): void {
    let forceExitOnNextSignal = false

    const onSignal = (signal: NodeJS.Signals) => {
      if (forceExitOnNextSignal) {
        log.warn('Received second signal, forcing exit', { signal })
        process.exit(1)
      }
      forceExitOnNextSignal = true
      log.info('Received signal, starting shutdown', { signal })

      this.shutdown()
        .then((outcome) => process.exit(outcome === 'timed_out' ? 1 : 0))
        .catch((err: unknown) => {
          log.error('Shutdown error', { error: errorMessage(err) })
          process.exit(1)
        })
    }

    process.on('SIGTERM', onSignal)
    process.on('SIGINT', onSignal)

    process.on('uncaughtException', (err) => {
      log.error('Uncaught exception, starting shutdown', { error: err.message, stack: err.stack })
      this.shutdown()
        .catch((shutdownErr: unknown) => {
          log.error('Shutdown error', { error: errorMessage(shutdownErr) })
        })
        .finally(() => process.exit(1))
    })
  }
}

export function createShutdownManager(opts?: ShutdownOptions): GracefulShutdown {
  return new GracefulShutdown(opts)
}
