import { buildTaxBenefitSystem, getSupportedTaxYears } from '../src/rules/index.ts'
import { ConfigError, loadConfig } from './config.ts'
import { createHttpService } from './http/httpService.ts'
import { errorMessage, logger } from './utils/logger.ts'
import { createShutdownManager } from './utils/shutdown.ts'

function main(): Promise<void> {
  const config = loadConfig()
  logger.setLevel(config.logLevel)

  const system = buildTaxBenefitSystem()
  const httpService = createHttpService(system, config)

  const shutdown = createShutdownManager({ timeoutMs: config.shutdownTimeoutMs })
  shutdown.register('http', () => httpService.stop())
  shutdown.installSignalHandlers()

  return httpService.start().then(() => {
    logger.info('Server started', {
      port: httpService.port,
      variables: system.variables.names().length,
      taxYears: getSupportedTaxYears(),
      corsOrigins: config.corsOrigins,
      nodeVersion: process.version,
      logLevel: config.logLevel,
    })
  })
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: err.issues })
  } else {
    logger.error('Server failed to start', { error: errorMessage(err) })
  }
  process.exit(1)
})
