import { pino, type Logger, type LoggerOptions } from 'pino'

export type { Logger } from 'pino'

export interface LoggingConfig {
  level: string
  pretty: boolean
}

const DEFAULT_LOGGING: LoggingConfig = {
  level: 'info',
  pretty: true,
}

/**
 * Build pino options shared by component loggers and Fastify.
 * Pretty output goes through the pino-pretty transport.
 */
export function loggerOptions(config: Partial<LoggingConfig> = {}): LoggerOptions {
  const merged = { ...DEFAULT_LOGGING, ...config }
  if (!merged.pretty) {
    return { level: merged.level }
  }
  return {
    level: merged.level,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  }
}

let root: Logger | null = null

/** Configure the process-wide root logger. Call once at startup. */
export function configureLogging(config: Partial<LoggingConfig>): Logger {
  root = pino(loggerOptions(config))
  return root
}

/** Child logger tagged with a component name */
export function createLogger(component: string): Logger {
  if (!root) {
    root = pino({ level: process.env.LOG_LEVEL ?? DEFAULT_LOGGING.level })
  }
  return root.child({ component })
}

/** Logger that discards everything (tests, embedded use) */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
