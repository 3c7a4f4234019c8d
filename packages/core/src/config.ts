import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { createLogger } from './logger.js'
import type { ChannelInstanceConfig } from './channels/types.js'

const DATA_DIR_NAME = '.calendar-bot'
const CONFIG_FILENAME = 'config.yaml'
const DATABASE_FILENAME = 'calendar.db'

export function findDataDir(): string {
  // Walk up from cwd looking for an existing .calendar-bot/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, DATA_DIR_NAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // None found: default to the project root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, DATA_DIR_NAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(DATA_DIR_NAME)
}

// ─────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────

const channelSchema = z
  .object({
    plugin: z.string().min(1),
    identity: z.string().default(''),
    processing: z.enum(['immediate', 'on_demand']).default('immediate'),
    default: z.boolean().optional(),
  })
  .passthrough()

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

const configSchema = z.object({
  server: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().positive().default(4321),
      publicUrl: z.string().url().optional(),
    })
    .default({}),
  database: z
    .object({
      path: z.string().min(1).optional(),
    })
    .default({}),
  export: z
    .object({
      secret: z.string().default(''),
      maxAgeSeconds: z.number().int().nonnegative().default(900),
    })
    .default({}),
  conversation: z
    .object({
      idleTimeoutMs: z.number().int().positive().default(15 * 60 * 1000),
    })
    .default({}),
  logging: z
    .object({
      level: logLevelSchema.default('info'),
      pretty: z.boolean().default(true),
    })
    .default({}),
  channels: z.record(channelSchema).default({}),
})

type ParsedConfig = z.infer<typeof configSchema>

export interface CalendarConfig {
  dataDir: string
  server: {
    host: string
    port: number
    publicUrl: string
  }
  database: {
    path: string
  }
  export: {
    secret: string
    maxAgeSeconds: number
  }
  conversation: {
    idleTimeoutMs: number
  }
  logging: ParsedConfig['logging']
  channels: Record<string, ChannelInstanceConfig>
}

export interface LoadConfigOptions {
  dataDir?: string
  env?: NodeJS.ProcessEnv
}

// ─────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────

function loadYamlConfig(dataDir: string): unknown {
  const configPath = path.join(dataDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    const parsed: unknown = parse(readFileSync(configPath, 'utf-8'))
    return parsed ?? {}
  } catch (err) {
    createLogger('config').warn(
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }
}

function envInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') return undefined
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`)
  }
  return Number(raw.trim())
}

function toChannelConfigs(
  channels: ParsedConfig['channels'],
): Record<string, ChannelInstanceConfig> {
  const result: Record<string, ChannelInstanceConfig> = {}
  for (const [id, channel] of Object.entries(channels)) {
    result[id] = { ...channel, id }
  }
  return result
}

function resolveDatabasePath(dataDir: string, configured: string | undefined): string {
  if (!configured) return path.join(dataDir, DATABASE_FILENAME)
  if (configured === ':memory:') return configured
  return path.resolve(dataDir, configured)
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Load config.yaml from the data directory, apply env overrides and validate.
 * Throws ConfigError when the result is unusable (no export secret included).
 */
export function loadConfig(options: LoadConfigOptions = {}): CalendarConfig {
  const env = options.env ?? process.env
  const dataDir = options.dataDir ?? env.CALENDAR_BOT_DIR ?? findDataDir()

  const result = configSchema.safeParse(loadYamlConfig(dataDir))
  if (!result.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}: ${formatIssues(result.error)}`)
  }
  const parsed = result.data

  const port = envInteger(env, 'PORT') ?? parsed.server.port
  const secret = env.CALENDAR_BOT_EXPORT_SECRET ?? parsed.export.secret
  if (!secret) {
    throw new ConfigError(
      'export.secret is not set. Add it to config.yaml or set CALENDAR_BOT_EXPORT_SECRET.',
    )
  }

  let level = parsed.logging.level
  if (env.LOG_LEVEL) {
    const override = logLevelSchema.safeParse(env.LOG_LEVEL)
    if (!override.success) {
      throw new ConfigError(`LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')}`)
    }
    level = override.data
  }

  return {
    dataDir,
    server: {
      host: parsed.server.host,
      port,
      publicUrl: env.CALENDAR_BOT_PUBLIC_URL ?? parsed.server.publicUrl ?? `http://localhost:${port}`,
    },
    database: {
      path: resolveDatabasePath(dataDir, parsed.database.path),
    },
    export: {
      secret,
      maxAgeSeconds: envInteger(env, 'CALENDAR_BOT_EXPORT_MAX_AGE') ?? parsed.export.maxAgeSeconds,
    },
    conversation: parsed.conversation,
    logging: { ...parsed.logging, level },
    channels: toChannelConfigs(parsed.channels),
  }
}
