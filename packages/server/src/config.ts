import {LogLevelSchema, type LogLevel} from '@lattice/logging'
import {z} from 'zod'

const integerFromEnv = (schema: z.ZodNumber) =>
  z.preprocess(value => {
    if (typeof value !== 'string' || value.trim().length === 0) {
      return value
    }

    const parsed = Number.parseInt(value, 10)
    return Number.isNaN(parsed) ? value : parsed
  }, schema)

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LATTICE_HOST: z.string().trim().min(1).default('0.0.0.0'),
    LATTICE_PORT: integerFromEnv(z.number().int().gte(0).lte(65_535)).default(3000),
    LATTICE_MAX_HEAD_BYTES: integerFromEnv(z.number().int().positive()).default(16 * 1024),
    LATTICE_MAX_BODY_BYTES: integerFromEnv(z.number().int().gte(0)).default(1024 * 1024),
    LATTICE_LOG_LEVEL: LogLevelSchema.default('info'),
    LATTICE_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict()

export type ServerConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  limits: {
    maxHeadBytes: number
    maxBodyBytes: number
  }
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  LATTICE_HOST: env.LATTICE_HOST,
  LATTICE_PORT: env.LATTICE_PORT,
  LATTICE_MAX_HEAD_BYTES: env.LATTICE_MAX_HEAD_BYTES,
  LATTICE_MAX_BODY_BYTES: env.LATTICE_MAX_BODY_BYTES,
  LATTICE_LOG_LEVEL: env.LATTICE_LOG_LEVEL,
  LATTICE_LOG_REDACT_EXTRA_KEYS: env.LATTICE_LOG_REDACT_EXTRA_KEYS
})

const parseRedactKeys = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.LATTICE_HOST,
    port: parsed.LATTICE_PORT,
    limits: {
      maxHeadBytes: parsed.LATTICE_MAX_HEAD_BYTES,
      maxBodyBytes: parsed.LATTICE_MAX_BODY_BYTES
    },
    logging: {
      level: parsed.LATTICE_LOG_LEVEL,
      redactExtraKeys: parseRedactKeys(parsed.LATTICE_LOG_REDACT_EXTRA_KEYS)
    }
  }
}
