/**
 * Environment-driven defaults, validated once.
 *
 * Read lazily on first use so tests can call `loadConfig` with their own
 * environment. An invalid value throws naming the offending variable.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogThreshold = (typeof LOG_LEVELS)[number]

const envSchema = z.object({
  SLICEWISE_N_JOBS: z.coerce
    .number()
    .int('must be an integer')
    .refine((n) => n !== 0, 'must be non-zero')
    .default(1),
  SLICEWISE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
})

/** Resolved runtime configuration. */
export interface SlicewiseConfig {
  /** Default job count for ensembles that do not pass one. */
  nJobs: number
  logLevel: LogThreshold
}

/** Raised when an environment variable holds an unusable value. */
export class EnvironmentError extends Error {
  constructor(
    public readonly variable: string,
    detail: string,
  ) {
    super(`Invalid environment variable ${variable}: ${detail}`)
    this.name = 'EnvironmentError'
  }
}

type Env = Record<string, string | undefined>

/** Parse configuration from an environment map (defaults to `process.env`). */
export function loadConfig(env: Env = process.env): SlicewiseConfig {
  const result = envSchema.safeParse({
    SLICEWISE_N_JOBS: emptyToUndefined(env.SLICEWISE_N_JOBS),
    SLICEWISE_LOG_LEVEL: emptyToUndefined(env.SLICEWISE_LOG_LEVEL),
  })
  if (!result.success) {
    const issue = result.error.issues[0]
    const variable = issue?.path[0]
    throw new EnvironmentError(
      typeof variable === 'string' ? variable : 'SLICEWISE_*',
      issue?.message ?? 'invalid value',
    )
  }
  return {
    nJobs: result.data.SLICEWISE_N_JOBS,
    logLevel: result.data.SLICEWISE_LOG_LEVEL,
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}

let cached: SlicewiseConfig | null = null

/** Process-wide configuration, parsed from `process.env` on first call. */
export function getConfig(): SlicewiseConfig {
  cached ??= loadConfig()
  return cached
}

/** Forget the cached configuration so the next `getConfig` re-reads the environment. */
export function resetConfig(): void {
  cached = null
}
