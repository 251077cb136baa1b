import type { LogLevel } from '@nestjs/common'
import { z } from 'zod'
import type { SensorPackage } from '../types/workout.types'
import { SAMPLE_PACKAGES } from '../workout-summary/sample-packages'
import { sensorPackagesSchema } from '../workout-summary/workout-summary.schema'
import { WorkoutError } from '../workouts/workout.errors'

const LOG_LEVEL_ORDER = ['error', 'warn', 'log', 'debug', 'verbose'] as const satisfies readonly LogLevel[]

const logLevelSchema = z.enum(LOG_LEVEL_ORDER)

export type AppConfig = {
  logLevels: LogLevel[]
  packages: readonly SensorPackage[]
}

export class ConfigError extends WorkoutError {}

function readLogLevels(env: NodeJS.ProcessEnv): LogLevel[] {
  const isProd = (env.NODE_ENV || '').toLowerCase() === 'production'
  const raw = (env.LOG_LEVEL || '').trim().toLowerCase() || (isProd ? 'warn' : 'log')

  const parsed = logLevelSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid LOG_LEVEL "${raw}", expected one of ${LOG_LEVEL_ORDER.join(', ')}`)
  }
  // Every level up to and including the configured one
  return LOG_LEVEL_ORDER.slice(0, LOG_LEVEL_ORDER.indexOf(parsed.data) + 1)
}

function readPackages(env: NodeJS.ProcessEnv): readonly SensorPackage[] {
  const raw = env.WORKOUT_PACKAGES?.trim()
  if (!raw) return SAMPLE_PACKAGES

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(`WORKOUT_PACKAGES is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }

  const parsed = sensorPackagesSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    throw new ConfigError(`WORKOUT_PACKAGES validation failed: ${issues.join('; ')}`)
  }
  return parsed.data
}

export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    logLevels: readLogLevels(env),
    packages: readPackages(env),
  }
}
