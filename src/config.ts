/**
 * Configuration
 *
 * Environment-driven settings, validated with zod. `loadConfig` is pure over
 * the env record it is given; `loadConfigFromEnvFile` reads a .env file first.
 */

import dotenv from 'dotenv'
import { z } from 'zod'
import { ValidationError } from './errors'
import type { LogLevel } from './logger'

export type ReminderMode = 'recurring' | 'one-shot'

export type TaskpingSettings = {
  databasePath: string
  defaultIntervalMinutes: number
  startDelayMs: number
  reminderMode: ReminderMode
  oneShotLeadMinutes: number
  logLevel: LogLevel
}

export const DEFAULT_SETTINGS: TaskpingSettings = {
  databasePath: 'taskping.db',
  defaultIntervalMinutes: 60,
  startDelayMs: 10_000,
  reminderMode: 'recurring',
  oneShotLeadMinutes: 24 * 60,
  logLevel: 'info',
}

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  TASKPING_DB_PATH: z.string().min(1).default(DEFAULT_SETTINGS.databasePath),
  TASKPING_DEFAULT_INTERVAL_MINUTES: positiveInt.default(DEFAULT_SETTINGS.defaultIntervalMinutes),
  TASKPING_START_DELAY_MS: positiveInt.default(DEFAULT_SETTINGS.startDelayMs),
  TASKPING_REMINDER_MODE: z.enum(['recurring', 'one-shot']).default(DEFAULT_SETTINGS.reminderMode),
  TASKPING_ONE_SHOT_LEAD_MINUTES: positiveInt.default(DEFAULT_SETTINGS.oneShotLeadMinutes),
  TASKPING_LOG_LEVEL: z
    .enum(['debug', 'info', 'warning', 'error', 'fatal'])
    .default(DEFAULT_SETTINGS.logLevel),
})

export function loadConfig(env: Record<string, string | undefined> = process.env): TaskpingSettings {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue ? issue.path.join('.') : 'environment'
    throw new ValidationError(`Invalid ${variable}: ${issue?.message ?? 'invalid value'}`)
  }
  const e = parsed.data
  return {
    databasePath: e.TASKPING_DB_PATH,
    defaultIntervalMinutes: e.TASKPING_DEFAULT_INTERVAL_MINUTES,
    startDelayMs: e.TASKPING_START_DELAY_MS,
    reminderMode: e.TASKPING_REMINDER_MODE,
    oneShotLeadMinutes: e.TASKPING_ONE_SHOT_LEAD_MINUTES,
    logLevel: e.TASKPING_LOG_LEVEL,
  }
}

export function loadConfigFromEnvFile(path?: string): TaskpingSettings {
  dotenv.config(path !== undefined ? { path } : {})
  return loadConfig(process.env)
}
