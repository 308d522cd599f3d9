/**
 * Configuration for file output, read from environment variables and
 * validated with Zod.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LEDGER_ATOMIC_WRITES: z
    .enum(['true', 'false'])
    .default('true')
    .transform(v => v === 'true')
})

export type LedgerConfig = z.infer<typeof ConfigSchema>

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is set to an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): LedgerConfig {
  return ConfigSchema.parse(env)
}
