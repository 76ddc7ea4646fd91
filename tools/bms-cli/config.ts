/**
 * Configuration Management
 * Overlays BMS_* environment variables on the built-in defaults
 */

import { fileURLToPath } from 'node:url'

import * as dotenv from 'dotenv'

import CONFIG from '@boot/config'
import { parseLogLevel } from '@logging'
import { parseIntStrict } from '@utils/number'
import { validateConfig } from '@validation'
import type { ValidationResult } from '@validation'
import type { Fence } from '$types/common'
import type { BmsConfig } from '$types/config'

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

/**
 * Load `.env` from the project root
 * ? override:true so .env values take precedence over the shell environment
 */
export function loadEnvFile(): void {
  dotenv.config({
    path: fileURLToPath(new URL('../../.env', import.meta.url)),
    override: true,
  })
}

/**
 * Parse a boolean flag the way operators write them
 */
export function parseBooleanText(text: string): boolean | null {
  const normalized = text.trim().toLowerCase()
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true
  if (['false', '0', 'no', 'off'].includes(normalized)) return false
  return null
}

/**
 * Parse a fence written as `lo,hi`
 */
export function parseFenceText(text: string): Fence | null {
  const parts = text.split(',')
  if (parts.length !== 2) return null

  const lo = Number(parts[0].trim())
  const hi = Number(parts[1].trim())
  if (parts[0].trim() === '' || parts[1].trim() === '' || !Number.isFinite(lo) || !Number.isFinite(hi)) {
    return null
  }
  return { lo, hi }
}

class ConfigManager {
  private config: BmsConfig
  private parseErrors: string[] = []

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(env)
  }

  private loadConfig(env: NodeJS.ProcessEnv): BmsConfig {
    const config: Mutable<BmsConfig> = { ...CONFIG }

    const address = env.BMS_ADDRESS?.trim()
    if (address) config.CONTROLLER_ADDRESS = address

    const profile = env.BMS_PROFILE?.trim()
    if (profile) config.PROFILE = profile

    this.readInteger(env, 'BMS_POLL_RATE_MS', (value) => { config.POLL_RATE_MS = value })
    this.readInteger(env, 'BMS_ABANDON_AFTER_MS', (value) => { config.ABANDON_AFTER_MS = value })
    this.readInteger(env, 'BMS_TIMEOUT_MS', (value) => { config.REQUEST_TIMEOUT_MS = value })

    if (env.BMS_SANITIZE !== undefined && env.BMS_SANITIZE !== '') {
      const sanitize = parseBooleanText(env.BMS_SANITIZE)
      if (sanitize === null) {
        this.parseErrors.push(`BMS_SANITIZE must be true or false (got "${env.BMS_SANITIZE}")`)
      } else {
        config.SANITIZE = sanitize
      }
    }

    this.readFence(env, 'BMS_VOLTAGE_FENCE', (fence) => { config.VOLTAGE_FENCE = fence })
    this.readFence(env, 'BMS_TEMPERATURE_FENCE', (fence) => { config.TEMPERATURE_FENCE = fence })

    if (env.BMS_LOG_LEVEL) {
      try {
        config.GLOBAL_LOG_LEVEL = parseLogLevel(env.BMS_LOG_LEVEL, config.LOG_LEVELS)
      } catch (error) {
        this.parseErrors.push(`BMS_LOG_LEVEL: ${error instanceof Error ? error.message : String(error)}`)
      }
    }

    return config
  }

  private readInteger(env: NodeJS.ProcessEnv, name: string, apply: (value: number) => void): void {
    const raw = env[name]
    if (raw === undefined || raw === '') return

    const value = parseIntStrict(raw)
    if (value === null) {
      this.parseErrors.push(`${name} must be an integer (got "${raw}")`)
      return
    }
    apply(value)
  }

  private readFence(env: NodeJS.ProcessEnv, name: string, apply: (fence: Fence) => void): void {
    const raw = env[name]
    if (raw === undefined || raw === '') return

    const fence = parseFenceText(raw)
    if (fence === null) {
      this.parseErrors.push(`${name} must be written as lo,hi (got "${raw}")`)
      return
    }
    apply(fence)
  }

  get(): BmsConfig {
    return { ...this.config }
  }

  /**
   * Environment parse errors followed by the configuration validator's findings
   */
  validate(): ValidationResult {
    const result = validateConfig(this.config)
    const parseErrors = this.parseErrors.map((message) => ({
      level: 'CRITICAL' as const,
      field: message.split(/[ :]/)[0],
      message,
    }))
    const errors = [...parseErrors, ...result.errors]

    return {
      valid: errors.length === 0,
      errors,
      warnings: result.warnings,
    }
  }
}

export { ConfigManager }
