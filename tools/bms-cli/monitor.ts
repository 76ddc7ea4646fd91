#!/usr/bin/env node
/**
 * BMS Monitor
 * Polls a controller's web panel and prints sanitized snapshots
 */

import chalk, { Chalk } from 'chalk'
import { program } from 'commander'

import { startAcquisition } from '@acquisition/orchestrator'
import { getProfile, withFences } from '@acquisition/profiles'
import type { FirmwareProfile } from '@acquisition/profiles'
import { createConsoleSink, createLogger } from '@logging'
import type { Logger } from '@logging'
import { createPoller } from '@system/poller'
import type { Poller } from '@system/poller'
import type { AcquisitionError } from '$types'
import type { BmsConfig } from '$types/config'
import type { Snapshot } from '$types/snapshot'

import { ConfigManager, loadEnvFile } from './config'
import { formatFailure, formatSnapshot } from './format'

interface MonitorOptions {
  once?: boolean
  raw?: boolean
  address?: string
  profile?: string
  interval?: string
  timeout?: string
  sanitize: boolean
  logLevel?: string
}

const TICK_INTERVAL_MS = 100

program
  .name('bms-monitor')
  .description('Poll a battery-management controller and print pack, cell and sensor readings')
  .option('-1, --once', 'Fetch a single snapshot and exit')
  .option('-r, --raw', 'Print snapshots as JSON')
  .option('-a, --address <address>', 'Controller host, host:port or URL')
  .option('-p, --profile <name>', 'Firmware profile')
  .option('-i, --interval <ms>', 'Poll rate in milliseconds')
  .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds (0 = none)')
  .option('--no-sanitize', 'Show samples as the controller reports them')
  .option('-l, --log-level <level>', 'Minimum log level (debug, info, warning, critical)')
  .parse(process.argv)

const options = program.opts<MonitorOptions>()

/**
 * Command-line flags take precedence over .env and the shell environment
 */
function overlayFlags(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const merged: NodeJS.ProcessEnv = { ...env }
  if (options.address !== undefined) merged.BMS_ADDRESS = options.address
  if (options.profile !== undefined) merged.BMS_PROFILE = options.profile
  if (options.interval !== undefined) merged.BMS_POLL_RATE_MS = options.interval
  if (options.timeout !== undefined) merged.BMS_TIMEOUT_MS = options.timeout
  if (options.logLevel !== undefined) merged.BMS_LOG_LEVEL = options.logLevel
  if (program.getOptionValueSource('sanitize') === 'cli') {
    merged.BMS_SANITIZE = String(options.sanitize)
  }
  return merged
}

class BmsMonitor {
  private config: BmsConfig
  private profile: FirmwareProfile
  private logger: Logger
  private chalk = new Chalk({ level: process.stdout.isTTY ? chalk.level : 0 })
  private poller?: Poller
  private timer?: NodeJS.Timeout

  constructor(config: BmsConfig) {
    this.config = config
    this.profile = withFences(getProfile(config.PROFILE), {
      voltage: config.VOLTAGE_FENCE ?? undefined,
      temperature: config.TEMPERATURE_FENCE ?? undefined,
    })

    const sink = createConsoleSink(console, {
      colors: config.CONSOLE_COLORS && process.stderr.isTTY === true,
      errorsToStderr: true,
    })
    this.logger = createLogger(
      { level: config.GLOBAL_LOG_LEVEL, demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS },
      { timeSource: () => Date.now() / 1000, sinks: [{ sink, minLevel: config.LOG_LEVELS.DEBUG }] },
      config.LOG_LEVELS,
    )
  }

  /**
   * Single acquisition; resolves to the process exit code
   */
  async runOnce(): Promise<number> {
    const request = startAcquisition(
      {
        address: this.config.CONTROLLER_ADDRESS,
        sanitize: this.config.SANITIZE,
        profile: this.profile,
        timeoutMs: this.config.REQUEST_TIMEOUT_MS,
      },
      { logger: this.logger },
    )

    const result = await request.join()
    if (result.ok) {
      this.printSnapshot(result.snapshot)
      return 0
    }
    this.printFailure(result.error)
    return 1
  }

  watch(): void {
    const poller = createPoller(
      {
        address: this.config.CONTROLLER_ADDRESS,
        sanitize: this.config.SANITIZE,
        profile: this.profile,
        pollRateMs: this.config.POLL_RATE_MS,
        abandonAfterMs: this.config.ABANDON_AFTER_MS,
        requestTimeoutMs: this.config.REQUEST_TIMEOUT_MS,
      },
      {
        logger: this.logger,
        onSnapshot: (snapshot) => this.printSnapshot(snapshot),
        onError: (error) => this.printFailure(error),
      },
    )
    this.poller = poller

    if (!options.raw) {
      console.log(this.chalk.blue(`[MONITOR] Polling ${this.config.CONTROLLER_ADDRESS} every ${this.config.POLL_RATE_MS}ms (Ctrl+C to stop)\n`))
    }

    this.timer = setInterval(() => {
      poller.tick(Date.now()).catch((error: unknown) => {
        this.logger.critical('Poller tick failed: ' + String(error))
      })
    }, TICK_INTERVAL_MS)

    process.on('SIGINT', () => this.shutdown())
    process.on('SIGTERM', () => this.shutdown())
  }

  private printSnapshot(snapshot: Snapshot): void {
    if (options.raw) {
      console.log(JSON.stringify(snapshot))
      return
    }
    console.log(formatSnapshot(snapshot, this.chalk).join('\n') + '\n')
  }

  private printFailure(error: AcquisitionError): void {
    if (options.raw) {
      console.error(JSON.stringify({ error: error.name, leg: error.leg, message: error.message }))
      return
    }
    console.error(formatFailure(error, this.chalk))
  }

  private shutdown(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }

    if (this.poller && !options.raw) {
      const status = this.poller.getStatus()
      console.log(this.chalk.gray(
        `\n[MONITOR] ${status.started} cycles: ${status.succeeded} ok, ${status.failed} failed, ${status.abandoned} abandoned`,
      ))
    }
    process.exit(0)
  }
}

function main(): void {
  loadEnvFile()

  const manager = new ConfigManager(overlayFlags(process.env))
  const result = manager.validate()

  for (const warning of result.warnings) {
    console.error(chalk.yellow(`Warning: ${warning.message}`))
  }
  if (!result.valid) {
    console.error(chalk.red('Invalid configuration:'))
    for (const error of result.errors) {
      console.error(chalk.red(`  ${error.message}`))
    }
    process.exit(1)
  }

  const monitor = new BmsMonitor(manager.get())

  if (options.once) {
    monitor.runOnce()
      .then((code) => { process.exitCode = code })
      .catch((error: unknown) => {
        console.error(chalk.red('Monitor failed:'), error instanceof Error ? error.message : String(error))
        process.exitCode = 1
      })
    return
  }

  monitor.watch()
}

main()
