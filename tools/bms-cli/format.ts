/**
 * Text rendering of snapshots for the terminal
 */

import type { ChalkInstance } from 'chalk'

import { UnexpectedFailureError } from '$types/errors'
import type { AcquisitionError } from '$types'
import type { PartitionedStats, Snapshot } from '$types/snapshot'

interface Stats {
  avg: number
  min: number
  max: number
  delta: number
}

const LABEL_WIDTH = 10
const VALUES_PER_ROW = 8

function label(text: string): string {
  return text.padEnd(LABEL_WIDTH)
}

function statsText(stats: Stats, digits: number, unit: string): string {
  return `avg ${stats.avg.toFixed(digits)}  min ${stats.min.toFixed(digits)}  ` +
    `max ${stats.max.toFixed(digits)}  delta ${stats.delta.toFixed(digits)} ${unit}`
}

function partitionLines(name: string, stats: PartitionedStats<Stats>, digits: number, unit: string): string[] {
  const lines = [label(name) + statsText(stats.overall, digits, unit)]
  if (stats.right) lines.push(label('  right') + statsText(stats.right, digits, unit))
  if (stats.left) lines.push(label('  left') + statsText(stats.left, digits, unit))
  return lines
}

/**
 * Lay a series out in rows, highlighting replaced samples
 */
export function formatSeries(
  values: readonly number[],
  digits: number,
  replaced: readonly number[],
  chalk: ChalkInstance
): string[] {
  const rows: string[] = []
  for (let start = 0; start < values.length; start += VALUES_PER_ROW) {
    let row = '  '
    for (let i = start; i < Math.min(start + VALUES_PER_ROW, values.length); i++) {
      const cell = values[i].toFixed(digits).padStart(6)
      row += replaced.includes(i) ? chalk.yellow(cell) : cell
    }
    rows.push(row)
  }
  return rows
}

/**
 * One-line note about sanitized samples (1-based positions)
 */
export function formatReplacement(
  replaced: readonly number[],
  replacement: number | null,
  digits: number,
  unit: string
): string | null {
  if (replacement === null || replaced.length === 0) {
    return null
  }
  const positions = replaced.map((i) => String(i + 1)).join(', ')
  const noun = replaced.length === 1 ? 'sample' : 'samples'
  return `  replaced ${noun} ${positions} with ${replacement.toFixed(digits)} ${unit}`
}

/**
 * Render a snapshot as terminal lines
 */
export function formatSnapshot(snapshot: Snapshot, chalk: ChalkInstance): string[] {
  const { main, cellVoltage, cellTemperature } = snapshot
  const topology = cellVoltage.topology
  const lines: string[] = []

  lines.push(
    `${chalk.bold(snapshot.address)}  profile ${snapshot.profile}  ` +
    `${snapshot.sanitized ? 'sanitized' : chalk.yellow('raw')}  ${new Date(snapshot.acquiredAt).toISOString()}`
  )
  lines.push(label('Pack') + `${main.voltage.toFixed(2)} V  ${main.current} mA  SoC ${main.stateOfCharge.toFixed(1)} %`)
  lines.push(
    label('Temps') +
    `avg ${main.tempAvg.toFixed(1)}  min ${main.tempMin.toFixed(1)}  max ${main.tempMax.toFixed(1)}  ` +
    `master ${main.tempMaster.toFixed(1)} °C`
  )
  lines.push(
    label('Topology') +
    `${topology.slaves} slaves, ${topology.cells} cells (${topology.cellsPerSlave} per slave), ` +
    `${topology.tempSensors} sensors, ${topology.safetyResistors} safety resistors`
  )

  lines.push(...partitionLines('Cells', cellVoltage.stats, 0, 'mV'))
  const voltageNote = formatReplacement(cellVoltage.replaced, cellVoltage.replacement, 0, 'mV')
  if (voltageNote) lines.push(chalk.yellow(voltageNote))
  lines.push(...formatSeries(cellVoltage.cells, 0, cellVoltage.replaced, chalk))

  lines.push(...partitionLines('Sensors', cellTemperature.stats, 1, '°C'))
  const temperatureNote = formatReplacement(cellTemperature.replaced, cellTemperature.replacement, 1, '°C')
  if (temperatureNote) lines.push(chalk.yellow(temperatureNote))
  lines.push(...formatSeries(cellTemperature.sensors, 1, cellTemperature.replaced, chalk))

  return lines
}

/**
 * Render a failed cycle
 */
export function formatFailure(error: AcquisitionError, chalk: ChalkInstance): string {
  if (error instanceof UnexpectedFailureError) {
    return chalk.red('Unexpected error: ' + error.message)
  }
  return chalk.red(error.message)
}
