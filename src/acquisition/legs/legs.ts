/**
 * Leg pipelines
 *
 * Each leg fetches one controller page and runs it through extraction,
 * decoding, optional sanitization and aggregation. A leg either resolves
 * with its part of the snapshot or rejects with the BmsError that stopped
 * it; nothing is retried.
 */

import { decodeRecord, decodeSeries } from '@core/decoder';
import { extractAssignment } from '@core/extractor';
import type { CellTemperatureReport, CellVoltageReport, MainReading, Topology } from '$types/snapshot';
import { reduceSeries } from './helpers';
import type { LegContext } from './types';

/**
 * Main panel: pack voltage, current, state of charge and temperatures
 */
export async function runMainLeg(context: LegContext): Promise<MainReading> {
  const endpoint = context.profile.main;
  const document = await context.fetcher.fetchPage(endpoint.resource);
  const record = decodeRecord(extractAssignment(document, endpoint.key), endpoint.plan);

  return {
    voltage: record.get('voltage'),
    current: record.get('current'),
    stateOfCharge: record.get('stateOfCharge'),
    tempAvg: record.get('tempAvg'),
    tempMin: record.get('tempMin'),
    tempMax: record.get('tempMax'),
    tempMaster: record.get('tempMaster')
  };
}

/**
 * Cell voltages plus controller topology
 *
 * Both assignments live on the same page, so the page is fetched once.
 */
export async function runCellVoltageLeg(context: LegContext): Promise<CellVoltageReport> {
  const endpoint = context.profile.cellVoltage;
  const document = await context.fetcher.fetchPage(endpoint.resource);

  const record = decodeRecord(extractAssignment(document, endpoint.topologyKey), endpoint.topologyPlan);
  const topology: Topology = {
    slaves: record.get('slaves'),
    cells: record.get('cells'),
    cellsPerSlave: record.get('cellsPerSlave'),
    tempSensors: record.get('tempSensors'),
    safetyResistors: record.get('safetyResistors')
  };

  const samples = decodeSeries(extractAssignment(document, endpoint.seriesKey), endpoint.series);
  const reduced = reduceSeries(samples, 'voltage', endpoint.partition, endpoint.policy, context.sanitize);

  return {
    topology: topology,
    cells: reduced.samples,
    stats: reduced.stats,
    replaced: reduced.replaced,
    replacement: reduced.replacement
  };
}

/**
 * Cell temperature sensors
 */
export async function runCellTemperatureLeg(context: LegContext): Promise<CellTemperatureReport> {
  const endpoint = context.profile.cellTemperature;
  const document = await context.fetcher.fetchPage(endpoint.resource);

  const samples = decodeSeries(extractAssignment(document, endpoint.key), endpoint.series);
  const reduced = reduceSeries(samples, 'temperature', endpoint.partition, endpoint.policy, context.sanitize);

  return {
    sensors: reduced.samples,
    stats: reduced.stats,
    replaced: reduced.replaced,
    replacement: reduced.replacement
  };
}
