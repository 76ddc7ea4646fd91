/**
 * Tests for the leg pipelines
 */

import { S3_DEFAULT, S3_STRICT } from '@acquisition/profiles';
import { createStubFetcher } from '$test-utils/fixtures/fetchers';
import {
  FOUR_CELLS,
  FOUR_SENSORS_TENTHS,
  MAIN_PAGE,
  UNEXPECTED_PAGE,
  cellTemperaturePage,
  cellVoltagePage
} from '$test-utils/fixtures/pages';
import {
  EmptySeriesError,
  FieldUnparseableError,
  MalformedDocumentError,
  TransportError
} from '$types/errors';
import { runCellTemperatureLeg, runCellVoltageLeg, runMainLeg } from './legs';

describe('runMainLeg', () => {
  it('should decode the main panel page', async () => {
    const fetcher = createStubFetcher({ 'main_data.shtml': MAIN_PAGE });

    const main = await runMainLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true });

    expect(main).toEqual({
      voltage: 48.5,
      current: 1500,
      stateOfCharge: 65,
      tempAvg: 25,
      tempMin: 21,
      tempMax: 32,
      tempMaster: 40
    });
    expect(fetcher.requested).toEqual(['main_data.shtml']);
  });

  it('should reject pages without the data assignment', async () => {
    const fetcher = createStubFetcher({ 'main_data.shtml': UNEXPECTED_PAGE });

    await expect(runMainLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true }))
      .rejects.toMatchObject({ name: 'MalformedDocumentError', key: 'Parametersatz', reason: 'missing' });
  });

  it('should pass transport failures through', async () => {
    const fetcher = createStubFetcher({});

    await expect(runMainLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true }))
      .rejects.toBeInstanceOf(TransportError);
  });
});

describe('runCellVoltageLeg', () => {
  it('should report topology, cells and overall stats', async () => {
    const fetcher = createStubFetcher({ 'ucell.shtml': cellVoltagePage(FOUR_CELLS) });

    const report = await runCellVoltageLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true });

    expect(report.topology).toEqual({ slaves: 2, cells: 4, cellsPerSlave: 2, tempSensors: 4, safetyResistors: 1 });
    expect(report.cells).toEqual([3300, 3310, 3320, 3330]);
    expect(report.stats).toEqual({
      overall: { avg: 3315, min: 3300, max: 3330, delta: 30 },
      left: null,
      right: null
    });
    expect(report.replaced).toEqual([]);
    expect(report.replacement).toBe(3315);
  });

  it('should replace out-of-fence cells with the raw average', async () => {
    const fetcher = createStubFetcher({ 'ucell.shtml': cellVoltagePage([3000, 4200, 3700, 5000]) });

    const report = await runCellVoltageLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true });

    expect(report.cells).toEqual([3000, 4200, 3700, 3975]);
    expect(report.replaced).toEqual([3]);
    expect(report.replacement).toBe(3975);
    expect(report.stats.overall).toEqual({ avg: 3718, min: 3000, max: 4200, delta: 1200 });
  });

  it('should leave raw values untouched when sanitization is off', async () => {
    const fetcher = createStubFetcher({ 'ucell.shtml': cellVoltagePage([3000, 4200, 3700, 5000]) });

    const report = await runCellVoltageLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: false });

    expect(report.cells).toEqual([3000, 4200, 3700, 5000]);
    expect(report.replaced).toEqual([]);
    expect(report.replacement).toBeNull();
    expect(report.stats.overall).toEqual({ avg: 3975, min: 3000, max: 5000, delta: 2000 });
  });

  it('should apply halves and report fences on the strict profile', async () => {
    const fetcher = createStubFetcher({ 'ucell.shtml': cellVoltagePage([3000, 4200, 3700, 5000]) });

    const report = await runCellVoltageLeg({ fetcher: fetcher, profile: S3_STRICT, sanitize: true });

    expect(report.stats).toEqual({
      overall: { avg: 3718, min: 3700, max: 4200, delta: 500 },
      right: { avg: 3600, min: 4200, max: 4200, delta: 0 },
      left: { avg: 3837, min: 3700, max: 3975, delta: 275 }
    });
  });

  it('should reject an unparseable cell with its wire position', async () => {
    const fetcher = createStubFetcher({ 'ucell.shtml': cellVoltagePage([3300, Number.NaN]) });

    const error = await runCellVoltageLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FieldUnparseableError);
    expect(error).toMatchObject({ field: 'cellVoltage', position: 3, raw: 'NaN' });
  });

  it('should reject a page without topology', async () => {
    const fetcher = createStubFetcher({ 'ucell.shtml': 'var PSet = "9,9,3300";' });

    await expect(runCellVoltageLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true }))
      .rejects.toBeInstanceOf(MalformedDocumentError);
  });
});

describe('runCellTemperatureLeg', () => {
  it('should scale sensor values to degrees', async () => {
    const fetcher = createStubFetcher({ 'tcell.shtml': cellTemperaturePage(FOUR_SENSORS_TENTHS) });

    const report = await runCellTemperatureLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true });

    expect(report.sensors).toEqual([21, 22, 23, 24]);
    expect(report.stats).toEqual({
      overall: { avg: 22.5, min: 21, max: 24, delta: 3 },
      left: null,
      right: null
    });
    expect(report.replaced).toEqual([]);
  });

  it('should replace a disconnected sensor', async () => {
    const fetcher = createStubFetcher({ 'tcell.shtml': cellTemperaturePage([210, 220, -400, 230]) });

    const report = await runCellTemperatureLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true });

    expect(report.sensors).toEqual([21, 22, 6.5, 23]);
    expect(report.replaced).toEqual([2]);
    expect(report.replacement).toBe(6.5);
    expect(report.stats.overall).toEqual({ avg: 18.125, min: 6.5, max: 23, delta: 16.5 });
  });

  it('should split after the first eight sensors', async () => {
    const tenths = [200, 210, 220, 230, 240, 250, 260, 270, 280, 290];
    const fetcher = createStubFetcher({ 'tcell.shtml': cellTemperaturePage(tenths) });

    const report = await runCellTemperatureLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: true });

    expect(report.stats).toEqual({
      overall: { avg: 24.5, min: 20, max: 29, delta: 9 },
      right: { avg: 23.5, min: 20, max: 27, delta: 7 },
      left: { avg: 28.5, min: 28, max: 29, delta: 1 }
    });
  });

  it('should reject a page with no sensors', async () => {
    const fetcher = createStubFetcher({ 'tcell.shtml': 'var PSet = "7";' });

    await expect(runCellTemperatureLeg({ fetcher: fetcher, profile: S3_DEFAULT, sanitize: false }))
      .rejects.toBeInstanceOf(EmptySeriesError);
  });
});
