/**
 * Tests for the acquisition orchestrator
 */

import { S3_STRICT } from '@acquisition/profiles';
import { LOG_LEVELS } from '@boot/config';
import { createLogger } from '@logging';
import type { LogSink } from '@logging';
import {
  createLatchedFetcher,
  createStubFetcher,
  flushPromises
} from '$test-utils/fixtures/fetchers';
import {
  FOUR_CELLS,
  FOUR_SENSORS_TENTHS,
  MAIN_PAGE,
  UNEXPECTED_PAGE,
  cellTemperaturePage,
  cellVoltagePage
} from '$test-utils/fixtures/pages';
import {
  FetchFailedError,
  MalformedDocumentError,
  RequestConsumedError,
  TransportError,
  UnexpectedFailureError
} from '$types/errors';
import { startAcquisition, fetchSnapshot } from './orchestrator';

const ACQUIRED_AT = 1700000000000;

const HEALTHY_PAGES: Record<string, string> = {
  'main_data.shtml': MAIN_PAGE,
  'ucell.shtml': cellVoltagePage(FOUR_CELLS),
  'tcell.shtml': cellTemperaturePage(FOUR_SENSORS_TENTHS)
};

describe('startAcquisition', () => {
  describe('readiness', () => {
    it('should report finished only after every leg settles', async () => {
      const fetcher = createLatchedFetcher();
      const request = startAcquisition({ address: 'bms.local', sanitize: true }, { fetcher: fetcher });

      expect(request.isFinished()).toBe(false);
      expect(request.state()).toBe('in-flight');

      fetcher.latch('main_data.shtml').resolve(MAIN_PAGE);
      fetcher.latch('tcell.shtml').resolve(cellTemperaturePage(FOUR_SENSORS_TENTHS));
      await flushPromises();

      expect(request.isFinished()).toBe(false);
      expect(request.legStatus('main')).toBe('fulfilled');
      expect(request.legStatus('cell-voltage')).toBe('pending');
      expect(request.legStatus('cell-temperature')).toBe('fulfilled');

      fetcher.latch('ucell.shtml').resolve(cellVoltagePage(FOUR_CELLS));
      await flushPromises();

      expect(request.isFinished()).toBe(true);
      expect(request.state()).toBe('complete');
    });

    it('should count a rejected leg as finished', async () => {
      const fetcher = createLatchedFetcher();
      const request = startAcquisition({ address: 'bms.local', sanitize: true }, { fetcher: fetcher });

      fetcher.latch('main_data.shtml').reject(new TransportError('http://bms.local/main_data.shtml', 'HTTP 500: Internal Server Error', 500));
      fetcher.latch('ucell.shtml').resolve(cellVoltagePage(FOUR_CELLS));
      fetcher.latch('tcell.shtml').resolve(cellTemperaturePage(FOUR_SENSORS_TENTHS));
      await flushPromises();

      expect(request.isFinished()).toBe(true);
      expect(request.state()).toBe('failed');
      expect(request.legStatus('main')).toBe('rejected');
    });
  });

  describe('join', () => {
    it('should assemble a frozen snapshot', async () => {
      const request = startAcquisition(
        { address: 'bms.local', sanitize: true },
        { fetcher: createStubFetcher(HEALTHY_PAGES), now: () => ACQUIRED_AT }
      );

      const result = await request.join();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const snapshot = result.snapshot;
      expect(snapshot.address).toBe('bms.local');
      expect(snapshot.profile).toBe('s3-default');
      expect(snapshot.sanitized).toBe(true);
      expect(snapshot.acquiredAt).toBe(ACQUIRED_AT);
      expect(snapshot.main.voltage).toBe(48.5);
      expect(snapshot.cellVoltage.cells).toEqual([3300, 3310, 3320, 3330]);
      expect(snapshot.cellTemperature.stats.overall.avg).toBe(22.5);
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.cellVoltage.cells)).toBe(true);
      expect(Object.isFrozen(snapshot.cellTemperature.stats.overall)).toBe(true);
    });

    it('should use the given profile', async () => {
      const request = startAcquisition(
        { address: 'bms.local', sanitize: false, profile: S3_STRICT },
        { fetcher: createStubFetcher(HEALTHY_PAGES) }
      );

      const result = await request.join();

      expect(result.ok && result.snapshot.profile).toBe('s3-strict');
      expect(result.ok && result.snapshot.cellVoltage.stats.right).toEqual({ avg: 3305, min: 3300, max: 3310, delta: 10 });
    });

    it('should report the first failing leg in leg order', async () => {
      const fetcher = createLatchedFetcher();
      const request = startAcquisition({ address: 'bms.local', sanitize: true }, { fetcher: fetcher });

      fetcher.latch('tcell.shtml').reject(new TransportError('http://bms.local/tcell.shtml', 'HTTP 404: Not Found', 404));
      fetcher.latch('main_data.shtml').resolve(MAIN_PAGE);
      fetcher.latch('ucell.shtml').resolve(UNEXPECTED_PAGE);

      const result = await request.join();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(FetchFailedError);
      expect(result.error.leg).toBe('cell-voltage');
      expect(result.error.cause).toBeInstanceOf(MalformedDocumentError);
      expect(result.error.message).toBe('Could not fetch cell-voltage data: Document has no assignment for "PSet0"');
    });

    it('should classify untyped rejections as unexpected failures', async () => {
      const fetcher = createLatchedFetcher();
      const request = startAcquisition({ address: 'bms.local', sanitize: true }, { fetcher: fetcher });

      fetcher.latch('main_data.shtml').reject(new TypeError('boom'));
      fetcher.latch('ucell.shtml').resolve(cellVoltagePage(FOUR_CELLS));
      fetcher.latch('tcell.shtml').resolve(cellTemperaturePage(FOUR_SENSORS_TENTHS));

      const result = await request.join();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UnexpectedFailureError);
      expect(result.error.leg).toBe('main');
      expect(result.error.message).toBe('Unexpected failure in main leg: TypeError: boom');
    });

    it('should wait for every leg even when one fails early', async () => {
      const fetcher = createLatchedFetcher();
      const request = startAcquisition({ address: 'bms.local', sanitize: true }, { fetcher: fetcher });
      let settled = false;
      const joining = request.join().then((result) => {
        settled = true;
        return result;
      });

      fetcher.latch('main_data.shtml').reject(new TransportError('http://bms.local/main_data.shtml', 'HTTP 503: Service Unavailable', 503));
      await flushPromises();
      expect(settled).toBe(false);

      fetcher.latch('ucell.shtml').resolve(cellVoltagePage(FOUR_CELLS));
      fetcher.latch('tcell.shtml').resolve(cellTemperaturePage(FOUR_SENSORS_TENTHS));
      const result = await joining;

      expect(settled).toBe(true);
      expect(result.ok).toBe(false);
    });

    it('should refuse a second join', async () => {
      const request = startAcquisition(
        { address: 'bms.local', sanitize: true },
        { fetcher: createStubFetcher(HEALTHY_PAGES) }
      );

      await request.join();

      await expect(request.join()).rejects.toBeInstanceOf(RequestConsumedError);
    });
  });

  describe('profile checks', () => {
    it('should refuse an inconsistent profile before fetching anything', () => {
      const fetcher = createStubFetcher(HEALTHY_PAGES);
      const broken = {
        ...S3_STRICT,
        cellTemperature: { ...S3_STRICT.cellTemperature, partition: { kind: 'fixed' as const, at: -1 } }
      };

      expect(() => startAcquisition({ address: 'bms.local', sanitize: true, profile: broken }, { fetcher: fetcher }))
        .toThrow('s3-strict/cellTemperature: partition index must be a non-negative integer');
      expect(fetcher.requested).toEqual([]);
    });
  });

  describe('logging', () => {
    it('should log typed failures as warnings and defects as critical', async () => {
      const write = vi.fn<Parameters<LogSink['write']>, void>();
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: () => 0, sinks: [{ sink: { write: write }, minLevel: LOG_LEVELS.DEBUG }] },
        LOG_LEVELS
      );

      const missingTemperature = { 'main_data.shtml': MAIN_PAGE, 'ucell.shtml': cellVoltagePage(FOUR_CELLS) };
      await startAcquisition(
        { address: 'bms.local', sanitize: true },
        { fetcher: createStubFetcher(missingTemperature), logger: logger }
      ).join();

      const broken = createLatchedFetcher();
      const request = startAcquisition({ address: 'bms.local', sanitize: true }, { fetcher: broken, logger: logger });
      broken.latch('main_data.shtml').reject('not an error');
      broken.latch('ucell.shtml').resolve(cellVoltagePage(FOUR_CELLS));
      broken.latch('tcell.shtml').resolve(cellTemperaturePage(FOUR_SENSORS_TENTHS));
      await request.join();

      expect(write.mock.calls).toEqual([
        ['[WARNING]  Could not fetch cell-temperature data: HTTP 404: Not Found', 2],
        ['[CRITICAL] Unexpected failure in main leg: not an error', 3]
      ]);
    });
  });
});

describe('fetchSnapshot', () => {
  it('should read from the controller over HTTP with the default profile', async () => {
    const requested: string[] = [];
    vi.stubGlobal('fetch', vi.fn((input: string) => {
      requested.push(input);
      const resource = input.slice(input.lastIndexOf('/') + 1);
      return Promise.resolve(new Response(HEALTHY_PAGES[resource]));
    }));

    const result = await fetchSnapshot('10.0.0.9', false).join();

    expect(requested.sort()).toEqual([
      'http://10.0.0.9/main_data.shtml',
      'http://10.0.0.9/tcell.shtml',
      'http://10.0.0.9/ucell.shtml'
    ]);
    expect(result.ok && result.snapshot.sanitized).toBe(false);
    expect(result.ok && result.snapshot.profile).toBe('s3-default');
  });
});
