import { STORAGE_DISABLED, STORAGE_FAILED, WeatherService } from '@/modules/weather';
import { AuditError, StorageError, WeatherFetchError } from '@/errors';
import { err, ok } from '@/interfaces/result';
import { WeatherRecord } from '@/interfaces/weather';

jest.mock('@/logger', () => ({
  logger: {
    error: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

const LONDON: WeatherRecord = {
  main: { temp: 15.6 },
  weather: [{ description: 'clear sky' }],
  name: 'London',
  cod: 200,
  fetch_timestamp: '2025-01-01T10:00:00.000Z',
};

const CACHED: WeatherRecord = { ...LONDON, fetch_timestamp: '2025-01-01T09:58:00.000Z' };

const LONDON_URI = 's3://test-bucket/london_20250101_100000.json';
const CACHED_PATH = 's3://test-bucket/london_cached';

describe('WeatherService (unit)', () => {
  const weatherClient = { fetch: jest.fn() };
  const cacheStore = { getFresh: jest.fn(), put: jest.fn(), cachedPath: jest.fn() };
  const auditLog = { record: jest.fn() };
  let service: WeatherService;

  beforeEach(() => {
    service = new WeatherService({ weatherClient, cacheStore, auditLog });

    cacheStore.getFresh.mockResolvedValue(ok(null));
    cacheStore.put.mockResolvedValue(ok({ key: 'london_20250101_100000.json', uri: LONDON_URI }));
    cacheStore.cachedPath.mockReturnValue(CACHED_PATH);
    weatherClient.fetch.mockResolvedValue(ok(LONDON));
    auditLog.record.mockResolvedValue(ok('event-1'));
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - miss → fetch → persist → audit, strictly in sequence
   * - fetched record is returned
   */
  it('fetches, persists and audits on a cache miss', async () => {
    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: true, value: LONDON });
    expect(cacheStore.put).toHaveBeenCalledTimes(1);
    expect(cacheStore.put).toHaveBeenCalledWith('London', LONDON);
    expect(auditLog.record).toHaveBeenCalledTimes(1);
    expect(auditLog.record).toHaveBeenCalledWith('London', LONDON_URI, LONDON);

    const order = [
      cacheStore.getFresh.mock.invocationCallOrder[0],
      weatherClient.fetch.mock.invocationCallOrder[0],
      cacheStore.put.mock.invocationCallOrder[0],
      auditLog.record.mock.invocationCallOrder[0],
    ];
    expect(order).toEqual([...order].sort((a, b) => a - b));
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - fresh cache entry is returned without calling upstream
   * - audit path carries the cache marker
   */
  it('serves a fresh cache entry and audits it', async () => {
    cacheStore.getFresh.mockResolvedValue(ok(CACHED));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: true, value: CACHED });
    expect(weatherClient.fetch).not.toHaveBeenCalled();
    expect(cacheStore.put).not.toHaveBeenCalled();
    expect(auditLog.record).toHaveBeenCalledWith('London', CACHED_PATH, CACHED);
  });

  it('returns the cached entry when auditing it fails', async () => {
    cacheStore.getFresh.mockResolvedValue(ok(CACHED));
    auditLog.record.mockResolvedValue(err(new AuditError('connection')));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: true, value: CACHED });
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - an unusable cache is a soft miss
   */
  it('falls back to the weather API when the cache read fails', async () => {
    cacheStore.getFresh.mockResolvedValue(err(new StorageError('cache', 'Cached data is corrupted')));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: true, value: LONDON });
    expect(weatherClient.fetch).toHaveBeenCalledWith('London');
  });

  it('treats a storage connection failure on read as a soft miss', async () => {
    cacheStore.getFresh.mockResolvedValue(err(new StorageError('connection')));

    const result = await service.getWeather('London');

    expect(result.ok).toBe(true);
    expect(weatherClient.fetch).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - permission failures on cache read end the request with 403
   */
  it('surfaces a permission failure from the cache read', async () => {
    const denied = new StorageError('permission', 'S3 bucket not found');
    cacheStore.getFresh.mockResolvedValue(err(denied));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: false, error: denied });
    expect(!result.ok && result.error.statusCode).toBe(403);
    expect(weatherClient.fetch).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - fetch failures are terminal
   * - nothing is persisted or audited
   */
  it('propagates weather fetch failures', async () => {
    weatherClient.fetch.mockResolvedValue(err(WeatherFetchError.notFound('Atlantis')));

    const result = await service.getWeather('Atlantis');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.statusCode).toBe(404);
      expect(result.error.message).toBe('City not found: Atlantis');
    }
    expect(cacheStore.put).not.toHaveBeenCalled();
    expect(auditLog.record).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - write-back failure does not fail the request
   * - audit records the storage_failed sentinel
   */
  it('returns fetched data when persistence fails', async () => {
    cacheStore.put.mockResolvedValue(err(new StorageError('storage', 'S3 operation failed: InternalError')));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: true, value: LONDON });
    expect(auditLog.record).toHaveBeenCalledWith('London', STORAGE_FAILED, LONDON);
  });

  it('surfaces a permission failure from the write-back', async () => {
    const denied = new StorageError('permission', 'S3 access error: AccessDenied');
    cacheStore.put.mockResolvedValue(err(denied));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: false, error: denied });
    expect(auditLog.record).not.toHaveBeenCalled();
  });

  it.each([
    new AuditError('audit', 'DynamoDB operation failed: InternalServerError'),
    new AuditError('connection'),
    new AuditError('permission'),
  ])('returns fetched data when auditing fails with $kind', async (failure) => {
    auditLog.record.mockResolvedValue(err(failure));

    const result = await service.getWeather('London');

    expect(result).toEqual({ ok: true, value: LONDON });
  });

  it('only fetches when cache and audit are disabled', async () => {
    const bare = new WeatherService({ weatherClient });

    const result = await bare.getWeather('London');

    expect(result).toEqual({ ok: true, value: LONDON });
    expect(cacheStore.getFresh).not.toHaveBeenCalled();
    expect(auditLog.record).not.toHaveBeenCalled();
  });

  it('records the storage_disabled path when caching is off', async () => {
    const withoutCache = new WeatherService({ weatherClient, auditLog });

    await withoutCache.getWeather('London');

    expect(auditLog.record).toHaveBeenCalledWith('London', STORAGE_DISABLED, LONDON);
  });
});
