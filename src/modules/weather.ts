import { Result, err, ok } from '../interfaces/result';
import { WeatherRecord } from '../interfaces/weather';
import { logger } from '../logger';
import { AuditLog } from './auditLog';
import { CacheStore } from './cacheStore';
import { WeatherClient } from './weatherClient';

export const STORAGE_FAILED = 'storage_failed';
export const STORAGE_DISABLED = 'storage_disabled';

export interface WeatherServiceDeps {
  weatherClient: Pick<WeatherClient, 'fetch'>;
  cacheStore?: Pick<CacheStore, 'getFresh' | 'put' | 'cachedPath'>;
  auditLog?: Pick<AuditLog, 'record'>;
}

/**
 * Read-through cache over the weather API. Availability of weather data wins
 * over cache and audit durability: only fetch failures and storage permission
 * failures end a request with an error.
 */
export class WeatherService {
  constructor(private readonly deps: WeatherServiceDeps) {}

  async getWeather(city: string): Promise<Result<WeatherRecord>> {
    const { cacheStore, weatherClient } = this.deps;

    // Cache-first (best effort)
    if (cacheStore) {
      const cached = await cacheStore.getFresh(city);

      if (!cached.ok) {
        if (cached.error.kind === 'permission') {
          return err(cached.error);
        }
        logger.warn({ city, err: cached.error }, 'Cache read failed, falling back to API');
      } else if (cached.value) {
        logger.info({ city }, 'Weather cache hit');
        await this.audit(city, cacheStore.cachedPath(city), cached.value);
        return ok(cached.value);
      }
    }

    // API fallback
    const fetched = await weatherClient.fetch(city);
    if (!fetched.ok) {
      return fetched;
    }

    // Cache write (best effort)
    let storagePath = STORAGE_DISABLED;
    if (cacheStore) {
      const stored = await cacheStore.put(city, fetched.value);

      if (stored.ok) {
        storagePath = stored.value.uri;
      } else if (stored.error.kind === 'permission') {
        return err(stored.error);
      } else {
        storagePath = STORAGE_FAILED;
        logger.error({ city, err: stored.error }, 'Failed to persist weather data, continuing');
      }
    }

    await this.audit(city, storagePath, fetched.value);

    return ok(fetched.value);
  }

  // Audit write (best effort)
  private async audit(city: string, storagePath: string, record: WeatherRecord): Promise<void> {
    const { auditLog } = this.deps;
    if (!auditLog) return;

    const logged = await auditLog.record(city, storagePath, record);
    if (logged.ok) {
      logger.debug({ city, eventId: logged.value }, 'Audit event recorded');
      return;
    }

    logger.error(
      { city, storagePath, err: logged.error },
      'Failed to record audit event, continuing'
    );
  }
}
