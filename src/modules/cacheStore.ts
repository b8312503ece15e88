import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  _Object,
} from '@aws-sdk/client-s3';
import { S3ClientFactory } from '../clients/aws';
import { StorageSettings } from '../config';
import { StorageError } from '../errors';
import { Result, err, ok } from '../interfaces/result';
import { StoredObject } from '../interfaces/storedObject';
import { WeatherRecord, isWeatherRecord } from '../interfaces/weather';
import { logger } from '../logger';
import { isCredentialsError, isNetworkError } from '../utils/awsErrors';
import { withResource } from '../utils/scoped';
import { formatStorageTimestamp } from '../utils/time';

const PERMISSION_CODES = new Set(['NoSuchBucket', 'AccessDenied']);
const KEY_SUFFIX = /^\d{8}_\d{6}\.json$/;

export interface CacheCandidate {
  key: string;
  lastModified: Date;
}

export function normalizeCity(city: string): string {
  return city.toLowerCase().replace(/ /g, '_');
}

/**
 * `{normalized_city}_{YYYYMMDD_HHMMSS}.json`. Two uploads for the same city
 * within one second produce the same key; the later one overwrites.
 */
export function generateStorageKey(city: string, now: Date = new Date()): string {
  return `${normalizeCity(city)}_${formatStorageTimestamp(now)}.json`;
}

/**
 * Whether `key` is a cache entry of `city` itself. A prefix listing for
 * `york_` also returns `york_harbor_...` keys.
 */
export function isEntryKeyFor(city: string, key: string): boolean {
  const prefix = `${normalizeCity(city)}_`;
  return key.startsWith(prefix) && KEY_SUFFIX.test(key.slice(prefix.length));
}

/**
 * Most recent entry whose last-modified time is at or after `minTimestamp`,
 * or null when none qualifies.
 */
export function selectFreshEntry(
  objects: readonly _Object[],
  minTimestamp: number
): CacheCandidate | null {
  const candidates: CacheCandidate[] = [];
  for (const object of objects) {
    if (object.Key && object.LastModified) {
      candidates.push({ key: object.Key, lastModified: object.LastModified });
    }
  }

  candidates.sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime());

  return candidates.find((c) => c.lastModified.getTime() >= minTimestamp) ?? null;
}

function mapServiceError(error: unknown, fallbackMessage: string): StorageError {
  if (isCredentialsError(error)) {
    return new StorageError('permission', 'Invalid AWS credentials', error);
  }

  if (error instanceof S3ServiceException) {
    if (PERMISSION_CODES.has(error.name)) {
      return new StorageError('permission', `S3 access error: ${error.name}`, error);
    }
    return new StorageError('storage', `S3 operation failed: ${error.name}`, error);
  }

  if (isNetworkError(error)) {
    return new StorageError('connection', undefined, error);
  }

  return new StorageError('storage', fallbackMessage, error);
}

/**
 * S3-backed read-through cache for weather records. A client is created for
 * every operation and destroyed when the operation ends.
 */
export class CacheStore {
  constructor(
    private readonly settings: StorageSettings,
    private readonly createClient: S3ClientFactory
  ) {}

  uriFor(key: string): string {
    return `s3://${this.settings.bucket}/${key}`;
  }

  /** Audit storage path recorded for a lookup served from the cache. */
  cachedPath(city: string): string {
    return this.uriFor(`${normalizeCity(city)}_cached`);
  }

  async put(city: string, record: WeatherRecord): Promise<Result<StoredObject, StorageError>> {
    const key = generateStorageKey(city);

    let body: string;
    try {
      body = JSON.stringify(record, null, 2);
    } catch (error) {
      logger.error({ city, err: error }, 'JSON encoding error');
      return err(new StorageError('data', 'Failed to encode weather data', error));
    }

    logger.info({ city, key }, 'Uploading weather data to storage');

    return this.session<StoredObject>(async (client) => {
      try {
        await client.send(
          new PutObjectCommand({
            Bucket: this.settings.bucket,
            Key: key,
            Body: body,
            ContentType: 'application/json',
            Metadata: {
              city: city.toLowerCase(),
              timestamp: new Date().toISOString(),
            },
          })
        );
      } catch (error) {
        return err(mapServiceError(error, 'Failed to upload weather data'));
      }

      const uri = this.uriFor(key);
      logger.info({ city, uri }, 'Successfully uploaded weather data');
      return ok({ key, uri });
    });
  }

  async getFresh(
    city: string,
    maxAgeMinutes: number = this.settings.cacheExpiryMinutes
  ): Promise<Result<WeatherRecord | null, StorageError>> {
    if (typeof city !== 'string' || city.length === 0) {
      return err(new StorageError('data', 'City name must be a non-empty string'));
    }

    logger.info({ city }, 'Checking storage for recent weather data');

    const prefix = `${normalizeCity(city)}_`;
    const minTimestamp = Date.now() - maxAgeMinutes * 60_000;

    return this.session<WeatherRecord | null>(async (client) => {
      const listed = await this.listByPrefix(client, prefix);
      if (!listed.ok) return listed;

      const entries = listed.value.filter((object) => object.Key && isEntryKeyFor(city, object.Key));
      if (entries.length === 0) {
        logger.debug({ city }, 'No cached data found');
        return ok(null);
      }

      const fresh = selectFreshEntry(entries, minTimestamp);
      if (!fresh) {
        logger.debug({ city }, 'No recent cached data found');
        return ok(null);
      }

      const cached = await this.readEntry(client, fresh.key);
      if (cached.ok) {
        logger.info({ city, key: fresh.key }, 'Successfully retrieved cached weather data');
      }
      return cached;
    });
  }

  private async session<T>(
    operation: (client: S3Client) => Promise<Result<T, StorageError>>
  ): Promise<Result<T, StorageError>> {
    let client: S3Client;
    try {
      client = this.createClient();
    } catch (error) {
      logger.error({ err: error }, 'Failed to create S3 client');
      return err(
        isCredentialsError(error)
          ? new StorageError('permission', 'Invalid AWS credentials', error)
          : new StorageError('connection', undefined, error)
      );
    }

    return withResource(client, async (s3) => {
      try {
        return await operation(s3);
      } catch (error) {
        logger.error({ err: error }, 'Unexpected storage error');
        return err(new StorageError('storage', undefined, error));
      }
    });
  }

  private async listByPrefix(
    client: S3Client,
    prefix: string
  ): Promise<Result<_Object[], StorageError>> {
    const objects: _Object[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await client.send(
          new ListObjectsV2Command({
            Bucket: this.settings.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );
        objects.push(...(page.Contents ?? []));
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      if (error instanceof S3ServiceException && error.name === 'NoSuchBucket') {
        return err(new StorageError('permission', 'S3 bucket not found', error));
      }
      return err(mapServiceError(error, 'Failed to retrieve cached weather data'));
    }

    return ok(objects);
  }

  private async readEntry(
    client: S3Client,
    key: string
  ): Promise<Result<WeatherRecord, StorageError>> {
    let body: string | undefined;
    try {
      const object = await client.send(
        new GetObjectCommand({ Bucket: this.settings.bucket, Key: key })
      );
      body = await object.Body?.transformToString('utf-8');
    } catch (error) {
      return err(new StorageError('cache', 'Failed to retrieve cached data', error));
    }

    if (body === undefined) {
      return err(new StorageError('cache', 'Failed to retrieve cached data'));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      return err(new StorageError('cache', 'Cached data is corrupted', error));
    }

    if (!isWeatherRecord(parsed)) {
      return err(new StorageError('cache', 'Cached data is corrupted'));
    }

    return ok(parsed);
  }
}
