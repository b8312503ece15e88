import {
  AttributeValue,
  DynamoDBClient,
  DynamoDBServiceException,
  PutItemCommand,
} from '@aws-sdk/client-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import { DynamoDBClientFactory } from '../clients/aws';
import { AuditSettings } from '../config';
import { AuditError } from '../errors';
import { AuditEvent } from '../interfaces/auditEvent';
import { Result, err, ok } from '../interfaces/result';
import { WeatherRecord } from '../interfaces/weather';
import { ConditionSchema, TemperatureSchema } from '../schemas/weather.schema';
import { logger } from '../logger';
import { isCredentialsError, isNetworkError } from '../utils/awsErrors';
import { withResource } from '../utils/scoped';

const PERMISSION_CODES = new Set(['ResourceNotFoundException', 'AccessDeniedException']);

export function createAuditEvent(
  eventId: string,
  city: string,
  storagePath: string,
  record: WeatherRecord
): AuditEvent {
  const temperature = TemperatureSchema.safeParse(record);
  const condition = ConditionSchema.safeParse(record);

  return {
    eventId,
    timestamp: new Date().toISOString(),
    city,
    storagePath,
    temperature: temperature.success ? temperature.data.main.temp : 0,
    weatherCondition: condition.success ? condition.data.weather[0].description : 'Unknown',
    fullMetadata: JSON.stringify(record),
  };
}

export function toAuditItem(event: AuditEvent): Record<string, AttributeValue> {
  return {
    EventId: { S: event.eventId },
    Timestamp: { S: event.timestamp },
    CityName: { S: event.city },
    StoragePath: { S: event.storagePath },
    Temperature: { N: String(event.temperature) },
    WeatherCondition: { S: event.weatherCondition },
    FullMetadata: { S: event.fullMetadata },
  };
}

function mapServiceError(error: unknown): AuditError {
  if (isCredentialsError(error)) {
    return new AuditError('permission', undefined, error);
  }

  if (error instanceof DynamoDBServiceException) {
    if (PERMISSION_CODES.has(error.name)) {
      return new AuditError('permission', undefined, error);
    }
    return new AuditError('audit', `DynamoDB operation failed: ${error.name}`, error);
  }

  if (isNetworkError(error)) {
    return new AuditError('connection', undefined, error);
  }

  return new AuditError('audit', 'Failed to log weather event', error);
}

/** Append-only DynamoDB trail, one item per lookup. */
export class AuditLog {
  constructor(
    private readonly settings: AuditSettings,
    private readonly createClient: DynamoDBClientFactory
  ) {}

  async record(
    city: string,
    storagePath: string,
    record: WeatherRecord
  ): Promise<Result<string, AuditError>> {
    const eventId = uuidv4();

    let client: DynamoDBClient;
    try {
      client = this.createClient();
    } catch (error) {
      logger.error({ err: error }, 'Failed to create DynamoDB client');
      return err(new AuditError('connection', undefined, error));
    }

    return withResource(client, async (db) => {
      let item: Record<string, AttributeValue>;
      try {
        item = toAuditItem(createAuditEvent(eventId, city, storagePath, record));
      } catch (error) {
        return err(new AuditError('data', 'Failed to encode weather data for logging', error));
      }

      try {
        await db.send(new PutItemCommand({ TableName: this.settings.table, Item: item }));
      } catch (error) {
        logger.error({ city, eventId, err: error }, 'DynamoDB put failed');
        return err(mapServiceError(error));
      }

      logger.info({ city, eventId }, 'Successfully logged weather event');
      return ok(eventId);
    });
  }
}
