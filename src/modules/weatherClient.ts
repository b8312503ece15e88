import axios, { AxiosInstance, AxiosResponse } from 'axios';
import https from 'https';
import { WeatherApiSettings } from '../config';
import { WeatherFetchError } from '../errors';
import { Result, err, ok } from '../interfaces/result';
import { WeatherRecord } from '../interfaces/weather';
import { NotFoundBodySchema, WeatherDocumentSchema } from '../schemas/weather.schema';
import { logger } from '../logger';

export function createWeatherHttpClient(settings: WeatherApiSettings): AxiosInstance {
  return axios.create({
    timeout: settings.timeoutMs,
    httpsAgent: new https.Agent({
      keepAlive: true,
      maxSockets: 10,
    }),
  });
}

function describeBody(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * OpenWeatherMap current-weather client. One attempt per call; every
 * failure comes back as a WeatherFetchError carrying its HTTP status.
 */
export class WeatherClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: WeatherApiSettings,
    http?: AxiosInstance
  ) {
    this.http = http ?? createWeatherHttpClient(settings);
  }

  async fetch(city: string): Promise<Result<WeatherRecord, WeatherFetchError>> {
    logger.info({ city }, 'Fetching weather');

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.settings.baseUrl, {
        params: {
          q: city,
          appid: this.settings.apiKey,
          units: 'metric',
        },
        // Status handling is done below, including the body-level `cod`.
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.error(
          { city, message: error.message, code: error.code },
          'Network error while fetching weather data'
        );
        return err(WeatherFetchError.unavailable('Unable to connect to weather service', error));
      }

      logger.error({ city, err: error }, 'Unexpected error in weather client');
      return err(WeatherFetchError.internal(error));
    }

    const { status, data } = response;

    // OpenWeatherMap reports a missing city either as HTTP 404 or as `cod: "404"`
    if (status === 404 || NotFoundBodySchema.safeParse(data).success) {
      logger.warn({ city }, 'City not found');
      return err(WeatherFetchError.notFound(city));
    }

    if (status !== 200) {
      const detail = `API Error: ${status} - ${describeBody(data)}`;
      logger.error({ city, status }, detail);
      return err(
        WeatherFetchError.unavailable('Weather service temporarily unavailable', new Error(detail))
      );
    }

    const parsed = WeatherDocumentSchema.safeParse(data);
    if (!parsed.success) {
      logger.error({ city, issues: parsed.error.issues }, 'Weather API returned a non-object body');
      return err(
        WeatherFetchError.internal(new Error('Weather API response is not a JSON object'))
      );
    }

    const record: WeatherRecord = {
      ...parsed.data,
      fetch_timestamp: new Date().toISOString(),
    };

    logger.info({ city }, 'Successfully fetched weather');
    return ok(record);
  }
}
