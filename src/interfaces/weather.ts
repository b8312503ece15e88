import { z } from "zod";
import { WeatherRecordSchema } from "../schemas/weather.schema";

/** Upstream document plus the ISO-8601 `fetch_timestamp` stamped on retrieval. */
export type WeatherRecord = z.infer<typeof WeatherRecordSchema>;

export function isWeatherRecord(value: unknown): value is WeatherRecord {
  return WeatherRecordSchema.safeParse(value).success;
}
