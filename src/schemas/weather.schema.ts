import { z } from "zod";

/* ------------------ Upstream document ------------------ */

// The upstream document is stored and returned verbatim, so only its
// top-level shape is enforced.
export const WeatherDocumentSchema = z.record(z.string(), z.unknown());

export const WeatherRecordSchema = z
  .object({
    fetch_timestamp: z.string(),
  })
  .passthrough();

/* ------------------ Not-found signal ------------------ */

export const NotFoundBodySchema = z.object({
  cod: z.literal("404"),
});

/* ------------------ Audit fields ------------------ */

export const TemperatureSchema = z.object({
  main: z.object({
    temp: z.number(),
  }),
});

export const ConditionSchema = z.object({
  weather: z
    .array(
      z.object({
        description: z.string(),
      })
    )
    .nonempty(),
});
