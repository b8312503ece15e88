import { RequestHandler, Router } from 'express';
import { z } from 'zod';
import { WeatherService } from '../modules/weather';
import { createErrorResponse, sendServiceError } from '../middlewares/errorHandler';
import { logger } from '../logger';

export const CityQuerySchema = z.object({
  city: z
    .string({ required_error: 'city is required' })
    .min(2)
    .max(50)
    .regex(/^[\p{L} -]+$/u, 'city may only contain letters, spaces and hyphens'),
});

export const rootHandler: RequestHandler = (_req, res) => {
  logger.info('Processing root endpoint request');
  res.json({ message: 'Hello, World!' });
};

export function createWeatherHandler(service: Pick<WeatherService, 'getWeather'>): RequestHandler {
  return async (req, res, next) => {
    const parsed = CityQuerySchema.safeParse(req.query);

    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
      logger.warn({ query: req.query, detail }, 'Invalid city parameter');
      res.status(422).json(createErrorResponse(`Invalid city parameter: ${detail}`, 422));
      return;
    }

    try {
      const result = await service.getWeather(parsed.data.city);

      if (result.ok) {
        res.status(200).json(result.value);
        return;
      }

      sendServiceError(res, result.error);
    } catch (error) {
      next(error);
    }
  };
}

export function createWeatherRouter(service: Pick<WeatherService, 'getWeather'>): Router {
  const router = Router();

  router.get('/', rootHandler);
  router.get('/weather', createWeatherHandler(service));

  return router;
}
