import express, { Express } from 'express';
import { WeatherService } from './modules/weather';
import { createWeatherRouter } from './routes/weather';
import { requestLogger } from './middlewares/requestLogger';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';

export function createApp(service: Pick<WeatherService, 'getWeather'>): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger);
  app.use(createWeatherRouter(service));
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
