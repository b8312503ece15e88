import dotenv from 'dotenv';
import { Server } from 'http';
import { AppConfig, loadConfig } from './config';
import { createDynamoDBClient, createS3Client } from './clients/aws';
import { logger } from './logger';
import { createApp } from './app';
import { AuditLog } from './modules/auditLog';
import { CacheStore } from './modules/cacheStore';
import { WeatherClient } from './modules/weatherClient';
import { WeatherService } from './modules/weather';

// -------------------------------------------------
// Env
// -------------------------------------------------
dotenv.config({ quiet: true });

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logger.fatal({ err }, 'Invalid configuration');
  process.exit(1);
}

// -------------------------------------------------
// Components
// -------------------------------------------------
const { aws } = config;

const weatherService = new WeatherService({
  weatherClient: new WeatherClient(config.weatherApi),
  cacheStore: config.storage.enabled
    ? new CacheStore(config.storage, () => createS3Client(aws))
    : undefined,
  auditLog: config.audit.enabled
    ? new AuditLog(config.audit, () => createDynamoDBClient(aws))
    : undefined,
});

// -------------------------------------------------
// HTTP server
// -------------------------------------------------
const app = createApp(weatherService);

const server: Server = app.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      cache: config.storage.enabled,
      audit: config.audit.enabled,
      cacheExpiryMinutes: config.storage.cacheExpiryMinutes,
    },
    'Weather service started'
  );
});

// Shutdown
let isShuttingDown = false;

function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}. Shutting down...`);

  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Shutdown error');
      process.exit(1);
    }
    logger.info('Weather service stopped');
    process.exit(0);
  });

  setTimeout(() => process.exit(0), 3000).unref();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
