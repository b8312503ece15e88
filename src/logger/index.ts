import pino, { LoggerOptions } from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

// The weather API key travels as the `appid` query param, so axios errors carry it.
export const REDACTED_PATHS = [
    "err.config.params.appid",
    "err.cause.config.params.appid",
    "apiKey",
];

function defaultLevel(env: string | undefined): string {
    if (env === "test") return "silent";
    if (env === "development") return "debug";
    return "info";
}

export function buildLoggerOptions(
    env: string | undefined,
    level: string | undefined
): LoggerOptions {
    return {
        level: level ?? defaultLevel(env),
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid, service: "weather-cache-service" },
        redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
        transport: env === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd HH:MM:ss",
                    ignore: "pid,hostname,service",
                },
            }
            : undefined,
    };
}

export const logger = pino(buildLoggerOptions(process.env.NODE_ENV, process.env.LOG_LEVEL));
