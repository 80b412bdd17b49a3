/**
 * Structured JSON logger.
 *
 * Uses Pino for JSON logging that CloudWatch and local tooling both read.
 */

import pino from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

const KNOWN_LEVELS: ReadonlySet<string> = new Set<LogLevel>(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return KNOWN_LEVELS.has(value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Level precedence: explicit argument, then LOG_LEVEL (any case), then 'info'.
 * Unknown level names fall back to 'info'.
 *
 * @param name - Logger name, conventionally `region-list:<module>`
 * @param level - Optional log level override
 * @param destination - Optional output stream; stdout when omitted
 */
export function setupLogger(
  name: string = 'region-list',
  level?: string,
  destination?: pino.DestinationStream
): pino.Logger {
  const requested = (level || process.env.LOG_LEVEL || 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(requested) ? requested : 'info';

  const options: pino.LoggerOptions = {
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
