/**
 * Structured logging service using Winston
 */

import winston from 'winston';
import { getConfig } from '../../config/environment';
import { ReserveSnapshot, SimulationResult, SwapResult } from '../../types/arbitrage.types';
import { PoolReserveReading } from '../../types/dex.types';
import path from 'path';
import fs from 'fs';

const config = getConfig();
const isTest = process.env.NODE_ENV === 'test';

/**
 * Custom log format with colors for console
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let metaStr = '';
    if (Object.keys(meta).length > 0) {
      metaStr = '\n' + JSON.stringify(meta, null, 2);
    }
    return `${timestamp} [${level}]: ${message}${metaStr}`;
  })
);

/**
 * JSON format for file logging
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json()
);

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  // Jest runs stay in-process: console only, and silenced below
  if (isTest) {
    return transports;
  }

  const logsDir = path.resolve(process.cwd(), config.LOG_DIR);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    // Info and above to combined.log
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: fileFormat,
      level: 'info',
    }),

    // Errors to error.log
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      format: fileFormat,
      level: 'error',
    }),

    // Rounds and summaries to a separate file for analysis
    new winston.transports.File({
      filename: path.join(logsDir, 'arbitrage.log'),
      format: fileFormat,
      level: 'info',
    })
  );

  return transports;
}

/**
 * Logger instance
 */
export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  silent: isTest,
  transports: createTransports(),
});

/**
 * Log service startup
 */
export function logServiceStart(serviceName: string, details?: Record<string, unknown>): void {
  logger.info(`${serviceName} started`, {
    type: 'service',
    service: serviceName,
    ...details,
  });
}

/**
 * Log service error
 */
export function logServiceError(
  serviceName: string,
  error: Error,
  context?: Record<string, unknown>
): void {
  logger.error(`${serviceName} error`, {
    type: 'error',
    service: serviceName,
    error: error.message,
    errorName: error.name,
    stack: error.stack,
    ...context,
  });
}

/**
 * Log a fresh reserve reading
 */
export function logReserves(reading: PoolReserveReading): void {
  logger.debug('Pool reserves', {
    type: 'reserves',
    chain: reading.chain,
    pool: reading.poolAddress,
    stable: reading.stable,
    other: reading.other,
    blockTimestamp: reading.blockTimestamp,
  });
}

/**
 * Log one simulated round
 */
export function logRound(index: number, result: SwapResult, snapshotAfter: ReserveSnapshot): void {
  logger.info(`Round ${index + 1}: profit ${result.profit.toFixed(6)}`, {
    type: 'round',
    round: index + 1,
    direction: result.direction,
    inputAmount: result.inputAmount,
    bridgedAmount: result.bridgedAmount,
    outputAmount: result.outputAmount,
    profit: result.profit,
    reservesAfter: snapshotAfter,
  });
}

/**
 * Log a completed simulation
 */
export function logSimulation(result: SimulationResult): void {
  logger.info('Simulation finished', {
    type: 'simulation',
    rounds: result.rounds.length,
    stopReason: result.stopReason,
    totals: result.totals,
  });
}

export default logger;
