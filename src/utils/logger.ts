import winston from 'winston';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { RunStatus, Timeframe } from '../types/common';

dotenv.config();

const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const logDir = process.env.LOG_DIR || 'logs';
const isTest = process.env.NODE_ENV === 'test';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (!isTest) {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: `${logDir}/error.log`,
      level: 'error',
    }),
    new winston.transports.File({
      filename: `${logDir}/scraper.log`,
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${
        Object.keys(meta).length > 0 ? JSON.stringify(meta, null, 2) : ''
      }`;
    })
  ),
  defaultMeta: { service: 'funding-collector' },
  transports,
});

// Helper functions for structured logging
export interface RunLogData {
  runId: string;
  timeframe: Timeframe;
  status: RunStatus;
  coinsScraped: number;
  totalCoinsFound: number;
  arbitrageOpportunities: number;
  durationSeconds: number;
  attempts: number;
  errorMessage?: string;
}

export const logRun = (data: RunLogData): void => {
  if (data.status === 'failed') {
    logger.error('Scrape run failed', data);
  } else if (data.status === 'partial') {
    logger.warn('Scrape run partial', data);
  } else {
    logger.info('Scrape run completed', data);
  }
};

export const logArbitrage = (data: {
  coin: string;
  exchange: string;
  timeframe: Timeframe;
  arbitrageValue: number;
  threshold: number;
}): void => {
  logger.info('Arbitrage opportunity', data);
};

export const logError = (error: Error, context?: Record<string, unknown>): void => {
  logger.error('Error occurred', {
    name: error.name,
    message: error.message,
    stack: error.stack,
    context,
  });
};

export const logPerformance = (data: {
  metric: string;
  value: number;
  unit: string;
  timestamp: Date;
}): void => {
  logger.info('Performance metric', data);
};
