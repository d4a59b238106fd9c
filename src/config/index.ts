/**
 * Centralized Configuration
 */

import dotenv from 'dotenv';
import { logger, LogLevel } from '../utils/logger';

// Load environment variables
dotenv.config();

interface Config {
  // Server
  host: string;
  port: number;
  nodeEnv: string;

  // Database
  databaseUrl: string;
  dbPoolMax: number;
  dbIdleTimeoutMs: number;
  dbConnectionTimeoutMs: number;

  // Logging
  logLevel: LogLevel;

  // CORS
  allowedOrigins: string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function validateEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value?.toLowerCase());
  return level ?? 'info';
}

export const config: Config = {
  // Server
  host: process.env.HOST || '127.0.0.1',
  port: parseInt(process.env.PORT || '8000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Database
  databaseUrl: validateEnv('DATABASE_URL'),
  dbPoolMax: parseInt(process.env.DB_POOL_MAX || '5', 10),
  dbIdleTimeoutMs: parseInt(process.env.DB_IDLE_TIMEOUT_MS || '30000', 10),
  dbConnectionTimeoutMs: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '2000', 10),

  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || '').split(',').map(s => s.trim()).filter(Boolean),
};

logger.setLevel(config.logLevel);

export const isDevelopment = config.nodeEnv === 'development';
export const isProduction = config.nodeEnv === 'production';
