/**
 * Environment variable helpers shared by the config modules
 */

import { config } from 'dotenv';
import { logger } from '../services/logging/logger.js';

config();

/**
 * Get environment variable or throw error if required and missing
 */
export function getEnvVar(key: string, required: boolean = false, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;

  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }

  return value || '';
}

/**
 * Parse integer from environment variable
 */
export function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn({ key, value, defaultValue }, 'Invalid integer in environment, using default');
    return defaultValue;
  }

  return parsed;
}

/**
 * Parse float from environment variable
 */
export function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    logger.warn({ key, value, defaultValue }, 'Invalid number in environment, using default');
    return defaultValue;
  }

  return parsed;
}
