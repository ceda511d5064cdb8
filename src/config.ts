import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function readLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value?.trim().toLowerCase());
  return level ?? 'info';
}

export const config = {
  conversionConfigRoot: process.env.CONVERSION_CONFIG_ROOT || path.resolve(__dirname, '..', 'config', 'conversion'),
  defaultTargetVersion: process.env.DEFAULT_TARGET_VERSION || undefined,
  get logLevel(): LogLevel {
    return readLogLevel(process.env.LOG_LEVEL);
  }
};
