/**
 * Runtime configuration from environment variables
 */

import { homedir } from 'os';
import { join } from 'path';
import { isLogLevel, type LogLevel } from './logger.js';

export const DEFAULT_DATA_FILE = join(homedir(), '.scavenger-hunt', 'hunt.json');
export const DEFAULT_GEOCODER_URL = 'https://nominatim.openstreetmap.org';

export interface HuntConfig {
  dataFile: string;
  geocoderUrl: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HuntConfig {
  const level = env.HUNT_LOG_LEVEL?.trim().toLowerCase();
  return {
    dataFile: env.HUNT_DATA_FILE?.trim() || DEFAULT_DATA_FILE,
    geocoderUrl: (env.HUNT_GEOCODER_URL?.trim() || DEFAULT_GEOCODER_URL).replace(/\/+$/, ''),
    logLevel: level && isLogLevel(level) ? level : 'info',
  };
}
