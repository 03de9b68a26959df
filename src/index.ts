/**
 * Tokyo weather client
 * Library entry point; see cli.ts for the command-line runner
 */

export { loadConfig, DEFAULT_BASE_URL, TARGET_CITY } from './config.js';
export type { WeatherConfig, Env } from './config.js';
export { logger } from './logger.js';
export * from './weather/index.js';
