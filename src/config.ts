import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './weather/errors.js';
import { type Language, type Units, UnitsSchema } from './weather/types.js';

dotenv.config();

export const DEFAULT_BASE_URL = 'https://api.openweathermap.org/data/2.5';
export const TARGET_CITY = 'Tokyo';

export interface WeatherConfig {
    apiKey: string;
    baseUrl: string;
    city: string;
    units: Units;               // Default units for queries (default: metric)
    lang: Language;             // Default language for queries (default: ja)
    timeoutMs: number;          // Request timeout in whole ms (default: 10000)
}

export type Env = Record<string, string | undefined>;

export function getEnvVarOptional(env: Env, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

export function getEnvVarNumber(env: Env, name: string, defaultValue: number): number {
    const value = env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

const TimeoutSchema = z.number().int().positive().max(2 ** 31 - 1);

/**
 * Validate a units value coming from the environment or a caller
 */
export function parseUnits(value: unknown): Units {
    const units = UnitsSchema.safeParse(value);
    if (!units.success) {
        throw new ConfigurationError(`Unsupported units "${String(value)}" (expected one of: ${UnitsSchema.options.join(', ')})`);
    }
    return units.data;
}

/**
 * Build the immutable client configuration.
 * Explicit overrides win over environment variables.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<WeatherConfig> = {}): Readonly<WeatherConfig> {
    const apiKey = (overrides.apiKey ?? env.OPENWEATHER_API_KEY ?? '').trim();
    if (!apiKey) {
        throw new ConfigurationError(
            'API key not set. Set the OPENWEATHER_API_KEY environment variable or pass apiKey explicitly.'
        );
    }

    const units = parseUnits(overrides.units ?? getEnvVarOptional(env, 'OPENWEATHER_UNITS', 'metric'));

    const timeoutMs = overrides.timeoutMs ?? getEnvVarNumber(env, 'OPENWEATHER_TIMEOUT_MS', 10000);
    if (!TimeoutSchema.safeParse(timeoutMs).success) {
        throw new ConfigurationError(`Request timeout must be a positive whole number of milliseconds, got ${timeoutMs}`);
    }

    return Object.freeze({
        apiKey,
        baseUrl: overrides.baseUrl ?? getEnvVarOptional(env, 'OPENWEATHER_BASE_URL', DEFAULT_BASE_URL),
        city: overrides.city ?? TARGET_CITY,
        units,
        lang: overrides.lang ?? getEnvVarOptional(env, 'OPENWEATHER_LANG', 'ja'),
        timeoutMs,
    });
}
