/**
 * OpenWeatherMap API Client
 * Current conditions for a fixed city (Tokyo) via the v2.5 "current weather by city name" endpoint
 * Documentation: https://openweathermap.org/current
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { type Env, loadConfig, parseUnits, type WeatherConfig } from '../config.js';
import { logger } from '../logger.js';
import { ApiError, NetworkError, ParseError } from './errors.js';
import { formatWeather, toWeatherResult } from './formatter.js';
import {
    type CurrentWeatherResponse,
    CurrentWeatherResponseSchema,
    ProviderErrorSchema,
    type WeatherQuery,
    type WeatherResult,
} from './types.js';

export interface WeatherClientOptions extends Partial<WeatherConfig> {
    /** Environment to read configuration from (default: process.env) */
    env?: Env;
    /** Preconfigured axios instance, e.g. with a test adapter */
    httpClient?: AxiosInstance;
}

export class WeatherClient {
    readonly config: Readonly<WeatherConfig>;
    private client: AxiosInstance;

    constructor(options: WeatherClientOptions = {}) {
        const { env, httpClient, ...overrides } = options;
        this.config = loadConfig(env, overrides);
        this.client = httpClient ?? axios.create();
    }

    /**
     * Fetch the raw, schema-validated response body
     */
    async getCurrentWeather(query: WeatherQuery = {}): Promise<CurrentWeatherResponse> {
        const { units, lang } = this.resolveQuery(query);

        logger.debug('Fetching current weather', { city: this.config.city, units, lang });

        let response: AxiosResponse<unknown>;
        try {
            response = await this.client.get<unknown>(`${this.config.baseUrl}/weather`, {
                params: {
                    q: this.config.city,
                    appid: this.config.apiKey,
                    units,
                    lang,
                },
                timeout: this.config.timeoutMs,
                // Status handling happens below so every non-200 maps to ApiError
                validateStatus: () => true,
            });
        } catch (error) {
            const reason = axios.isAxiosError(error) && error.code
                ? `${error.code}: ${error.message}`
                : error instanceof Error ? error.message : String(error);
            logger.warn('Failed to reach OpenWeatherMap', { city: this.config.city, error: reason });
            throw new NetworkError(`Failed to fetch weather information: ${reason}`, { cause: error });
        }

        if (response.status !== 200) {
            const body = ProviderErrorSchema.safeParse(response.data);
            const message = body.success ? body.data.message : (response.statusText || `HTTP ${response.status}`);
            logger.warn('OpenWeatherMap returned an error', { status: response.status, message });
            throw new ApiError(response.status, message);
        }

        const parsed = CurrentWeatherResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            logger.warn('Unexpected OpenWeatherMap response shape', { issues });
            throw new ParseError('Unexpected response from OpenWeatherMap', issues);
        }

        return parsed.data;
    }

    /**
     * Fetch and map current conditions into a WeatherResult
     */
    async getWeather(query: WeatherQuery = {}): Promise<WeatherResult> {
        const { units, lang } = this.resolveQuery(query);
        const data = await this.getCurrentWeather({ units, lang });
        return toWeatherResult(data, units, lang);
    }

    async getFormattedWeather(query: WeatherQuery = {}): Promise<string> {
        return formatWeather(await this.getWeather(query));
    }

    // Queries may come from untyped callers, so units are checked again here
    private resolveQuery(query: WeatherQuery): Required<WeatherQuery> {
        return {
            units: query.units === undefined ? this.config.units : parseUnits(query.units),
            lang: query.lang ?? this.config.lang,
        };
    }
}
