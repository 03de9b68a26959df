/**
 * Weather data types for the OpenWeatherMap current-weather endpoint
 */

import { z } from 'zod';

export const UNITS = ['metric', 'imperial', 'standard'] as const;

/**
 * metric: Celsius, m/s. imperial: Fahrenheit, mph. standard: Kelvin, m/s.
 */
export type Units = typeof UNITS[number];

export const UnitsSchema = z.enum(UNITS);

/**
 * Provider language code, e.g. "ja" or "en"
 */
export type Language = string;

export interface WeatherQuery {
    units?: Units;
    lang?: Language;
}

const ConditionSchema = z.object({
    id: z.number().optional(),
    main: z.string().optional(),
    description: z.string(),
}).passthrough();

export const CurrentWeatherResponseSchema = z.object({
    weather: z.array(ConditionSchema).nonempty(),
    main: z.object({
        temp: z.number(),
        humidity: z.number(),
        feels_like: z.number().optional(),
        temp_min: z.number().optional(),
        temp_max: z.number().optional(),
        pressure: z.number().optional(),
    }).passthrough(),
    wind: z.object({
        speed: z.number(),
        deg: z.number().optional(),
    }).passthrough(),
    name: z.string(),
    cod: z.union([z.number(), z.string()]).optional(),
}).passthrough();

/**
 * Raw provider body, as validated
 */
export type CurrentWeatherResponse = z.infer<typeof CurrentWeatherResponseSchema>;

export const ProviderErrorSchema = z.object({
    cod: z.union([z.number(), z.string()]).optional(),
    message: z.string(),
});

export interface WeatherResult {
    cityName: string;
    description: string;
    temperature: number;
    feelsLike?: number;
    tempMin?: number;
    tempMax?: number;
    humidity: number; // percent
    windSpeed: number;
    units: Units;
    lang: Language;
}
