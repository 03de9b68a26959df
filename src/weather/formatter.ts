/**
 * Human-readable rendering of current conditions.
 * Japanese gets its own template; every other language code falls back to English.
 */

import type { CurrentWeatherResponse, Language, Units, WeatherResult } from './types.js';

const RULE = '='.repeat(40);

interface TemplateLabels {
    title: (city: string) => string;
    conditions: string;
    temperature: string;
    feelsLike: string;
    tempMin: string;
    tempMax: string;
    humidity: string;
    windSpeed: string;
}

const TEMPLATES: Record<'ja' | 'en', TemplateLabels> = {
    ja: {
        title: city => `${city}の天気情報`,
        conditions: '天気',
        temperature: '気温',
        feelsLike: '体感温度',
        tempMin: '最低気温',
        tempMax: '最高気温',
        humidity: '湿度',
        windSpeed: '風速',
    },
    en: {
        title: city => `Current weather in ${city}`,
        conditions: 'Conditions',
        temperature: 'Temperature',
        feelsLike: 'Feels like',
        tempMin: 'Low',
        tempMax: 'High',
        humidity: 'Humidity',
        windSpeed: 'Wind speed',
    },
};

export function temperatureSuffix(units: Units): string {
    switch (units) {
        case 'metric': return '°C';
        case 'imperial': return '°F';
        case 'standard': return 'K';
    }
}

export function windSpeedSuffix(units: Units): string {
    return units === 'imperial' ? 'mph' : 'm/s';
}

/**
 * Render a measurement with at least one decimal place: 15 -> "15.0", 20.55 -> "20.55"
 */
export function formatMeasurement(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function templateFor(lang: Language): TemplateLabels {
    return lang.toLowerCase().startsWith('ja') ? TEMPLATES.ja : TEMPLATES.en;
}

export function toWeatherResult(data: CurrentWeatherResponse, units: Units, lang: Language): WeatherResult {
    return {
        cityName: data.name,
        description: data.weather[0].description,
        temperature: data.main.temp,
        feelsLike: data.main.feels_like,
        tempMin: data.main.temp_min,
        tempMax: data.main.temp_max,
        humidity: data.main.humidity,
        windSpeed: data.wind.speed,
        units,
        lang,
    };
}

export function formatWeather(result: WeatherResult): string {
    const labels = templateFor(result.lang);
    const temp = (value: number) => `${formatMeasurement(value)}${temperatureSuffix(result.units)}`;

    const lines = [
        RULE,
        labels.title(result.cityName),
        RULE,
        `${labels.conditions}: ${result.description}`,
        `${labels.temperature}: ${temp(result.temperature)}`,
    ];
    if (result.feelsLike !== undefined) lines.push(`${labels.feelsLike}: ${temp(result.feelsLike)}`);
    if (result.tempMin !== undefined) lines.push(`${labels.tempMin}: ${temp(result.tempMin)}`);
    if (result.tempMax !== undefined) lines.push(`${labels.tempMax}: ${temp(result.tempMax)}`);
    lines.push(
        `${labels.humidity}: ${result.humidity}%`,
        `${labels.windSpeed}: ${formatMeasurement(result.windSpeed)} ${windSpeedSuffix(result.units)}`,
        RULE,
    );

    return lines.join('\n');
}
