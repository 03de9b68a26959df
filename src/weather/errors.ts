/**
 * Error taxonomy for the weather client.
 * Every failure surfaces as one of these; nothing is retried internally.
 */

export type WeatherErrorKind = 'configuration' | 'network' | 'api' | 'parse';

export abstract class WeatherClientError extends Error {
    abstract readonly kind: WeatherErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or invalid configuration (e.g. no API key)
 */
export class ConfigurationError extends WeatherClientError {
    readonly kind = 'configuration';
}

/**
 * Transport-level failure: no HTTP response was received
 */
export class NetworkError extends WeatherClientError {
    readonly kind = 'network';
}

export class ApiError extends WeatherClientError {
    readonly kind = 'api';

    constructor(
        readonly status: number,
        readonly providerMessage: string,
    ) {
        super(`OpenWeatherMap API error ${status}: ${providerMessage}`);
    }
}

export class ParseError extends WeatherClientError {
    readonly kind = 'parse';

    constructor(
        message: string,
        readonly issues: string[] = [],
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    }
}

export function isWeatherClientError(error: unknown): error is WeatherClientError {
    return error instanceof WeatherClientError;
}
