#!/usr/bin/env node
/**
 * Command-line runner: prints the current Tokyo weather using the configured defaults.
 * Run with: npm start
 */

import { logger } from './logger.js';
import { ConfigurationError, WeatherClient, isWeatherClientError } from './weather/index.js';

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
}

const consoleIO: CliIO = {
    out: line => console.log(line),
    err: line => console.error(line),
};

/**
 * Returns the process exit code
 */
export async function main(
    createClient: () => WeatherClient = () => new WeatherClient(),
    io: CliIO = consoleIO,
): Promise<number> {
    try {
        const client = createClient();
        io.out(await client.getFormattedWeather());
        return 0;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        io.err(`Error: ${message}`);

        if (error instanceof ConfigurationError) {
            io.err('');
            io.err('Usage:');
            io.err('1. Get an API key from OpenWeatherMap: https://openweathermap.org/api');
            io.err('2. Create a .env file containing:');
            io.err('   OPENWEATHER_API_KEY=your_api_key_here');
        } else if (!isWeatherClientError(error)) {
            logger.error('Unexpected error', { error: message, stack: error instanceof Error ? error.stack : undefined });
        }
        return 1;
    }
}

if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    }).catch(error => {
        console.error('Unhandled error:', error);
        process.exit(1);
    });
}
