import { describe, it, expect, jest } from '@jest/globals';
import { main } from '../cli.js';
import { WeatherClient } from '../weather/openweather-client.js';
import { createFakeOpenWeather, TOKYO_CLEAR_JA } from './fake-openweather.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

function captureIO() {
    const out: string[] = [];
    const err: string[] = [];
    return { out, err, io: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) } };
}

describe('cli main', () => {
    it('should print the formatted weather and exit 0', async () => {
        const fake = createFakeOpenWeather({ status: 200, body: TOKYO_CLEAR_JA });
        const { out, err, io } = captureIO();

        const code = await main(() => new WeatherClient({ env: {}, apiKey: 'test-secret', httpClient: fake.client }), io);

        expect(code).toBe(0);
        expect(err).toEqual([]);
        expect(out).toHaveLength(1);
        expect(out[0].split('\n')).toContain('気温: 15.0°C');
    });

    it('should print setup help and exit 1 without an API key', async () => {
        const { out, err, io } = captureIO();

        const code = await main(() => new WeatherClient({ env: {} }), io);

        expect(code).toBe(1);
        expect(out).toEqual([]);
        expect(err[0]).toBe(
            'Error: API key not set. Set the OPENWEATHER_API_KEY environment variable or pass apiKey explicitly.'
        );
        expect(err).toContain('   OPENWEATHER_API_KEY=your_api_key_here');
    });

    it('should print the provider error and exit 1', async () => {
        const fake = createFakeOpenWeather({ status: 401, body: { cod: 401, message: 'Invalid API key.' } });
        const { err, io } = captureIO();

        const code = await main(() => new WeatherClient({ env: {}, apiKey: 'test-secret', httpClient: fake.client }), io);

        expect(code).toBe(1);
        expect(err).toEqual(['Error: OpenWeatherMap API error 401: Invalid API key.']);
    });
});
