/**
 * Usage examples for the weather client.
 * Run with: npm run examples (requires OPENWEATHER_API_KEY in the environment or .env)
 */

import { WeatherClient, ConfigurationError, temperatureSuffix, windSpeedSuffix } from '../weather/index.js';

function banner(title: string): void {
    console.log('\n' + '='.repeat(60));
    console.log(title);
    console.log('='.repeat(60));
}

async function basicUsage(client: WeatherClient): Promise<void> {
    banner('Example 1: defaults (metric, Japanese)');
    console.log(await client.getFormattedWeather());
}

async function imperialEnglish(client: WeatherClient): Promise<void> {
    banner('Example 2: Fahrenheit, English');
    console.log(await client.getFormattedWeather({ units: 'imperial', lang: 'en' }));
}

async function rawData(client: WeatherClient): Promise<void> {
    banner('Example 3: raw response data');
    const data = await client.getCurrentWeather();
    const units = client.config.units;
    console.log(`Location: ${data.name}`);
    console.log(`Weather: ${data.weather[0].description}`);
    console.log(`Temperature: ${data.main.temp}${temperatureSuffix(units)}`);
    console.log(`Humidity: ${data.main.humidity}%`);
    console.log(`Wind Speed: ${data.wind.speed} ${windSpeedSuffix(units)}`);
}

async function main(): Promise<void> {
    banner('Example 4: API key from the environment / .env');
    let client: WeatherClient;
    try {
        client = new WeatherClient();
    } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        console.log(`Error: ${error.message}`);
        console.log('\nAdd the following to .env:');
        console.log('OPENWEATHER_API_KEY=your_actual_api_key');
        return;
    }

    await basicUsage(client);
    await imperialEnglish(client);
    await rawData(client);
}

main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
