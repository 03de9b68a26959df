/**
 * In-process stand-in for the OpenWeatherMap API: an axios instance whose adapter
 * replays canned responses and records each request.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export interface FakeResponse {
    status: number;
    body: unknown;
    statusText?: string;
}

export interface RecordedRequest {
    url?: string;
    params: Record<string, unknown>;
    timeout?: number;
}

export interface FakeOpenWeather {
    client: AxiosInstance;
    requests: RecordedRequest[];
}

/**
 * Responses are consumed in order; the last one repeats
 */
export function createFakeOpenWeather(...responses: Array<FakeResponse | Error>): FakeOpenWeather {
    const requests: RecordedRequest[] = [];
    const queue = [...responses];

    const adapter: AxiosAdapter = async config => {
        requests.push({ url: config.url, params: { ...config.params }, timeout: config.timeout });

        const next = queue.length > 1 ? queue.shift() : queue[0];
        if (next === undefined) throw new Error('No fake response configured');
        if (next instanceof Error) throw next;

        return {
            data: next.body,
            status: next.status,
            statusText: next.statusText ?? '',
            headers: {},
            config,
        };
    };

    return { client: axios.create({ adapter }), requests };
}

export const TOKYO_CLEAR_JA = {
    coord: { lon: 139.6917, lat: 35.6895 },
    weather: [{ id: 800, main: 'Clear', description: '晴れ' }],
    main: { temp: 15.0, humidity: 60 },
    wind: { speed: 3.5 },
    name: 'Tokyo',
    cod: 200,
};

export const TOKYO_CLEAR_EN_IMPERIAL = {
    weather: [{ id: 800, main: 'Clear', description: 'clear sky' }],
    main: { temp: 77, feels_like: 75.2, temp_min: 72, temp_max: 81.5, humidity: 55 },
    wind: { speed: 5.5, deg: 180 },
    name: 'Tokyo',
    cod: 200,
};
