/**
 * Heat Risk Engine — Environment Fetcher
 *
 * Fetches current weather and air pollution from OpenWeatherMap and
 * normalizes them into WeatherReading / AirQualityReading. Mock readings are
 * served when mock mode is on, when no API key is configured, or when a live
 * call fails.
 */

import { aqiCategory, indianAqiFromIndex } from '../aqi';
import { PLACEHOLDER_API_KEY } from '../config';
import { heatIndex } from '../heatIndex';
import { isRecord } from '../guards';
import type { AirQualityReading, WeatherReading } from '../types';

// =============================================================================
// Configuration
// =============================================================================

const WEATHER_ENDPOINT = 'https://api.openweathermap.org/data/2.5/weather';
const UV_ENDPOINT = 'https://api.openweathermap.org/data/2.5/uvi';
const AIR_POLLUTION_ENDPOINT = 'https://api.openweathermap.org/data/2.5/air_pollution';

const DEFAULT_TIMEOUT_MS = 5_000;
const DEFAULT_UV_INDEX = 5.0;

export interface FetcherOptions {
    apiKey: string;
    /** Always serve mock readings (default: false) */
    mock?: boolean;
    timeoutMs?: number;
    /** For testing/determinism, override clock. */
    now?: () => Date;
}

// =============================================================================
// Mock Readings
// =============================================================================

export function mockWeather(now: Date = new Date()): WeatherReading {
    return {
        temperature: 38.5,
        heatIndex: heatIndex(38.5, 65.0),
        humidity: 65.0,
        uvIndex: 8.5,
        description: 'hot and humid',
        timestamp: now.toISOString(),
        location: 'Rourkela'
    };
}

export function mockAirQuality(now: Date = new Date()): AirQualityReading {
    return {
        aqi: 180,
        category: aqiCategory(180),
        pm2_5: 85.5,
        pm10: 120.3,
        no2: 45.2,
        so2: 25.1,
        co: 1200.5,
        o3: 60.8,
        timestamp: now.toISOString()
    };
}

// =============================================================================
// Fetcher
// =============================================================================

export class EnvironmentFetcher {
    readonly useMock: boolean;
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly now: () => Date;

    constructor(options: FetcherOptions) {
        this.apiKey = options.apiKey;
        this.useMock = Boolean(options.mock) || !options.apiKey || options.apiKey === PLACEHOLDER_API_KEY;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.now = options.now ?? (() => new Date());
    }

    async getWeather(latitude: number, longitude: number): Promise<WeatherReading> {
        if (this.useMock) return mockWeather(this.now());

        try {
            const coords = { lat: latitude.toString(), lon: longitude.toString() };
            const data = await this.getJson(WEATHER_ENDPOINT, { ...coords, units: 'metric' });
            const current = parseCurrentWeather(data);

            const uvIndex = await this.fetchUvIndex(coords);

            return {
                temperature: current.temperature,
                heatIndex: heatIndex(current.temperature, current.humidity),
                humidity: current.humidity,
                uvIndex,
                description: current.description,
                timestamp: this.now().toISOString(),
                location: current.location
            };
        } catch (error) {
            console.error('[fetcher] Error fetching weather data:', error);
            return mockWeather(this.now());
        }
    }

    async getAirQuality(latitude: number, longitude: number): Promise<AirQualityReading> {
        if (this.useMock) return mockAirQuality(this.now());

        try {
            const data = await this.getJson(AIR_POLLUTION_ENDPOINT, {
                lat: latitude.toString(),
                lon: longitude.toString()
            });
            const { index, components } = parseAirPollution(data);
            const aqi = indianAqiFromIndex(index);

            return {
                aqi,
                category: aqiCategory(aqi),
                pm2_5: componentOr(components, 'pm2_5'),
                pm10: componentOr(components, 'pm10'),
                no2: componentOr(components, 'no2'),
                so2: componentOr(components, 'so2'),
                co: componentOr(components, 'co'),
                o3: componentOr(components, 'o3'),
                timestamp: this.now().toISOString()
            };
        } catch (error) {
            console.error('[fetcher] Error fetching AQI data:', error);
            return mockAirQuality(this.now());
        }
    }

    /**
     * UV comes from a separate endpoint; a non-OK answer falls back to a
     * moderate default instead of failing the whole reading.
     */
    private async fetchUvIndex(coords: { lat: string; lon: string }): Promise<number> {
        const response = await this.request(UV_ENDPOINT, coords);
        if (!response.ok) return DEFAULT_UV_INDEX;
        const data: unknown = await response.json();
        return isRecord(data) && typeof data.value === 'number' ? data.value : DEFAULT_UV_INDEX;
    }

    private async getJson(endpoint: string, params: Record<string, string>): Promise<unknown> {
        const response = await this.request(endpoint, params);
        if (!response.ok) {
            throw new Error(`Fetch failed: ${response.status} ${response.statusText}`);
        }
        return response.json();
    }

    private request(endpoint: string, params: Record<string, string>): Promise<Response> {
        const query = new URLSearchParams({ ...params, appid: this.apiKey });
        return fetch(`${endpoint}?${query}`, { signal: AbortSignal.timeout(this.timeoutMs) });
    }
}

// =============================================================================
// Response Parsing
// =============================================================================

interface CurrentWeather {
    temperature: number;
    humidity: number;
    description: string;
    location: string;
}

function parseCurrentWeather(data: unknown): CurrentWeather {
    if (!isRecord(data) || !isRecord(data.main)) {
        throw new Error('Unexpected weather response: missing main block');
    }
    const { temp, humidity } = data.main;
    if (typeof temp !== 'number' || typeof humidity !== 'number') {
        throw new Error('Unexpected weather response: temperature/humidity missing');
    }

    const first = Array.isArray(data.weather) ? data.weather[0] : undefined;
    const description = isRecord(first) && typeof first.description === 'string' ? first.description : '';

    return {
        temperature: temp,
        humidity,
        description,
        location: typeof data.name === 'string' && data.name ? data.name : 'Unknown'
    };
}

function parseAirPollution(data: unknown): { index: number; components: Record<string, unknown> } {
    const entry = isRecord(data) && Array.isArray(data.list) ? data.list[0] : undefined;
    if (!isRecord(entry) || !isRecord(entry.main) || typeof entry.main.aqi !== 'number') {
        throw new Error('Unexpected air pollution response: missing list[0].main.aqi');
    }
    return {
        index: entry.main.aqi,
        components: isRecord(entry.components) ? entry.components : {}
    };
}

function componentOr(components: Record<string, unknown>, key: string): number {
    const value = components[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}
