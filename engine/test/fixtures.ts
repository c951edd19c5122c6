import type { AirQualityReading, WeatherReading } from '../types';

export function makeWeather(overrides: Partial<WeatherReading> = {}): WeatherReading {
    return {
        temperature: 30,
        heatIndex: 29.7,
        humidity: 40,
        uvIndex: 5,
        description: 'clear sky',
        timestamp: '2026-05-01T06:00:00.000Z',
        location: 'Testville',
        ...overrides
    };
}

export function makeAirQuality(overrides: Partial<AirQualityReading> = {}): AirQualityReading {
    return {
        aqi: 80,
        category: 'Satisfactory',
        pm2_5: 30,
        pm10: 50,
        no2: 10,
        so2: 5,
        co: 300,
        o3: 40,
        timestamp: '2026-05-01T06:00:00.000Z',
        ...overrides
    };
}
