/**
 * Heat Risk Engine — Feature Vectorizer
 *
 * Maps (profile, weather, air quality) onto the fixed 9-value vector the
 * classifier was trained on. See FEATURE_NAMES for the order.
 */

import { ValidationError } from './errors';
import type { AirQualityReading, FeatureVector, UserProfile, WeatherReading } from './types';

export const DEFAULT_AGE = 30;
export const DEFAULT_OUTDOOR_HOURS = 4;

/**
 * True when the profile lists at least one health condition.
 */
export function hasHealthConditions(profile: UserProfile | null | undefined): boolean {
    const conditions = profile?.healthConditions;
    return Array.isArray(conditions) && conditions.length > 0;
}

export function vectorize(
    profile: UserProfile | null | undefined,
    weather: WeatherReading | null | undefined,
    airQuality: AirQualityReading | null | undefined
): FeatureVector {
    if (!weather) {
        throw new ValidationError('weather', 'Weather reading is required');
    }
    if (!airQuality) {
        throw new ValidationError('airQuality', 'Air quality reading is required');
    }

    return [
        requireNumber(weather.temperature, 'weather.temperature'),
        requireNumber(weather.heatIndex, 'weather.heatIndex'),
        requireNumber(weather.humidity, 'weather.humidity'),
        requireNumber(weather.uvIndex, 'weather.uvIndex'),
        requireNumber(airQuality.aqi, 'airQuality.aqi'),
        requireNumber(airQuality.pm2_5, 'airQuality.pm2_5'),
        numberOr(profile?.age, DEFAULT_AGE),
        numberOr(profile?.outdoorHours, DEFAULT_OUTDOOR_HOURS),
        hasHealthConditions(profile) ? 1 : 0
    ];
}

function requireNumber(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError(field, `Missing or invalid ${field}: expected a finite number`);
    }
    return value;
}

function numberOr(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
