/**
 * Heat Risk Engine — Recommendation Generator
 *
 * Ordered rule table: every rule whose predicate matches appends exactly one
 * advisory, in table order. Rules never remove or reorder each other's output.
 */

import { hasHealthConditions } from './features';
import type { Advisory, AirQualityReading, UserProfile, WeatherReading } from './types';

export interface RecommendationContext {
    riskScore: number;
    profile: UserProfile;
    weather: WeatherReading;
    airQuality: AirQualityReading;
}

export interface AdvisoryRule {
    id: string;
    /** Returns the advisory to emit, or null when the rule does not apply. */
    evaluate(ctx: RecommendationContext): Advisory | null;
}

// =============================================================================
// Hydration
// =============================================================================

export interface HydrationTarget {
    /** Litres per day */
    dailyWaterLiters: number;
    /** Whole hours between drinks */
    drinkIntervalHours: number;
}

export function hydrationTarget(riskScore: number): HydrationTarget {
    const dailyWaterLiters = 3.5 + riskScore * 0.3;
    return {
        dailyWaterLiters,
        drinkIntervalHours: Math.floor(12 / dailyWaterLiters)
    };
}

// =============================================================================
// Rule Table
// =============================================================================

export const ADVISORY_RULES: readonly AdvisoryRule[] = [
    {
        id: 'heat',
        evaluate: ({ weather }) => {
            if (weather.temperature > 40) {
                // Worded as extreme, but the priority stays "high".
                return {
                    category: 'heat',
                    priority: 'high',
                    message: 'Extreme heat! Stay indoors during 11 AM - 4 PM',
                    action: 'Avoid outdoor activities'
                };
            }
            if (weather.temperature > 35) {
                return {
                    category: 'heat',
                    priority: 'medium',
                    message: 'Very hot weather. Limit outdoor exposure',
                    action: 'Stay in shade, wear light clothing'
                };
            }
            return null;
        }
    },
    {
        id: 'hydration',
        evaluate: ({ weather, riskScore }) => {
            if (!(weather.temperature > 32 || riskScore > 3)) return null;
            const { dailyWaterLiters, drinkIntervalHours } = hydrationTarget(riskScore);
            return {
                category: 'hydration',
                priority: 'high',
                message: `Drink at least ${dailyWaterLiters.toFixed(1)}L water today`,
                action: `Drink water every ${drinkIntervalHours} hours`
            };
        }
    },
    {
        id: 'air_quality',
        evaluate: ({ airQuality }) => {
            if (airQuality.aqi > 200) {
                return {
                    category: 'air_quality',
                    priority: 'high',
                    message: 'Poor air quality! Wear N95 mask outdoors',
                    action: 'Use air purifier indoors, close windows'
                };
            }
            if (airQuality.aqi > 100) {
                return {
                    category: 'air_quality',
                    priority: 'medium',
                    message: 'Moderate pollution. Consider wearing mask',
                    action: 'Reduce outdoor exercise'
                };
            }
            return null;
        }
    },
    {
        id: 'uv_protection',
        evaluate: ({ weather }) =>
            weather.uvIndex > 7
                ? {
                    category: 'uv_protection',
                    priority: 'medium',
                    message: 'High UV levels. Protect your skin',
                    action: 'Use sunscreen SPF 30+, wear sunglasses'
                }
                : null
    },
    {
        id: 'health_conditions',
        evaluate: ({ profile }) =>
            hasHealthConditions(profile)
                ? {
                    category: 'health',
                    priority: 'high',
                    message: 'Extra caution due to health conditions',
                    action: 'Monitor symptoms closely, stay cool'
                }
                : null
    },
    {
        id: 'elderly',
        evaluate: ({ profile }) =>
            typeof profile.age === 'number' && profile.age > 60
                ? {
                    category: 'health',
                    priority: 'high',
                    message: 'Take extra care in extreme conditions',
                    action: 'Stay indoors, keep emergency contacts ready'
                }
                : null
    },
    {
        id: 'very_high_risk',
        evaluate: ({ riskScore }) =>
            riskScore > 7
                ? {
                    category: 'general',
                    priority: 'critical',
                    message: 'VERY HIGH RISK! Minimize all outdoor activities',
                    action: 'Stay indoors, seek medical help if feeling unwell'
                }
                : null
    }
];

/**
 * Personalized advisories for a risk score and the readings it came from.
 */
export function recommend(
    riskScore: number,
    profile: UserProfile | null | undefined,
    weather: WeatherReading,
    airQuality: AirQualityReading,
    rules: readonly AdvisoryRule[] = ADVISORY_RULES
): Advisory[] {
    const ctx: RecommendationContext = { riskScore, profile: profile ?? {}, weather, airQuality };
    const advisories: Advisory[] = [];
    for (const rule of rules) {
        const advisory = rule.evaluate(ctx);
        if (advisory) advisories.push(advisory);
    }
    return advisories;
}
