import { describe, it, expect } from 'vitest';
import { ADVISORY_RULES, hydrationTarget, recommend, type AdvisoryRule } from '../recommendations';
import { makeAirQuality, makeWeather } from './fixtures';

describe('recommend', () => {
    it('emits advisories in rule order when everything fires', () => {
        const advisories = recommend(
            8,
            { age: 65, healthConditions: ['asthma'] },
            makeWeather({ temperature: 42, uvIndex: 9 }),
            makeAirQuality({ aqi: 220 })
        );

        expect(advisories).toEqual([
            {
                category: 'heat',
                priority: 'high',
                message: 'Extreme heat! Stay indoors during 11 AM - 4 PM',
                action: 'Avoid outdoor activities'
            },
            {
                category: 'hydration',
                priority: 'high',
                message: 'Drink at least 5.9L water today',
                action: 'Drink water every 2 hours'
            },
            {
                category: 'air_quality',
                priority: 'high',
                message: 'Poor air quality! Wear N95 mask outdoors',
                action: 'Use air purifier indoors, close windows'
            },
            {
                category: 'uv_protection',
                priority: 'medium',
                message: 'High UV levels. Protect your skin',
                action: 'Use sunscreen SPF 30+, wear sunglasses'
            },
            {
                category: 'health',
                priority: 'high',
                message: 'Extra caution due to health conditions',
                action: 'Monitor symptoms closely, stay cool'
            },
            {
                category: 'health',
                priority: 'high',
                message: 'Take extra care in extreme conditions',
                action: 'Stay indoors, keep emergency contacts ready'
            },
            {
                category: 'general',
                priority: 'critical',
                message: 'VERY HIGH RISK! Minimize all outdoor activities',
                action: 'Stay indoors, seek medical help if feeling unwell'
            }
        ]);
    });

    it('returns nothing on a mild day for a low score', () => {
        expect(recommend(1, {}, makeWeather(), makeAirQuality())).toEqual([]);
    });

    it('uses the medium variants between thresholds', () => {
        const advisories = recommend(2, null, makeWeather({ temperature: 36 }), makeAirQuality({ aqi: 150 }));
        expect(advisories.map((a) => [a.category, a.priority])).toEqual([
            ['heat', 'medium'],
            ['hydration', 'high'],
            ['air_quality', 'medium']
        ]);
    });

    it('treats thresholds as strict', () => {
        const advisories = recommend(
            3,
            { age: 60 },
            makeWeather({ temperature: 32, uvIndex: 7 }),
            makeAirQuality({ aqi: 100 })
        );
        expect(advisories).toEqual([]);
    });

    it('adds hydration from the score alone', () => {
        const advisories = recommend(4, {}, makeWeather({ temperature: 25 }), makeAirQuality());
        expect(advisories).toEqual([
            {
                category: 'hydration',
                priority: 'high',
                message: 'Drink at least 4.7L water today',
                action: 'Drink water every 2 hours'
            }
        ]);
    });

    it('accepts a custom rule table', () => {
        const rules: AdvisoryRule[] = [
            ADVISORY_RULES[0],
            {
                id: 'always',
                evaluate: () => ({ category: 'general', priority: 'medium', message: 'Check the forecast', action: 'Plan ahead' })
            }
        ];
        const advisories = recommend(0, {}, makeWeather({ temperature: 41 }), makeAirQuality(), rules);
        expect(advisories.map((a) => a.message)).toEqual([
            'Extreme heat! Stay indoors during 11 AM - 4 PM',
            'Check the forecast'
        ]);
    });
});

describe('hydrationTarget', () => {
    it('scales water with the score', () => {
        expect(hydrationTarget(0)).toEqual({ dailyWaterLiters: 3.5, drinkIntervalHours: 3 });
        expect(hydrationTarget(10).drinkIntervalHours).toBe(1);
    });
});
