import { describe, it, expect } from 'vitest';
import { aqiCategory, indianAqiFromIndex } from '../aqi';

describe('aqiCategory', () => {
    it('bands on inclusive upper bounds', () => {
        expect(aqiCategory(0)).toBe('Good');
        expect(aqiCategory(50)).toBe('Good');
        expect(aqiCategory(51)).toBe('Satisfactory');
        expect(aqiCategory(100)).toBe('Satisfactory');
        expect(aqiCategory(180)).toBe('Moderate');
        expect(aqiCategory(200)).toBe('Moderate');
        expect(aqiCategory(300)).toBe('Poor');
        expect(aqiCategory(400)).toBe('Very Poor');
        expect(aqiCategory(401)).toBe('Severe');
    });
});

describe('indianAqiFromIndex', () => {
    it('maps the 1–5 provider index', () => {
        expect([1, 2, 3, 4, 5].map(indianAqiFromIndex)).toEqual([50, 100, 200, 300, 400]);
    });

    it('falls back to 100 for unknown indices', () => {
        expect(indianAqiFromIndex(0)).toBe(100);
        expect(indianAqiFromIndex(7)).toBe(100);
    });
});
