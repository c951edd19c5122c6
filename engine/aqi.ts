/**
 * Heat Risk Engine — Air Quality Helpers (Indian AQI scale)
 */

import type { AqiCategory } from './types';

/**
 * Upstream providers report a coarse 1–5 index; map it onto the 0–500 scale.
 */
const INDEX_TO_AQI: Record<number, number> = {
    1: 50,
    2: 100,
    3: 200,
    4: 300,
    5: 400
};

const DEFAULT_AQI = 100;

export function indianAqiFromIndex(index: number): number {
    return INDEX_TO_AQI[index] ?? DEFAULT_AQI;
}

export function aqiCategory(aqi: number): AqiCategory {
    if (aqi <= 50) return 'Good';
    if (aqi <= 100) return 'Satisfactory';
    if (aqi <= 200) return 'Moderate';
    if (aqi <= 300) return 'Poor';
    if (aqi <= 400) return 'Very Poor';
    return 'Severe';
}
