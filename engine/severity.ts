/**
 * Heat Risk Engine — Severity Banding
 */

import type { SeverityLevel } from './types';

/** Inclusive upper bounds, checked in order. */
const SEVERITY_BANDS: ReadonlyArray<{ max: number; level: SeverityLevel }> = [
    { max: 2, level: 'Low' },
    { max: 5, level: 'Moderate' },
    { max: 7, level: 'High' }
];

export function severityLevel(riskScore: number): SeverityLevel {
    for (const band of SEVERITY_BANDS) {
        if (riskScore <= band.max) return band.level;
    }
    return 'Very High';
}
