/**
 * Synthetic training data.
 *
 * Each sample draws 9 uniform variates and rescales them into realistic
 * ranges (column order = FEATURE_NAMES). Labels come from a fixed rule score
 * plus a seeded perturbation in {-1, 0, +1}, clipped to [0, 10].
 */

import type { FeatureVector } from '../types';
import { createRandom, randomInt } from './random';

export const DEFAULT_SAMPLE_COUNT = 1000;
export const DEFAULT_SEED = 42;

export const MIN_RISK_LABEL = 0;
export const MAX_RISK_LABEL = 10;

/** [offset, span] per feature: value = offset + u * span */
const FEATURE_RANGES: ReadonlyArray<readonly [number, number]> = [
    [20, 25], // temperature: 20–45 °C
    [25, 30], // heat index: 25–55 °C
    [20, 60], // humidity: 20–80 %
    [0, 11], // UV index
    [0, 400], // AQI
    [0, 200], // PM2.5
    [18, 60], // age: 18–78
    [0, 12] // outdoor hours
];

export interface SyntheticDataset {
    samples: FeatureVector[];
    labels: number[];
}

/**
 * Deterministic rule score for a raw (unscaled) feature vector.
 */
export function ruleRiskScore(features: FeatureVector): number {
    const [temperature, , , uvIndex, aqi, , age, outdoorHours, healthCondition] = features;
    let risk = 0;

    if (temperature > 40) risk += 3;
    else if (temperature > 35) risk += 2;
    else if (temperature > 32) risk += 1;

    if (aqi > 300) risk += 3;
    else if (aqi > 200) risk += 2;
    else if (aqi > 100) risk += 1;

    if (uvIndex > 8) risk += 1;

    if (age > 60 || healthCondition === 1) risk += 1;

    if (outdoorHours > 6) risk += 1;

    return risk;
}

export function clampLabel(value: number): number {
    return Math.min(MAX_RISK_LABEL, Math.max(MIN_RISK_LABEL, value));
}

export function synthesizeDataset(
    sampleCount: number = DEFAULT_SAMPLE_COUNT,
    seed: number = DEFAULT_SEED
): SyntheticDataset {
    if (!Number.isInteger(sampleCount) || sampleCount < 1) {
        throw new Error(`sampleCount must be a positive integer, got ${sampleCount}`);
    }

    const random = createRandom(seed);
    const samples: FeatureVector[] = [];

    for (let i = 0; i < sampleCount; i++) {
        const [t, hi, rh, uv, aqi, pm, age, hours] = FEATURE_RANGES.map(
            ([offset, span]) => offset + random() * span
        );
        const healthCondition = random() < 0.5 ? 0 : 1;
        samples.push([t, hi, rh, uv, aqi, pm, age, hours, healthCondition]);
    }

    const labels = samples.map((sample) =>
        clampLabel(ruleRiskScore(sample) + randomInt(random, -1, 2))
    );

    return { samples, labels };
}
