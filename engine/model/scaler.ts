/**
 * Standard scaler: per-feature zero mean, unit variance.
 *
 * Uses the population standard deviation. A feature with zero variance is
 * scaled by 1 so it maps to 0 rather than NaN.
 */

import type { ScalerState } from '../types';

export class StandardScaler {
    private constructor(
        private readonly mean: readonly number[],
        private readonly scale: readonly number[]
    ) { }

    static fit(samples: ReadonlyArray<readonly number[]>): StandardScaler {
        if (samples.length === 0) {
            throw new Error('Cannot fit scaler on an empty sample set');
        }

        const width = samples[0].length;
        const mean = new Array<number>(width).fill(0);
        const scale = new Array<number>(width).fill(0);

        for (const row of samples) {
            for (let j = 0; j < width; j++) mean[j] += row[j];
        }
        for (let j = 0; j < width; j++) mean[j] /= samples.length;

        for (const row of samples) {
            for (let j = 0; j < width; j++) {
                const d = row[j] - mean[j];
                scale[j] += d * d;
            }
        }
        for (let j = 0; j < width; j++) {
            const std = Math.sqrt(scale[j] / samples.length);
            scale[j] = std > 0 ? std : 1;
        }

        return new StandardScaler(mean, scale);
    }

    static fromState(state: ScalerState): StandardScaler {
        if (state.mean.length !== state.scale.length) {
            throw new Error('Scaler state mismatch: mean and scale differ in length');
        }
        return new StandardScaler([...state.mean], [...state.scale]);
    }

    get width(): number {
        return this.mean.length;
    }

    transform(row: readonly number[]): number[] {
        if (row.length !== this.mean.length) {
            throw new Error(`Scaler expects ${this.mean.length} features, got ${row.length}`);
        }
        return row.map((value, j) => (value - this.mean[j]) / this.scale[j]);
    }

    transformAll(rows: ReadonlyArray<readonly number[]>): number[][] {
        return rows.map((row) => this.transform(row));
    }

    toState(): ScalerState {
        return { mean: [...this.mean], scale: [...this.scale] };
    }
}
