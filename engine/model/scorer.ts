/**
 * Scorer capability: anything that can be fitted on scaled feature rows with
 * integer risk labels, score a single row, and snapshot itself for storage.
 */

import type { ScorerState } from '../types';
import { RandomForestClassifier } from './forest';

export interface Scorer {
    readonly kind: ScorerState['kind'];
    fit(samples: ReadonlyArray<readonly number[]>, labels: readonly number[]): void;
    predict(sample: readonly number[]): number;
    save(): ScorerState;
}

/**
 * Rebuild a scorer from its persisted state.
 */
export function loadScorer(state: ScorerState): Scorer {
    switch (state.kind) {
        case 'random_forest':
            return RandomForestClassifier.fromState(state);
        default: {
            const unknown: ScorerState = state;
            throw new Error(`Unknown scorer kind: ${JSON.stringify(unknown)}`);
        }
    }
}
