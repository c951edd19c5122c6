/**
 * Random forest classifier.
 *
 * CART trees (Gini impurity, binary `x[f] <= threshold` splits) grown on
 * bootstrap samples with a random feature subset per split. Prediction
 * averages the leaf class distributions of all trees and returns the class
 * with the highest mean probability (ties go to the smaller class).
 *
 * Training is fully determined by the seed.
 */

import type { RandomForestState, TreeState } from '../types';
import { createRandom, randomInt, sampleIndices, type Random } from './random';
import type { Scorer } from './scorer';

export interface RandomForestOptions {
    /** Number of trees (default: 100) */
    nEstimators?: number;
    /** Maximum tree depth; the root is depth 0 (default: 10) */
    maxDepth?: number;
    /** Features considered per split (default: floor(sqrt(featureCount))) */
    maxFeatures?: number;
    /** Minimum samples required to split a node (default: 2) */
    minSamplesSplit?: number;
    seed?: number;
}

const LEAF = -1;
const MIN_IMPURITY_DECREASE = 1e-12;

export class RandomForestClassifier implements Scorer {
    readonly kind = 'random_forest' as const;

    private readonly nEstimators: number;
    private readonly maxDepth: number;
    private readonly minSamplesSplit: number;
    private readonly seed: number;
    private maxFeatures: number;
    private classes: number[] = [];
    private trees: TreeState[] = [];

    constructor(options: RandomForestOptions = {}) {
        this.nEstimators = options.nEstimators ?? 100;
        this.maxDepth = options.maxDepth ?? 10;
        this.minSamplesSplit = options.minSamplesSplit ?? 2;
        this.seed = options.seed ?? 42;
        this.maxFeatures = options.maxFeatures ?? 0;

        if (!Number.isInteger(this.nEstimators) || this.nEstimators < 1) {
            throw new Error(`nEstimators must be a positive integer, got ${this.nEstimators}`);
        }
        if (!Number.isInteger(this.maxDepth) || this.maxDepth < 0) {
            throw new Error(`maxDepth must be a non-negative integer, got ${this.maxDepth}`);
        }
    }

    static fromState(state: RandomForestState): RandomForestClassifier {
        const forest = new RandomForestClassifier({
            nEstimators: state.nEstimators,
            maxDepth: state.maxDepth,
            maxFeatures: state.maxFeatures,
            seed: state.seed
        });
        if (state.trees.length !== state.nEstimators) {
            throw new Error(`Forest state mismatch: expected ${state.nEstimators} trees, got ${state.trees.length}`);
        }
        for (const tree of state.trees) assertTreeShape(tree, state.classes.length);
        forest.classes = [...state.classes];
        forest.trees = state.trees.map(copyTree);
        return forest;
    }

    get isFitted(): boolean {
        return this.trees.length > 0;
    }

    fit(samples: ReadonlyArray<readonly number[]>, labels: readonly number[]): void {
        if (samples.length === 0) {
            throw new Error('Cannot fit forest on an empty sample set');
        }
        if (samples.length !== labels.length) {
            throw new Error(`Sample/label count mismatch: ${samples.length} vs ${labels.length}`);
        }

        const width = samples[0].length;
        if (this.maxFeatures <= 0) {
            this.maxFeatures = Math.max(1, Math.floor(Math.sqrt(width)));
        }

        this.classes = [...new Set(labels)].sort((a, b) => a - b);
        const classIndex = new Map(this.classes.map((c, i) => [c, i]));
        const y = labels.map((label) => classIndex.get(label) ?? 0);

        const random = createRandom(this.seed);
        const trees: TreeState[] = [];
        for (let t = 0; t < this.nEstimators; t++) {
            const bootstrap = Array.from({ length: samples.length }, () =>
                randomInt(random, 0, samples.length)
            );
            const builder = new TreeBuilder(samples, y, this.classes.length, {
                maxDepth: this.maxDepth,
                maxFeatures: Math.min(this.maxFeatures, width),
                minSamplesSplit: this.minSamplesSplit,
                random
            });
            trees.push(builder.build(bootstrap));
        }
        this.trees = trees;
    }

    /**
     * Mean class probabilities, aligned with the fitted classes.
     */
    predictProba(sample: readonly number[]): number[] {
        if (!this.isFitted) {
            throw new Error('Forest has not been fitted');
        }
        const totals = new Array<number>(this.classes.length).fill(0);
        for (const tree of this.trees) {
            const distribution = tree.distributions[findLeaf(tree, sample)];
            for (let c = 0; c < totals.length; c++) totals[c] += distribution[c];
        }
        return totals.map((total) => total / this.trees.length);
    }

    predict(sample: readonly number[]): number {
        const proba = this.predictProba(sample);
        let best = 0;
        for (let c = 1; c < proba.length; c++) {
            if (proba[c] > proba[best]) best = c;
        }
        return this.classes[best];
    }

    save(): RandomForestState {
        if (!this.isFitted) {
            throw new Error('Cannot save a forest that has not been fitted');
        }
        return {
            kind: this.kind,
            classes: [...this.classes],
            nEstimators: this.nEstimators,
            maxDepth: this.maxDepth,
            maxFeatures: this.maxFeatures,
            seed: this.seed,
            trees: this.trees.map(copyTree)
        };
    }
}

// =============================================================================
// Tree Construction
// =============================================================================

interface TreeBuilderOptions {
    maxDepth: number;
    maxFeatures: number;
    minSamplesSplit: number;
    random: Random;
}

interface Split {
    feature: number;
    threshold: number;
    decrease: number;
}

class TreeBuilder {
    private readonly tree: TreeState = {
        feature: [],
        threshold: [],
        left: [],
        right: [],
        distributions: []
    };

    constructor(
        private readonly samples: ReadonlyArray<readonly number[]>,
        private readonly y: readonly number[],
        private readonly classCount: number,
        private readonly options: TreeBuilderOptions
    ) { }

    build(indices: number[]): TreeState {
        this.grow(indices, 0);
        return this.tree;
    }

    private grow(indices: number[], depth: number): number {
        const counts = this.countClasses(indices);
        const node = this.addNode(counts, indices.length);

        const pure = counts.filter((c) => c > 0).length <= 1;
        if (pure || depth >= this.options.maxDepth || indices.length < this.options.minSamplesSplit) {
            return node;
        }

        const split = this.findBestSplit(indices, counts);
        if (!split) return node;

        const leftIndices: number[] = [];
        const rightIndices: number[] = [];
        for (const i of indices) {
            if (this.samples[i][split.feature] <= split.threshold) leftIndices.push(i);
            else rightIndices.push(i);
        }

        this.tree.feature[node] = split.feature;
        this.tree.threshold[node] = split.threshold;
        this.tree.left[node] = this.grow(leftIndices, depth + 1);
        this.tree.right[node] = this.grow(rightIndices, depth + 1);
        return node;
    }

    private addNode(counts: number[], total: number): number {
        const node = this.tree.feature.length;
        this.tree.feature.push(LEAF);
        this.tree.threshold.push(0);
        this.tree.left.push(LEAF);
        this.tree.right.push(LEAF);
        this.tree.distributions.push(counts.map((c) => c / total));
        return node;
    }

    private countClasses(indices: readonly number[]): number[] {
        const counts = new Array<number>(this.classCount).fill(0);
        for (const i of indices) counts[this.y[i]]++;
        return counts;
    }

    private findBestSplit(indices: number[], counts: readonly number[]): Split | null {
        const n = indices.length;
        const parentImpurity = gini(counts, n);
        const width = this.samples[indices[0]].length;
        const features = sampleIndices(this.options.random, width, this.options.maxFeatures);

        let best: Split | null = null;
        for (const feature of features) {
            const sorted = [...indices].sort((a, b) => this.samples[a][feature] - this.samples[b][feature]);
            const leftCounts = new Array<number>(this.classCount).fill(0);
            const rightCounts = [...counts];

            for (let k = 0; k < n - 1; k++) {
                const cls = this.y[sorted[k]];
                leftCounts[cls]++;
                rightCounts[cls]--;

                const current = this.samples[sorted[k]][feature];
                const next = this.samples[sorted[k + 1]][feature];
                if (current === next) continue;

                const nLeft = k + 1;
                const nRight = n - nLeft;
                const childImpurity =
                    (nLeft * gini(leftCounts, nLeft) + nRight * gini(rightCounts, nRight)) / n;
                const decrease = parentImpurity - childImpurity;

                if (decrease > MIN_IMPURITY_DECREASE && (!best || decrease > best.decrease)) {
                    const mid = (current + next) / 2;
                    best = { feature, threshold: mid < next ? mid : current, decrease };
                }
            }
        }
        return best;
    }
}

function gini(counts: readonly number[], total: number): number {
    if (total === 0) return 0;
    let sumSq = 0;
    for (const c of counts) sumSq += c * c;
    return 1 - sumSq / (total * total);
}

// =============================================================================
// Tree Traversal & State
// =============================================================================

function findLeaf(tree: TreeState, sample: readonly number[]): number {
    let node = 0;
    while (tree.feature[node] !== LEAF) {
        node = sample[tree.feature[node]] <= tree.threshold[node] ? tree.left[node] : tree.right[node];
    }
    return node;
}

function copyTree(tree: TreeState): TreeState {
    return {
        feature: [...tree.feature],
        threshold: [...tree.threshold],
        left: [...tree.left],
        right: [...tree.right],
        distributions: tree.distributions.map((d) => [...d])
    };
}

function assertTreeShape(tree: TreeState, classCount: number): void {
    const size = tree.feature.length;
    if (
        size === 0 ||
        tree.threshold.length !== size ||
        tree.left.length !== size ||
        tree.right.length !== size ||
        tree.distributions.length !== size
    ) {
        throw new Error('Tree state mismatch: node arrays differ in length');
    }
    for (let node = 0; node < size; node++) {
        if (tree.distributions[node].length !== classCount) {
            throw new Error(`Tree state mismatch: node ${node} has a malformed class distribution`);
        }
        if (tree.feature[node] === LEAF) continue;
        const children = [tree.left[node], tree.right[node]];
        if (children.some((child) => child <= node || child >= size)) {
            throw new Error(`Tree state mismatch: node ${node} has an invalid child`);
        }
    }
}
