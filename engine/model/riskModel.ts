/**
 * Heat Risk Engine — Risk Model
 *
 * Owns the (scorer, scaler) pair. The pair is trained or loaded once by
 * trainOrLoad(), frozen, then published in a single assignment; from then on
 * every predictRisk() call reads it without locking. Calls made before
 * publication throw ModelNotReadyError.
 */

import { computeArtifactId, packageArtifact, unpackageArtifact } from '../artifact';
import { describeError, ModelNotReadyError, PersistenceWarning } from '../errors';
import { vectorize } from '../features';
import { recommend } from '../recommendations';
import { severityLevel } from '../severity';
import type { StorageBackend } from '../storage';
import {
    type AirQualityReading,
    type FeatureVector,
    type RiskAssessment,
    type RiskModelArtifact,
    type UserProfile,
    type WeatherReading,
    CURRENT_SCHEMA_VERSION,
    FEATURE_NAMES
} from '../types';
import { RandomForestClassifier } from './forest';
import { StandardScaler } from './scaler';
import { loadScorer, type Scorer } from './scorer';
import { DEFAULT_SAMPLE_COUNT, DEFAULT_SEED, synthesizeDataset } from './synthetic';

// =============================================================================
// Training
// =============================================================================

export interface TrainingOptions {
    /** Synthetic samples (default: 1000) */
    sampleCount?: number;
    /** Seed for both the synthetic data and the forest (default: 42) */
    seed?: number;
    /** Trees in the forest (default: 100) */
    nEstimators?: number;
    /** Maximum tree depth (default: 10) */
    maxDepth?: number;
}

export interface TrainedModel {
    readonly artifact: RiskModelArtifact;
    readonly scaler: StandardScaler;
    readonly scorer: Scorer;
}

/**
 * Synthesize the training set, fit the scaler, fit the forest on the scaled
 * rows, and bundle the result as an artifact.
 */
export function trainModel(options: TrainingOptions = {}, trainedAt: Date = new Date()): TrainedModel {
    const sampleCount = options.sampleCount ?? DEFAULT_SAMPLE_COUNT;
    const seed = options.seed ?? DEFAULT_SEED;

    const { samples, labels } = synthesizeDataset(sampleCount, seed);
    const scaler = StandardScaler.fit(samples);
    const scorer = new RandomForestClassifier({
        nEstimators: options.nEstimators ?? 100,
        maxDepth: options.maxDepth ?? 10,
        seed
    });
    scorer.fit(scaler.transformAll(samples), labels);

    const artifact: RiskModelArtifact = {
        schemaVersion: CURRENT_SCHEMA_VERSION,
        type: 'risk_model',
        featureNames: [...FEATURE_NAMES],
        seed,
        sampleCount,
        trainedAt: trainedAt.toISOString(),
        scaler: scaler.toState(),
        scorer: scorer.save()
    };

    return { artifact, scaler, scorer };
}

/**
 * Rebuild a usable model from a validated artifact.
 */
export function restoreModel(artifact: RiskModelArtifact): TrainedModel {
    return {
        artifact,
        scaler: StandardScaler.fromState(artifact.scaler),
        scorer: loadScorer(artifact.scorer)
    };
}

// =============================================================================
// Shared Model Owner
// =============================================================================

export interface RiskModelOptions {
    storage: StorageBackend;
    /** Storage key of the persisted artifact */
    modelPath: string;
    /** Load a persisted artifact when one exists (default: true) */
    usePretrained?: boolean;
    training?: TrainingOptions;
    /** Override the training clock (for deterministic artifacts) */
    now?: () => Date;
}

export interface BootstrapReport {
    source: 'loaded' | 'trained';
    /** Null when a freshly trained artifact could not be packaged */
    artifactId: string | null;
    warnings: PersistenceWarning[];
}

interface PublishedModel {
    readonly model: TrainedModel;
    readonly artifactId: string | null;
}

export class RiskModel {
    private published: PublishedModel | null = null;
    private bootstrapping: Promise<BootstrapReport> | null = null;

    constructor(private readonly options: RiskModelOptions) { }

    get isReady(): boolean {
        return this.published !== null;
    }

    get artifactId(): string | null {
        return this.published?.artifactId ?? null;
    }

    /**
     * Load the persisted model or train a new one. Idempotent: concurrent and
     * repeated callers share the same bootstrap. A failed bootstrap may be
     * retried.
     */
    trainOrLoad(): Promise<BootstrapReport> {
        if (!this.bootstrapping) {
            this.bootstrapping = this.bootstrap().catch((error: unknown) => {
                this.bootstrapping = null;
                throw error;
            });
        }
        return this.bootstrapping;
    }

    /**
     * Raw model output for an already-built feature vector.
     */
    score(features: FeatureVector): number {
        const { model } = this.requireReady();
        return model.scorer.predict(model.scaler.transform(features));
    }

    predictRisk(
        profile: UserProfile | null | undefined,
        weather: WeatherReading,
        airQuality: AirQualityReading
    ): RiskAssessment {
        this.requireReady();
        const features = vectorize(profile, weather, airQuality);
        const riskScore = this.score(features);

        return {
            riskScore,
            severityLevel: severityLevel(riskScore),
            recommendations: recommend(riskScore, profile, weather, airQuality),
            timestamp: weather.timestamp
        };
    }

    private requireReady(): PublishedModel {
        if (!this.published) {
            throw new ModelNotReadyError();
        }
        return this.published;
    }

    private publish(model: TrainedModel, artifactId: string | null): void {
        this.published = Object.freeze({ model: Object.freeze(model), artifactId });
    }

    private async bootstrap(): Promise<BootstrapReport> {
        const { storage, modelPath, usePretrained = true } = this.options;
        const warnings: PersistenceWarning[] = [];

        if (usePretrained) {
            try {
                const blob = await storage.get(modelPath);
                if (blob) {
                    const artifact = await unpackageArtifact(blob);
                    const artifactId = computeArtifactId(artifact);
                    this.publish(restoreModel(artifact), artifactId);
                    console.log(`[model] Loaded pretrained model ${artifactId.slice(0, 12)}... from ${modelPath}`);
                    return { source: 'loaded', artifactId, warnings };
                }
            } catch (error) {
                warnings.push(
                    reportWarning('load', `Could not load pretrained model from ${modelPath}, training new one: ${describeError(error)}`, error)
                );
            }
        }

        const now = this.options.now?.() ?? new Date();
        console.log('[model] Training risk model on synthetic data...');
        const model = trainModel(this.options.training, now);

        let artifactId: string | null = null;
        try {
            const packaged = await packageArtifact(model.artifact);
            artifactId = packaged.hash;
            this.publish(model, artifactId);
            await storage.put(modelPath, packaged.blob);
            console.log(`[model] Model trained and saved to ${modelPath} → ${artifactId.slice(0, 12)}...`);
        } catch (error) {
            if (!this.published) this.publish(model, artifactId);
            warnings.push(reportWarning('save', `Could not save model to ${modelPath}: ${describeError(error)}`, error));
        }

        return { source: 'trained', artifactId, warnings };
    }
}

function reportWarning(operation: 'load' | 'save', message: string, cause: unknown): PersistenceWarning {
    const warning = new PersistenceWarning(operation, message, { cause });
    console.warn(`[model] ${message}`);
    return warning;
}
