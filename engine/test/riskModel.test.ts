import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RiskModel, trainModel, restoreModel } from '../model/riskModel';
import { MemoryStorage, type StorageBackend } from '../storage';
import { ModelNotReadyError, PersistenceWarning } from '../errors';
import { severityLevel } from '../severity';
import { recommend } from '../recommendations';
import { makeAirQuality, makeWeather } from './fixtures';

const MODEL_PATH = 'models/risk_model.bin';
const TRAINING = { sampleCount: 200, nEstimators: 5, maxDepth: 6 };
const fixedClock = () => new Date('2026-05-01T00:00:00.000Z');

class FailingWriteStorage extends MemoryStorage {
    async put(): Promise<void> {
        throw new Error('disk full');
    }
}

function createModel(storage: StorageBackend, usePretrained = true): RiskModel {
    return new RiskModel({ storage, modelPath: MODEL_PATH, usePretrained, training: TRAINING, now: fixedClock });
}

describe('RiskModel', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const weather = makeWeather({ temperature: 41, heatIndex: 55, humidity: 60, uvIndex: 9 });
    const airQuality = makeAirQuality({ aqi: 320, pm2_5: 150 });

    it('refuses to score before bootstrap', () => {
        const model = createModel(new MemoryStorage());
        expect(model.isReady).toBe(false);
        expect(model.artifactId).toBeNull();
        expect(() => model.predictRisk({}, weather, airQuality)).toThrow(ModelNotReadyError);
    });

    it('trains and saves when nothing is stored', async () => {
        const storage = new MemoryStorage();
        const model = createModel(storage);

        const report = await model.trainOrLoad();

        expect(report.source).toBe('trained');
        expect(report.warnings).toEqual([]);
        expect(report.artifactId).toMatch(/^[0-9a-f]{64}$/);
        expect(model.isReady).toBe(true);
        expect(model.artifactId).toBe(report.artifactId);
        expect(await storage.exists(MODEL_PATH)).toBe(true);
    });

    it('loads the stored model and scores identically', async () => {
        const storage = new MemoryStorage();
        const first = createModel(storage);
        const trained = await first.trainOrLoad();

        const second = createModel(storage);
        const loaded = await second.trainOrLoad();

        expect(loaded.source).toBe('loaded');
        expect(loaded.artifactId).toBe(trained.artifactId);

        const profiles = [{}, { age: 70, outdoorHours: 9, healthConditions: ['asthma'] }, { age: 20, outdoorHours: 1 }];
        for (const profile of profiles) {
            expect(second.predictRisk(profile, weather, airQuality)).toEqual(first.predictRisk(profile, weather, airQuality));
        }
    });

    it('shares one bootstrap between concurrent callers', async () => {
        const model = createModel(new MemoryStorage());
        const a = model.trainOrLoad();
        const b = model.trainOrLoad();
        expect(a).toBe(b);
        await a;
        expect(model.trainOrLoad()).toBe(a);
    });

    it('retrains when the stored blob is corrupt', async () => {
        const storage = new MemoryStorage();
        await storage.put(MODEL_PATH, new Uint8Array([1, 2, 3, 4]));

        const report = await createModel(storage).trainOrLoad();

        expect(report.source).toBe('trained');
        expect(report.warnings).toHaveLength(1);
        expect(report.warnings[0]).toBeInstanceOf(PersistenceWarning);
        expect(report.warnings[0].operation).toBe('load');
        expect(report.warnings[0].message).toBe(
            `Could not load pretrained model from ${MODEL_PATH}, training new one: Blob too small: missing header`
        );

        const reloaded = await createModel(storage).trainOrLoad();
        expect(reloaded.source).toBe('loaded');
    });

    it('ignores the stored model when pretrained use is off', async () => {
        const storage = new MemoryStorage();
        await createModel(storage).trainOrLoad();

        const report = await createModel(storage, false).trainOrLoad();
        expect(report.source).toBe('trained');
    });

    it('keeps serving from memory when the save fails', async () => {
        const model = createModel(new FailingWriteStorage());
        const report = await model.trainOrLoad();

        expect(report.source).toBe('trained');
        expect(report.warnings.map((w) => [w.operation, w.message])).toEqual([
            ['save', `Could not save model to ${MODEL_PATH}: disk full`]
        ]);
        expect(model.isReady).toBe(true);
        expect(() => model.predictRisk({}, weather, airQuality)).not.toThrow();
    });

    it('allows a retry after a failed bootstrap', async () => {
        const model = new RiskModel({
            storage: new MemoryStorage(),
            modelPath: MODEL_PATH,
            training: { sampleCount: 0 }
        });

        const first = model.trainOrLoad();
        await expect(first).rejects.toThrow(/positive integer/);
        expect(model.isReady).toBe(false);

        const second = model.trainOrLoad();
        expect(second).not.toBe(first);
        await expect(second).rejects.toThrow(/positive integer/);
    });

    it('builds an assessment from the score', async () => {
        const model = createModel(new MemoryStorage());
        await model.trainOrLoad();

        const profile = { age: 68, outdoorHours: 8, healthConditions: ['hypertension'] };
        const assessment = model.predictRisk(profile, weather, airQuality);

        expect(Number.isInteger(assessment.riskScore)).toBe(true);
        expect(assessment.riskScore).toBeGreaterThanOrEqual(0);
        expect(assessment.riskScore).toBeLessThanOrEqual(10);
        expect(assessment.severityLevel).toBe(severityLevel(assessment.riskScore));
        expect(assessment.recommendations).toEqual(recommend(assessment.riskScore, profile, weather, airQuality));
        expect(assessment.timestamp).toBe(weather.timestamp);
    });
});

describe('trainModel', () => {
    it('is deterministic for a seed and clock', () => {
        const a = trainModel(TRAINING, fixedClock());
        const b = trainModel(TRAINING, fixedClock());
        expect(a.artifact).toEqual(b.artifact);
    });

    it('restores a model that scores like the trained one', () => {
        const trained = trainModel(TRAINING, fixedClock());
        const restored = restoreModel(trained.artifact);
        const row = trained.scaler.transform([38, 45, 60, 8, 250, 120, 50, 5, 1]);

        expect(restored.scorer.predict(row)).toBe(trained.scorer.predict(row));
    });
});
