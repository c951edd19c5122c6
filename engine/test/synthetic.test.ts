import { describe, it, expect } from 'vitest';
import { clampLabel, ruleRiskScore, synthesizeDataset } from '../model/synthetic';

describe('ruleRiskScore', () => {
    it('adds up every matching rule', () => {
        expect(ruleRiskScore([41, 50, 50, 9, 350, 100, 65, 7, 0])).toBe(9);
        expect(ruleRiskScore([36, 40, 50, 8, 250, 100, 30, 6, 1])).toBe(5);
        expect(ruleRiskScore([33, 35, 50, 2, 150, 50, 30, 2, 0])).toBe(2);
    });

    it('is zero in mild conditions', () => {
        expect(ruleRiskScore([25, 25, 40, 3, 50, 20, 30, 2, 0])).toBe(0);
    });
});

describe('synthesizeDataset', () => {
    it('is reproducible for a seed', () => {
        expect(synthesizeDataset(50, 42)).toEqual(synthesizeDataset(50, 42));
        expect(synthesizeDataset(50, 42)).not.toEqual(synthesizeDataset(50, 43));
    });

    it('draws features inside their ranges', () => {
        const { samples, labels } = synthesizeDataset(300, 7);
        expect(samples).toHaveLength(300);
        expect(labels).toHaveLength(300);

        for (const [t, hi, rh, uv, aqi, pm, age, hours, health] of samples) {
            expect(t).toBeGreaterThanOrEqual(20);
            expect(t).toBeLessThan(45);
            expect(hi).toBeGreaterThanOrEqual(25);
            expect(hi).toBeLessThan(55);
            expect(rh).toBeGreaterThanOrEqual(20);
            expect(rh).toBeLessThan(80);
            expect(uv).toBeLessThan(11);
            expect(aqi).toBeLessThan(400);
            expect(pm).toBeLessThan(200);
            expect(age).toBeGreaterThanOrEqual(18);
            expect(age).toBeLessThan(78);
            expect(hours).toBeLessThan(12);
            expect([0, 1]).toContain(health);
        }
    });

    it('labels within one step of the rule score, clipped to 0–10', () => {
        const { samples, labels } = synthesizeDataset(300, 7);
        samples.forEach((sample, i) => {
            const label = labels[i];
            expect(Number.isInteger(label)).toBe(true);
            expect(label).toBeGreaterThanOrEqual(0);
            expect(label).toBeLessThanOrEqual(10);
            expect(Math.abs(label - ruleRiskScore(sample))).toBeLessThanOrEqual(1);
        });
    });

    it('rejects a non-positive sample count', () => {
        expect(() => synthesizeDataset(0)).toThrow(/positive integer/);
    });
});

describe('clampLabel', () => {
    it('clips to the label range', () => {
        expect(clampLabel(-1)).toBe(0);
        expect(clampLabel(11)).toBe(10);
        expect(clampLabel(4)).toBe(4);
    });
});
