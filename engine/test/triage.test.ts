import { describe, it, expect } from 'vitest';
import { analyzeSymptoms, parseSymptomReport } from '../triage';
import { ValidationError } from '../errors';

describe('analyzeSymptoms', () => {
    it('flags severe symptoms as urgent', () => {
        const analysis = analyzeSymptoms(['chest_pain', 'headache', 'confusion'], 3);

        expect(analysis.isUrgent).toBe(true);
        expect(analysis.alerts).toEqual([
            {
                level: 'critical',
                message: 'URGENT: chest_pain, confusion detected',
                action: 'Seek immediate medical attention'
            }
        ]);
        expect(analysis.recommendations).toEqual(['Rest in cool, dark room. Stay hydrated']);
        expect(analysis.analysisTimestamp).toBeNull();
    });

    it('raises critical and high alerts for a severe, high-severity report', () => {
        const analysis = analyzeSymptoms(['chest_pain'], 9);
        expect(analysis.isUrgent).toBe(true);
        expect(analysis.alerts.map((a) => a.level)).toEqual(['critical', 'high']);
    });

    it('gives one recommendation and no alerts for a mild headache', () => {
        const analysis = analyzeSymptoms(['headache'], 3);
        expect(analysis.isUrgent).toBe(false);
        expect(analysis.alerts).toEqual([]);
        expect(analysis.recommendations).toHaveLength(1);
    });

    it('raises a high alert at severity 8 and above', () => {
        const analysis = analyzeSymptoms([], 8);
        expect(analysis.isUrgent).toBe(true);
        expect(analysis.alerts).toEqual([
            { level: 'high', message: 'High severity symptoms reported', action: 'Contact doctor or visit hospital' }
        ]);
        expect(analysis.recommendations).toEqual(['Monitor temperature. Take rest. Stay cool']);
    });

    it('raises a non-urgent medium alert at severity 6–7', () => {
        for (const severity of [6, 7]) {
            const analysis = analyzeSymptoms(['fatigue'], severity);
            expect(analysis.isUrgent).toBe(false);
            expect(analysis.alerts).toEqual([
                { level: 'medium', message: 'Moderate symptoms detected', action: 'Rest and monitor. Consult doctor if worsens' }
            ]);
            expect(analysis.recommendations).toEqual([
                'Drink water and electrolyte solution. Avoid exertion',
                'Monitor temperature. Take rest. Stay cool'
            ]);
        }
    });

    it('collects advice in table order', () => {
        const analysis = analyzeSymptoms(['nausea', 'breathing_difficulty', 'dizziness', 'headache'], 2);
        expect(analysis.alerts).toEqual([]);
        expect(analysis.isUrgent).toBe(false);
        expect(analysis.recommendations).toEqual([
            'Rest in cool, dark room. Stay hydrated',
            'Drink water and electrolyte solution. Avoid exertion',
            'Stay in air-conditioned space. Avoid polluted areas',
            'Sip water slowly. Eat light foods. Rest'
        ]);
    });

    it('detects persistent symptoms from the three most recent logs', () => {
        const analysis = analyzeSymptoms(['headache'], 4, [
            { severity: 5 },
            { severity: 6 },
            { severity: 7 },
            { severity: 1 }
        ]);
        expect(analysis.isUrgent).toBe(false);
        expect(analysis.alerts).toEqual([
            { level: 'high', message: 'Persistent symptoms detected', action: 'Schedule medical checkup' }
        ]);
    });

    it('needs at least three logs, each with severity 5 or more', () => {
        expect(analyzeSymptoms([], 1, [{ severity: 9 }, { severity: 9 }]).alerts).toEqual([]);
        expect(analyzeSymptoms([], 1, [{ severity: 9 }, { severity: 4 }, { severity: 9 }]).alerts).toEqual([]);
        expect(analyzeSymptoms([], 1, [{ severity: 9 }, {}, { severity: 9 }]).alerts).toEqual([]);
    });

    it('combines alerts in rule order', () => {
        const analysis = analyzeSymptoms(['severe_nausea'], 9, [{ severity: 8 }, { severity: 8 }, { severity: 8 }]);
        expect(analysis.isUrgent).toBe(true);
        expect(analysis.alerts.map((a) => a.message)).toEqual([
            'URGENT: severe_nausea detected',
            'High severity symptoms reported',
            'Persistent symptoms detected'
        ]);
    });

    it('handles an empty report', () => {
        expect(analyzeSymptoms([], 1)).toEqual({
            isUrgent: false,
            alerts: [],
            recommendations: [],
            analysisTimestamp: null
        });
    });
});

describe('parseSymptomReport', () => {
    it('rejects out-of-range or fractional severity', () => {
        expect(() => parseSymptomReport([], 0, undefined)).toThrow(ValidationError);
        expect(() => parseSymptomReport([], 11, undefined)).toThrow(ValidationError);
        expect(() => parseSymptomReport([], 5.5, undefined)).toThrow(ValidationError);
        expect(() => parseSymptomReport([], '5', undefined)).toThrow(ValidationError);
    });

    it('rejects non-list symptoms and history', () => {
        expect(() => parseSymptomReport('headache', 3, undefined)).toThrow(/symptoms must be a list/);
        expect(() => parseSymptomReport(['headache', 4], 3, undefined)).toThrow(ValidationError);
        expect(() => parseSymptomReport([], 3, { severity: 5 })).toThrow(/history must be a list/);
    });

    it('reads non-object history entries as empty entries', () => {
        const report = parseSymptomReport(['fatigue'], 3, [{ severity: 6 }, 'bad', null]);
        expect(report.history).toEqual([{ severity: 6 }, {}, {}]);
    });

    it('treats null history as empty', () => {
        expect(parseSymptomReport([], 3, null).history).toEqual([]);
    });
});
