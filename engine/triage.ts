/**
 * Heat Risk Engine — Symptom Triage
 *
 * Stateless rule evaluation over a symptom set, a self-reported severity
 * (integer 1–10) and the most-recent-first history of prior logs.
 *
 * Only the severe-symptom rule and the severity >= 8 rule set isUrgent.
 * The persistent-symptoms rule raises a high alert without urgency.
 */

import { ValidationError } from './errors';
import { isStringArray } from './guards';
import type { Alert, SymptomAnalysis, SymptomHistoryEntry } from './types';

export const SEVERE_SYMPTOMS: ReadonlySet<string> = new Set([
    'chest_pain',
    'severe_headache',
    'difficulty_breathing',
    'confusion',
    'loss_of_consciousness',
    'severe_nausea'
]);

export const MIN_SEVERITY = 1;
export const MAX_SEVERITY = 10;

/** Number of most recent history entries inspected for persistence. */
const PERSISTENCE_WINDOW = 3;
const PERSISTENCE_MIN_SEVERITY = 5;

export interface SymptomReport {
    symptoms: readonly string[];
    severity: number;
    history: readonly SymptomHistoryEntry[];
}

interface AlertRule {
    id: string;
    urgent: boolean;
    evaluate(input: SymptomReport): Alert | null;
}

interface AdviceRule {
    id: string;
    applies(input: SymptomReport): boolean;
    advice: string;
}

// =============================================================================
// Rule Tables
// =============================================================================

export const ALERT_RULES: readonly AlertRule[] = [
    {
        id: 'severe_symptoms',
        urgent: true,
        evaluate: ({ symptoms }) => {
            const severe = symptoms.filter((s) => SEVERE_SYMPTOMS.has(s));
            if (severe.length === 0) return null;
            return {
                level: 'critical',
                message: `URGENT: ${severe.join(', ')} detected`,
                action: 'Seek immediate medical attention'
            };
        }
    },
    {
        id: 'high_severity',
        urgent: true,
        evaluate: ({ severity }) =>
            severity >= 8
                ? {
                    level: 'high',
                    message: 'High severity symptoms reported',
                    action: 'Contact doctor or visit hospital'
                }
                : null
    },
    {
        id: 'moderate_severity',
        urgent: false,
        evaluate: ({ severity }) =>
            severity >= 6 && severity < 8
                ? {
                    level: 'medium',
                    message: 'Moderate symptoms detected',
                    action: 'Rest and monitor. Consult doctor if worsens'
                }
                : null
    },
    {
        id: 'persistent_symptoms',
        urgent: false,
        evaluate: ({ history }) => {
            if (history.length < PERSISTENCE_WINDOW) return null;
            const recent = history.slice(0, PERSISTENCE_WINDOW).map(historySeverity);
            if (!recent.every((s) => s >= PERSISTENCE_MIN_SEVERITY)) return null;
            return {
                level: 'high',
                message: 'Persistent symptoms detected',
                action: 'Schedule medical checkup'
            };
        }
    }
];

export const ADVICE_RULES: readonly AdviceRule[] = [
    {
        id: 'headache',
        applies: ({ symptoms }) => symptoms.includes('headache'),
        advice: 'Rest in cool, dark room. Stay hydrated'
    },
    {
        id: 'fatigue_or_dizziness',
        applies: ({ symptoms }) => symptoms.includes('fatigue') || symptoms.includes('dizziness'),
        advice: 'Drink water and electrolyte solution. Avoid exertion'
    },
    {
        id: 'breathing_difficulty',
        applies: ({ symptoms }) => symptoms.includes('breathing_difficulty'),
        advice: 'Stay in air-conditioned space. Avoid polluted areas'
    },
    {
        id: 'nausea',
        applies: ({ symptoms }) => symptoms.includes('nausea'),
        advice: 'Sip water slowly. Eat light foods. Rest'
    },
    {
        id: 'elevated_severity',
        applies: ({ severity }) => severity >= 5,
        advice: 'Monitor temperature. Take rest. Stay cool'
    }
];

// =============================================================================
// Analyzer
// =============================================================================

export function analyzeSymptoms(
    symptoms: readonly string[],
    severity: number,
    history?: readonly SymptomHistoryEntry[] | null
): SymptomAnalysis {
    const input = parseSymptomReport(symptoms, severity, history);

    let isUrgent = false;
    const alerts: Alert[] = [];
    for (const rule of ALERT_RULES) {
        const alert = rule.evaluate(input);
        if (!alert) continue;
        alerts.push(alert);
        if (rule.urgent) isUrgent = true;
    }

    const recommendations = ADVICE_RULES
        .filter((rule) => rule.applies(input))
        .map((rule) => rule.advice);

    return {
        isUrgent,
        alerts,
        recommendations,
        analysisTimestamp: null
    };
}

/**
 * Validate an untrusted report (e.g. a JSON request body) field by field.
 * Non-object history entries are read as entries without a severity.
 */
export function parseSymptomReport(
    symptoms: unknown,
    severity: unknown,
    history: unknown
): SymptomReport {
    if (!isStringArray(symptoms)) {
        throw new ValidationError('symptoms', 'symptoms must be a list of strings');
    }
    if (
        typeof severity !== 'number' ||
        !Number.isInteger(severity) ||
        severity < MIN_SEVERITY ||
        severity > MAX_SEVERITY
    ) {
        throw new ValidationError(
            'severity',
            `severity must be an integer between ${MIN_SEVERITY} and ${MAX_SEVERITY}`
        );
    }
    if (history !== undefined && history !== null && !Array.isArray(history)) {
        throw new ValidationError('history', 'history must be a list of prior symptom logs');
    }

    return {
        symptoms,
        severity,
        history: Array.isArray(history) ? history.map((entry): SymptomHistoryEntry => (isHistoryEntry(entry) ? entry : {})) : []
    };
}

/** Entries without a numeric severity count as 0. */
function historySeverity(entry: SymptomHistoryEntry): number {
    return typeof entry.severity === 'number' ? entry.severity : 0;
}

function isHistoryEntry(value: unknown): value is SymptomHistoryEntry {
    return typeof value === 'object' && value !== null;
}
