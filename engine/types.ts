/**
 * Heat Risk Engine — Core Type Definitions
 *
 * Readings come from an external fetch layer (live or mock) and are never
 * mutated by the engine. Assessments and analyses are created per request.
 */

// =============================================================================
// Environmental Readings
// =============================================================================

export interface WeatherReading {
    /** Ambient temperature (°C) */
    readonly temperature: number;

    /** Feels-like temperature (°C), derived from temperature + humidity */
    readonly heatIndex: number;

    /** Relative humidity (%) */
    readonly humidity: number;

    /** UV index (0–11+) */
    readonly uvIndex: number;

    readonly description: string;

    /** ISO 8601 UTC */
    readonly timestamp: string;

    readonly location: string;
}

export type AqiCategory =
    | 'Good'
    | 'Satisfactory'
    | 'Moderate'
    | 'Poor'
    | 'Very Poor'
    | 'Severe';

export interface AirQualityReading {
    /** Indian AQI scale (0–500) */
    readonly aqi: number;
    readonly category: AqiCategory;

    // Pollutant concentrations in source units
    readonly pm2_5: number;
    readonly pm10: number;
    readonly no2: number;
    readonly so2: number;
    readonly co: number;
    readonly o3: number;

    /** ISO 8601 UTC */
    readonly timestamp: string;
}

// =============================================================================
// User Profile
// =============================================================================

/**
 * Risk-engine view of a user. Only age, outdoor hours and health conditions
 * feed scoring; any other fields are carried through untouched.
 */
export interface UserProfile {
    age?: number | null;
    /** Average daily hours spent outdoors */
    outdoorHours?: number | null;
    healthConditions?: readonly string[] | null;
    [key: string]: unknown;
}

// =============================================================================
// Features
// =============================================================================

/**
 * Fixed order shared by the vectorizer, the synthetic data generator and
 * every persisted model. Never reorder.
 */
export const FEATURE_NAMES = [
    'temperature',
    'heatIndex',
    'humidity',
    'uvIndex',
    'aqi',
    'pm2_5',
    'age',
    'outdoorHours',
    'hasHealthConditions'
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = readonly [
    temperature: number,
    heatIndex: number,
    humidity: number,
    uvIndex: number,
    aqi: number,
    pm2_5: number,
    age: number,
    outdoorHours: number,
    hasHealthConditions: 0 | 1
];

// =============================================================================
// Risk Assessment
// =============================================================================

export type SeverityLevel = 'Low' | 'Moderate' | 'High' | 'Very High';

export type AdvisoryCategory =
    | 'heat'
    | 'hydration'
    | 'air_quality'
    | 'uv_protection'
    | 'health'
    | 'general';

export type Priority = 'medium' | 'high' | 'critical';

export interface Advisory {
    category: AdvisoryCategory;
    priority: Priority;
    message: string;
    action: string;
}

export interface RiskAssessment {
    /** 0–10 inclusive */
    riskScore: number;
    severityLevel: SeverityLevel;
    /** Emission order is significant */
    recommendations: Advisory[];
    /** Copied from the weather reading */
    timestamp: string;
}

// =============================================================================
// Symptom Triage
// =============================================================================

export type AlertLevel = 'medium' | 'high' | 'critical';

export interface Alert {
    level: AlertLevel;
    message: string;
    action: string;
}

/** A prior symptom log entry; only severity is inspected. */
export interface SymptomHistoryEntry {
    severity?: number | null;
    [key: string]: unknown;
}

export interface SymptomAnalysis {
    isUrgent: boolean;
    alerts: Alert[];
    recommendations: string[];
    /** Always null from the analyzer; the caller stamps it. */
    analysisTimestamp: string | null;
}

// =============================================================================
// Model Artifact
// =============================================================================

export interface ScalerState {
    mean: number[];
    scale: number[];
}

/**
 * Flat-array decision tree. Node i is a leaf when feature[i] === -1; its
 * class distribution is distributions[i] (aligned with the forest's classes).
 */
export interface TreeState {
    feature: number[];
    threshold: number[];
    left: number[];
    right: number[];
    distributions: number[][];
}

export interface RandomForestState {
    kind: 'random_forest';
    classes: number[];
    nEstimators: number;
    maxDepth: number;
    maxFeatures: number;
    seed: number;
    trees: TreeState[];
}

export type ScorerState = RandomForestState;

/**
 * Persisted (scorer, scaler) unit.
 * Immutable: one artifact per training run.
 */
export interface RiskModelArtifact {
    schemaVersion: number;
    type: 'risk_model';
    featureNames: string[];
    /** Seed used for synthetic data and the scorer */
    seed: number;
    sampleCount: number;
    /** ISO 8601 UTC */
    trainedAt: string;
    scaler: ScalerState;
    scorer: ScorerState;
}

// =============================================================================
// Constants
// =============================================================================

export const BLOB_MAGIC = 0x48524d41; // "HRMA" in ASCII

/**
 * Current artifact schema version.
 * Increment when making breaking changes to the artifact format.
 */
export const CURRENT_SCHEMA_VERSION = 1;
