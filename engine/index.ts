/**
 * Heat Risk Engine — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types & errors
export * from './types';
export * from './errors';

// Pure decision components
export * from './heatIndex';
export * from './aqi';
export * from './features';
export * from './severity';
export * from './recommendations';
export * from './triage';

// Classifier
export * from './model/riskModel';
export * from './model/scorer';
export { RandomForestClassifier, type RandomForestOptions } from './model/forest';
export { StandardScaler } from './model/scaler';
export { synthesizeDataset, ruleRiskScore, type SyntheticDataset } from './model/synthetic';

// Persistence
export * from './artifact';
export * from './storage';

// Collaborators
export * from './config';
export * from './ingest/fetcher';
