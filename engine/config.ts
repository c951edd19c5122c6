/**
 * Centralized configuration.
 *
 * Priority (lowest → highest):
 * 1. Built-in defaults
 * 2. config.json (each section shallow-merged over the defaults)
 * 3. Environment variables
 */

import { existsSync, readFileSync } from 'node:fs';

import { describeError } from './errors';
import { isRecord } from './guards';

export interface AppConfig {
    apiKeys: {
        openWeatherApiKey: string;
    };
    server: {
        host: string;
        port: number;
    };
    model: {
        usePretrained: boolean;
        modelPath: string;
    };
    mockData: {
        enabled: boolean;
        defaultLocation: string;
        latitude: number;
        longitude: number;
    };
}

/** Sentinel shipped in config templates; treated as "no key configured". */
export const PLACEHOLDER_API_KEY = 'your_api_key_here';

export function defaultConfig(): AppConfig {
    return {
        apiKeys: { openWeatherApiKey: PLACEHOLDER_API_KEY },
        server: { host: '0.0.0.0', port: 5000 },
        model: { usePretrained: true, modelPath: 'models/risk_model.bin' },
        mockData: {
            enabled: true,
            defaultLocation: 'Rourkela, India',
            latitude: 22.2604,
            longitude: 84.8536
        }
    };
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, configPath = 'config.json'): AppConfig {
    const config = defaultConfig();

    try {
        if (existsSync(configPath)) {
            mergeFileConfig(config, JSON.parse(readFileSync(configPath, 'utf8')));
        }
    } catch (error) {
        console.warn(`[config] Could not load ${configPath}: ${describeError(error)}`);
    }

    if (env.OPENWEATHER_API_KEY) {
        config.apiKeys.openWeatherApiKey = env.OPENWEATHER_API_KEY;
    }
    if (env.HOST) {
        config.server.host = env.HOST;
    }
    config.server.port = getNumericEnv(env.PORT, config.server.port);
    if (env.ML_MODEL_PATH) {
        config.model.modelPath = env.ML_MODEL_PATH;
    }
    config.model.usePretrained = getBooleanEnv(env.ML_USE_PRETRAINED, config.model.usePretrained);
    config.mockData.enabled = getBooleanEnv(env.MOCK_DATA_ENABLED, config.mockData.enabled);

    return config;
}

function getNumericEnv(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function getBooleanEnv(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === '') return fallback;
    return value.trim().toLowerCase() === 'true';
}

/**
 * Overlay known keys of a parsed config.json onto `config`, keeping a default
 * wherever the file's value has the wrong type.
 */
function mergeFileConfig(config: AppConfig, file: unknown): void {
    if (!isRecord(file)) {
        throw new Error('config.json must contain a JSON object');
    }

    const apiKeys = section(file, 'apiKeys');
    config.apiKeys.openWeatherApiKey = stringOr(apiKeys.openWeatherApiKey, config.apiKeys.openWeatherApiKey);

    const server = section(file, 'server');
    config.server.host = stringOr(server.host, config.server.host);
    config.server.port = numberOr(server.port, config.server.port);

    const model = section(file, 'model');
    config.model.usePretrained = booleanOr(model.usePretrained, config.model.usePretrained);
    config.model.modelPath = stringOr(model.modelPath, config.model.modelPath);

    const mockData = section(file, 'mockData');
    config.mockData.enabled = booleanOr(mockData.enabled, config.mockData.enabled);
    config.mockData.defaultLocation = stringOr(mockData.defaultLocation, config.mockData.defaultLocation);
    config.mockData.latitude = numberOr(mockData.latitude, config.mockData.latitude);
    config.mockData.longitude = numberOr(mockData.longitude, config.mockData.longitude);
}

function section(file: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = file[key];
    return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
    return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}
