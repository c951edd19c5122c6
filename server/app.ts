import express, { type NextFunction, type Request, type Response } from "express";

import {
  analyzeSymptoms,
  type EnvironmentFetcher,
  ModelNotReadyError,
  parseSymptomReport,
  type RiskModel,
  type UserProfile,
  ValidationError,
} from "../engine";
import { isRecord, isStringArray } from "../engine/guards";

export const SERVICE_NAME = "heatwise risk API";
export const SERVICE_VERSION = "1.0.0";

export interface AppDependencies {
  model: RiskModel;
  fetcher: EnvironmentFetcher;
  /** Coordinates used when a request does not supply any */
  defaultLocation: { latitude: number; longitude: number };
  now?: () => Date;
}

export function createApp({ model, fetcher, defaultLocation, now = () => new Date() }: AppDependencies) {
  const app = express();
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      timestamp: now().toISOString(),
      version: SERVICE_VERSION,
      modelReady: model.isReady,
    });
  });

  app.get("/api/weather", async (req, res, next) => {
    try {
      const { latitude, longitude } = readCoordinates(req.query, defaultLocation);
      const weather = await fetcher.getWeather(latitude, longitude);
      res.json({ weather, success: true });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/aqi", async (req, res, next) => {
    try {
      const { latitude, longitude } = readCoordinates(req.query, defaultLocation);
      const aqiData = await fetcher.getAirQuality(latitude, longitude);
      res.json({ aqi_data: aqiData, success: true });
    } catch (error) {
      next(error);
    }
  });

  /** POST /api/forecast — Personalized risk for the supplied profile at a location. */
  app.post("/api/forecast", async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const payload = isRecord(body) ? body : {};
      const profile = readProfile(payload.profile);
      const { latitude, longitude } = readCoordinates(payload, defaultLocation);

      const [weather, aqi] = await Promise.all([
        fetcher.getWeather(latitude, longitude),
        fetcher.getAirQuality(latitude, longitude),
      ]);
      const risk = model.predictRisk(profile, weather, aqi);

      res.json({ forecast: { weather, aqi, risk }, success: true });
    } catch (error) {
      next(error);
    }
  });

  /** POST /api/symptoms/analyze — Triage a symptom report; nothing is stored. */
  app.post("/api/symptoms/analyze", (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new ValidationError("body", "Request body must be a JSON object");
      }
      for (const field of ["symptoms", "severity"]) {
        if (!(field in body)) {
          throw new ValidationError(field, `Missing required field: ${field}`);
        }
      }

      const report = parseSymptomReport(body.symptoms, body.severity, body.history);
      const analysis = analyzeSymptoms(report.symptoms, report.severity, report.history);
      res.json({
        analysis: { ...analysis, analysisTimestamp: now().toISOString() },
        success: true,
      });
    } catch (error) {
      next(error);
    }
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      res.status(400).json({ error: error.message, field: error.field });
      return;
    }
    if (error instanceof ModelNotReadyError) {
      res.status(503).json({ error: error.message });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    console.error(`[server] ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

function readCoordinates(
  source: Record<string, unknown>,
  fallback: { latitude: number; longitude: number }
): { latitude: number; longitude: number } {
  return {
    latitude: readCoordinate(source.latitude, "latitude", fallback.latitude),
    longitude: readCoordinate(source.longitude, "longitude", fallback.longitude),
  };
}

function readCoordinate(value: unknown, field: string, fallback: number): number {
  if (value === undefined || value === null || value === "") return fallback;
  const parsed = typeof value === "number" || typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(field, `Missing or invalid ${field}`);
  }
  return parsed;
}

function readProfile(value: unknown): UserProfile {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ValidationError("profile", "profile must be an object");
  }
  const { age, outdoorHours, healthConditions, ...rest } = value;
  let conditions: string[] | null = null;
  if (isStringArray(healthConditions)) {
    conditions = healthConditions;
  } else if (healthConditions !== undefined && healthConditions !== null) {
    throw new ValidationError("profile.healthConditions", "healthConditions must be a list of strings");
  }
  // Non-numeric age or hours fall back to the vectorizer defaults.
  return {
    ...rest,
    age: typeof age === "number" ? age : null,
    outdoorHours: typeof outdoorHours === "number" ? outdoorHours : null,
    healthConditions: conditions,
  };
}
