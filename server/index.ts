import { createServer } from "http";

import { EnvironmentFetcher, FileStorage, loadConfig, RiskModel } from "../engine";
import { createApp } from "./app";

async function startServer() {
  const config = loadConfig();

  const model = new RiskModel({
    storage: new FileStorage(),
    modelPath: config.model.modelPath,
    usePretrained: config.model.usePretrained,
  });
  const fetcher = new EnvironmentFetcher({
    apiKey: config.apiKeys.openWeatherApiKey,
    mock: config.mockData.enabled,
  });

  const app = createApp({
    model,
    fetcher,
    defaultLocation: {
      latitude: config.mockData.latitude,
      longitude: config.mockData.longitude,
    },
  });
  const server = createServer(app);

  if (fetcher.useMock) {
    console.log(`[server] Serving mock readings for ${config.mockData.defaultLocation}`);
  }

  // Requests that need the model get 503 until this settles.
  model
    .trainOrLoad()
    .then((report) => {
      console.log(`[server] Risk model ready (${report.source}, ${report.artifactId ?? "unsaved"})`);
    })
    .catch((error: unknown) => {
      console.error("[server] Risk model bootstrap failed:", error);
    });

  server.listen(config.server.port, config.server.host, () => {
    console.log(`Server running on http://${config.server.host}:${config.server.port}/`);
  });
}

startServer().catch(console.error);
