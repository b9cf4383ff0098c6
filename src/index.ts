import "dotenv/config";

import { serve } from "@hono/node-server";

import { createApp } from "./app";
import { API_TITLE, API_VERSION, ConfigError, loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createRecognizer } from "./recognition";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  const app = createApp({ recognizer: createRecognizer(config) });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(
      `${API_TITLE} v${API_VERSION} is running on port ${info.port} ` +
        `(model: ${config.geminiModel})`
    );
  });
}

main();
