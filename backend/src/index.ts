/**
 * Node.js entry point: loads configuration, opens the shared MongoDB
 * connection and serves the API
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { connectMongo, createMongoDatabase } from "./lib/mongo";

async function main(): Promise<void> {
  const config = loadConfig();
  const connection = await connectMongo(config.mongoUri, config.mongoDb);
  const db = createMongoDatabase(connection);
  const app = createApp({ corsOrigins: config.corsOrigins });

  const server = serve(
    {
      fetch: (request) => app.fetch(request, { DB: db }),
      port: config.port,
    },
    (info) => {
      console.log("Problems API listening:", {
        port: info.port,
        database: config.mongoDb,
        corsOrigins: config.corsOrigins,
      });
    }
  );

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    server.close(() => {
      connection
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("Failed to close MongoDB connection:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Failed to start Problems API:", error);
  process.exit(1);
});
