/**
 * HTTP API for math problems and their name/type tags
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { getAllSchemes } from "./config/schemes";
import { MESSAGES } from "./lib/messages";
import problemsRouter from "./routes/problems";
import { createTagRouter } from "./routes/tags";
import type { AppEnv } from "./types/env";

export interface AppOptions {
  corsOrigins: string[];
}

export function createApp(options: AppOptions) {
  const app = new Hono<AppEnv>();

  app.use(
    "/*",
    cors({
      origin: options.corsOrigins,
      // allowHeaders left unset: requested headers are echoed back
      allowMethods: ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      credentials: true,
    })
  );

  // Health check endpoint
  app.get("/health", (c) => {
    return c.json({ status: "ok" });
  });

  app.route("/api/problems", problemsRouter);

  for (const scheme of getAllSchemes()) {
    app.route("/", createTagRouter(scheme));
  }

  app.notFound((c) => {
    return c.json({ error: MESSAGES.routeNotFound }, 404);
  });

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ error: error.message }, error.status);
    }

    console.error("Unhandled request error:", {
      method: c.req.method,
      path: c.req.path,
      error,
    });
    return c.json({ error: MESSAGES.internalError }, 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
