/**
 * Process configuration, read from environment variables
 */

import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  // Full connection string; overrides the MONGO_* components when set
  MONGO_URL: z.string().min(1).optional(),
  MONGO_HOST: z.string().min(1).default("mongo"),
  MONGO_PORT: z.coerce.number().int().positive().default(27017),
  MONGO_USER: z.string().default("mongoadmin"),
  MONGO_PASSWORD: z.string().default("mongoadmin"),
  MONGO_DB: z.string().min(1).default("my_database"),
  MONGO_AUTH_SOURCE: z.string().min(1).default("admin"),
  PROBLEMS_CORS_ORIGINS: z
    .string()
    .default("http://localhost:8080,https://localhost:8080"),
});

export interface AppConfig {
  port: number;
  mongoUri: string;
  mongoDb: string;
  corsOrigins: string[];
}

export function parseOrigins(raw: string): string[] {
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const credentials = vars.MONGO_USER
    ? `${encodeURIComponent(vars.MONGO_USER)}:${encodeURIComponent(vars.MONGO_PASSWORD)}@`
    : "";
  const mongoUri =
    vars.MONGO_URL ??
    `mongodb://${credentials}${vars.MONGO_HOST}:${vars.MONGO_PORT}/${vars.MONGO_DB}?authSource=${vars.MONGO_AUTH_SOURCE}`;

  return {
    port: vars.PORT,
    mongoUri,
    mongoDb: vars.MONGO_DB,
    corsOrigins: parseOrigins(vars.PROBLEMS_CORS_ORIGINS),
  };
}
