import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  // No default: the service cannot serve without its store
  MONGODB_URI: z.string().min(1, "MONGODB_URI is not set"),
  MONGODB_DB_NAME: z.string().min(1).default("shoppingcart-database"),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
  PUBSUB_NAME: z.string().min(1).default("pubsub"),
  AUTH_HEADER: z.string().min(1).default("authorized-user"),
  FRONTEND_URL: z.string().default("http://localhost:5173"),
});

export interface AppConfig {
  port: number;
  nodeEnv: "development" | "production" | "test";
  mongoUri: string;
  mongoDbName: string;
  logLevel: string;
  pubsubName: string;
  authHeader: string;
  frontendUrl: string;
}

/**
 * Reads the service configuration from the environment.
 * Throws a ZodError listing every invalid variable.
 */
export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env
): AppConfig => {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    mongoUri: parsed.MONGODB_URI,
    mongoDbName: parsed.MONGODB_DB_NAME,
    logLevel: parsed.LOG_LEVEL,
    pubsubName: parsed.PUBSUB_NAME,
    authHeader: parsed.AUTH_HEADER.toLowerCase(),
    frontendUrl: parsed.FRONTEND_URL,
  };
};
